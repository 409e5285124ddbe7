import "dotenv/config";
import { loadConfig } from "../server/config";
import { closeDatabase, runDatabaseMigrations, waitForDatabase } from "../server/db";
import { createPollServices } from "../server/services";
import { storage } from "../server/storage";

// Runs a single usage check against the panel and prints the cycle report.
async function main() {
  const config = loadConfig();
  if (!(await waitForDatabase({ logger: console }))) {
    throw new Error("Database not ready after retries.");
  }
  await runDatabaseMigrations();

  const { pipeline } = createPollServices(config, storage);
  const report = await pipeline.runCycle();
  console.log(
    JSON.stringify(
      {
        ...report,
        startedAt: report.startedAt.toISOString(),
        finishedAt: report.finishedAt.toISOString(),
      },
      null,
      2,
    ),
  );
  return report.error ? 1 : 0;
}

main()
  .then(async (code) => {
    await closeDatabase();
    process.exit(code);
  })
  .catch(async (error: unknown) => {
    console.error("Usage check failed:", error);
    await closeDatabase().catch((closeError: unknown) => {
      console.error("Failed to close database:", closeError);
    });
    process.exit(1);
  });
