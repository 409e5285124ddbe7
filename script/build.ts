import { build as esbuild } from "esbuild";
import { rm, readFile } from "fs/promises";
import { z } from "zod";

const packageSchema = z.object({
  dependencies: z.record(z.string()).optional(),
  devDependencies: z.record(z.string()).optional(),
});

// Keep node_modules external by default; BUNDLE_DEPS=true inlines the allowlist.
const bundleDeps = process.env.BUNDLE_DEPS === "true";
const allowlist = bundleDeps
  ? ["axios", "dotenv", "drizzle-orm", "drizzle-zod", "express", "p-queue", "pg", "zod"]
  : [];

async function buildAll() {
  await rm("dist", { recursive: true, force: true });

  console.log("building server...");
  const pkg = packageSchema.parse(JSON.parse(await readFile("package.json", "utf-8")));
  const allDeps = [
    ...Object.keys(pkg.dependencies ?? {}),
    ...Object.keys(pkg.devDependencies ?? {}),
  ];
  const externals = bundleDeps ? allDeps.filter((dep) => !allowlist.includes(dep)) : allDeps;

  await esbuild({
    entryPoints: ["server/index.ts"],
    platform: "node",
    bundle: true,
    format: "esm",
    target: "node20",
    outfile: "dist/index.js",
    sourcemap: true,
    sourcesContent: true,
    define: {
      "process.env.NODE_ENV": '"production"',
    },
    minify: true,
    minifyIdentifiers: false,
    keepNames: true,
    external: externals,
    logLevel: "info",
  });
}

buildAll().catch((err) => {
  console.error(err);
  process.exit(1);
});
