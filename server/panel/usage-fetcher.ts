import PQueue from "p-queue";
import { z } from "zod";
import { AuthError, PanelRequestError, TransientError } from "../errors";
import { describeError, logJson, type Logger } from "../logger";
import type { PanelSession } from "./session";

export type RawClientRecord = Readonly<{
  clientId: string;
  uploadBytes: number;
  downloadBytes: number;
  enabled: boolean;
  /** Epoch milliseconds, zero or negative when the panel sets no expiry. */
  panelExpiryTimestamp: number;
}>;

export const clientStatSchema = z.object({
  email: z.string().trim().min(1),
  up: z.coerce.number(),
  down: z.coerce.number(),
  enable: z.boolean().optional().default(true),
  expiryTime: z.coerce.number().optional().default(0),
  total: z.coerce.number().optional().default(0),
});

const inboundIndexSchema = z.array(
  z.object({
    id: z.coerce.number().int(),
    remark: z.string().optional(),
  }),
);

const inboundPageSchema = z.object({
  id: z.coerce.number().int(),
  clientStats: z.array(z.unknown()).nullish(),
});

export const INBOUND_LIST_PATH = "/panel/api/inbounds/list";
export const inboundPath = (id: number) => `/panel/api/inbounds/get/${id}`;

export type ClientStat = z.infer<typeof clientStatSchema>;

export function toRawClientRecord(stat: ClientStat): RawClientRecord {
  return Object.freeze({
    clientId: stat.email,
    uploadBytes: stat.up,
    downloadBytes: stat.down,
    enabled: stat.enable,
    panelExpiryTimestamp: stat.expiryTime,
  });
}

export type UsageFetcherOptions = {
  pageConcurrency?: number;
  logger?: Logger;
};

type PageOutcome =
  | { ok: true; inboundId: number; records: RawClientRecord[] }
  | { ok: false; inboundId: number; error: unknown };

export class UsageFetcher {
  private readonly pageConcurrency: number;
  private readonly logger: Logger;

  constructor(options: UsageFetcherOptions = {}) {
    this.pageConcurrency = Math.max(1, options.pageConcurrency ?? 4);
    this.logger = options.logger ?? console;
  }

  /**
   * Lists every inbound, then fetches each inbound's client stats as one page.
   * Records are deduplicated by clientId, the last one in page order wins.
   */
  async fetchAll(session: PanelSession): Promise<RawClientRecord[]> {
    const index = await session.request("GET", INBOUND_LIST_PATH);
    if (!index.success) {
      throw new PanelRequestError(`Inbound list refused: ${index.msg || "unknown reason"}`, 200);
    }
    const inbounds = inboundIndexSchema.safeParse(index.obj ?? []);
    if (!inbounds.success) {
      throw new PanelRequestError("Inbound list has an unexpected shape", 200);
    }

    const queue = new PQueue({ concurrency: this.pageConcurrency });
    const outcomes = await Promise.all(
      inbounds.data.map((inbound) =>
        queue.add(() => this.fetchPage(session, inbound.id), { throwOnTimeout: true }),
      ),
    );

    const failed = outcomes.filter(
      (outcome): outcome is Extract<PageOutcome, { ok: false }> => !outcome.ok,
    );
    if (failed.length > 0) {
      const authFailure = failed.find((outcome) => outcome.error instanceof AuthError);
      if (authFailure) throw authFailure.error;

      const attempts = Math.max(
        1,
        ...failed.map((outcome) => (outcome.error instanceof TransientError ? outcome.error.attempts : 1)),
      );
      throw new TransientError(
        `Failed to fetch inbound page(s) ${failed.map((outcome) => outcome.inboundId).join(", ")}: ${describeError(failed[0].error)}`,
        attempts,
        { cause: failed[0].error },
      );
    }

    const byClient = new Map<string, RawClientRecord>();
    for (const outcome of outcomes) {
      if (!outcome.ok) continue;
      for (const record of outcome.records) {
        byClient.set(record.clientId, record);
      }
    }

    logJson(
      "log",
      "panel.usage_fetched",
      { pages: outcomes.length, records: byClient.size },
      this.logger,
    );
    return Array.from(byClient.values());
  }

  private async fetchPage(session: PanelSession, inboundId: number): Promise<PageOutcome> {
    try {
      const envelope = await session.request("GET", inboundPath(inboundId));
      if (!envelope.success) {
        throw new PanelRequestError(
          `Inbound ${inboundId} refused: ${envelope.msg || "unknown reason"}`,
          200,
        );
      }
      const page = inboundPageSchema.safeParse(envelope.obj);
      if (!page.success) {
        throw new PanelRequestError(`Inbound ${inboundId} has an unexpected shape`, 200);
      }

      const records: RawClientRecord[] = [];
      for (const entry of page.data.clientStats ?? []) {
        const stat = clientStatSchema.safeParse(entry);
        if (!stat.success) {
          logJson(
            "warn",
            "panel.client_stat_skipped",
            { inboundId, issues: stat.error.issues.map((issue) => issue.message) },
            this.logger,
          );
          continue;
        }
        records.push(toRawClientRecord(stat.data));
      }
      return { ok: true, inboundId, records };
    } catch (error) {
      logJson(
        "error",
        "panel.page_failed",
        { inboundId, error: describeError(error) },
        this.logger,
      );
      return { ok: false, inboundId, error };
    }
  }
}
