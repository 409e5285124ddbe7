import { z } from "zod";
import { PanelRequestError } from "../errors";
import type { ClientIdentifier } from "./links";
import type { PanelSession } from "./session";
import { clientStatSchema, toRawClientRecord, type RawClientRecord } from "./usage-fetcher";

export type ClientTraffic = {
  record: RawClientRecord;
  /** Traffic limit configured on the panel, null when unlimited. */
  capBytes: number | null;
};

const onlineSchema = z.array(z.string()).nullish();

function firstStat(value: unknown) {
  const candidates = Array.isArray(value) ? value : [value];
  for (const candidate of candidates) {
    const parsed = clientStatSchema.safeParse(candidate);
    if (parsed.success) return parsed.data;
  }
  return null;
}

/** Single-client lookups against the panel, used by bot commands. */
export class PanelApi {
  constructor(private readonly session: PanelSession) {}

  async getClientTrafficById(uuid: string): Promise<ClientTraffic | null> {
    const envelope = await this.session.request(
      "GET",
      `/panel/api/inbounds/getClientTrafficsById/${encodeURIComponent(uuid)}`,
    );
    return envelope.success ? this.toTraffic(envelope.obj) : null;
  }

  async getClientTrafficByEmail(email: string): Promise<ClientTraffic | null> {
    const envelope = await this.session.request(
      "GET",
      `/panel/api/inbounds/getClientTraffics/${encodeURIComponent(email)}`,
    );
    return envelope.success ? this.toTraffic(envelope.obj) : null;
  }

  /** Looks the client up by UUID first, then by email. */
  async getClientTraffic(
    identifier: Pick<ClientIdentifier, "uuid" | "email">,
  ): Promise<ClientTraffic | null> {
    if (identifier.uuid) {
      const byId = await this.getClientTrafficById(identifier.uuid);
      if (byId) return byId;
    }
    if (identifier.email) {
      return this.getClientTrafficByEmail(identifier.email);
    }
    return null;
  }

  async getOnlineClients(): Promise<string[]> {
    const envelope = await this.session.request("POST", "/panel/api/inbounds/onlines");
    if (!envelope.success) {
      throw new PanelRequestError(`Online clients refused: ${envelope.msg || "unknown reason"}`, 200);
    }
    let payload = envelope.obj;
    if (typeof payload === "string") {
      try {
        payload = JSON.parse(payload);
      } catch (error) {
        throw new PanelRequestError(
          `Online clients payload is not JSON: ${error instanceof Error ? error.message : String(error)}`,
          200,
        );
      }
    }
    const parsed = onlineSchema.safeParse(payload);
    if (!parsed.success) {
      throw new PanelRequestError("Online clients payload has an unexpected shape", 200);
    }
    return parsed.data ?? [];
  }

  private toTraffic(obj: unknown): ClientTraffic | null {
    const stat = firstStat(obj);
    if (!stat) return null;
    return {
      record: toRawClientRecord(stat),
      capBytes: stat.total > 0 ? stat.total : null,
    };
  }
}
