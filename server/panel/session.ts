import axios, { type AxiosInstance, type AxiosResponse, type Method } from "axios";
import type { PanelCredentials } from "../config";
import { AuthError, PanelRequestError } from "../errors";
import { logJson, type Logger } from "../logger";
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from "../retry";

export type Session = Readonly<{
  token: string;
  issuedAt: Date;
  expiresAt: Date;
}>;

/** Response envelope every panel endpoint answers with. */
export type PanelEnvelope = {
  success: boolean;
  msg?: string;
  obj?: unknown;
};

export type PanelSessionOptions = {
  credentials: PanelCredentials;
  timeoutMs?: number;
  sessionTtlMs?: number;
  skewMs?: number;
  retry?: RetryPolicy;
  logger?: Logger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<unknown>;
  /** Preconfigured client, used by tests to plug in an adapter. */
  http?: AxiosInstance;
};

const RETRYABLE_NETWORK_CODES = new Set([
  "ECONNABORTED",
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "ERR_NETWORK",
]);

class RetryableStatusError extends Error {
  constructor(readonly httpStatus: number) {
    super(`panel responded with HTTP ${httpStatus}`);
  }
}

function isRetryable(error: unknown) {
  if (error instanceof RetryableStatusError) return true;
  if (axios.isAxiosError(error)) {
    if (error.response) return false;
    return !error.code || RETRYABLE_NETWORK_CODES.has(error.code);
  }
  return false;
}

function extractSessionCookie(response: AxiosResponse) {
  const header = response.headers["set-cookie"];
  const cookies = Array.isArray(header) ? header : typeof header === "string" ? [header] : [];
  for (const cookie of cookies) {
    const pair = cookie.split(";")[0]?.trim();
    if (pair && pair.includes("=") && !pair.endsWith("=")) {
      return pair;
    }
  }
  return null;
}

function readEnvelope(data: unknown): PanelEnvelope | null {
  if (!data || typeof data !== "object") return null;
  if (!("success" in data) || typeof data.success !== "boolean") return null;
  return {
    success: data.success,
    msg: "msg" in data && typeof data.msg === "string" ? data.msg : undefined,
    obj: "obj" in data ? data.obj : undefined,
  };
}

export class PanelSession {
  private readonly credentials: PanelCredentials;
  private readonly http: AxiosInstance;
  private readonly sessionTtlMs: number;
  private readonly skewMs: number;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly sleep?: (ms: number) => Promise<unknown>;
  private session: Session | null = null;
  private authInFlight: Promise<Session> | null = null;

  constructor(options: PanelSessionOptions) {
    this.credentials = Object.freeze({ ...options.credentials });
    this.sessionTtlMs = options.sessionTtlMs ?? 3_600_000;
    this.skewMs = options.skewMs ?? 60_000;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.logger = options.logger ?? console;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep;
    this.http =
      options.http ??
      axios.create({
        baseURL: this.credentials.url,
        timeout: options.timeoutMs ?? 30_000,
        headers: { Accept: "application/json" },
      });
  }

  private invalidate() {
    this.session = null;
  }

  /**
   * Logs in again. Concurrent callers share a single login request.
   */
  authenticate(): Promise<Session> {
    if (!this.authInFlight) {
      this.authInFlight = this.login().finally(() => {
        this.authInFlight = null;
      });
    }
    return this.authInFlight;
  }

  async ensureValid(): Promise<Session> {
    const session = this.session;
    if (session && this.now().getTime() < session.expiresAt.getTime() - this.skewMs) {
      return session;
    }
    return this.authenticate();
  }

  async request(method: Method, path: string, body?: unknown): Promise<PanelEnvelope> {
    const session = await this.ensureValid();
    let response = await this.send(method, path, session.token, body);

    if (response.status === 401) {
      logJson("warn", "panel.session_rejected", { path }, this.logger);
      const current = this.session;
      let renewed: Session;
      if (current && current.token !== session.token) {
        renewed = current;
      } else {
        this.invalidate();
        renewed = await this.authenticate();
      }
      response = await this.send(method, path, renewed.token, body);
      if (response.status === 401) {
        this.invalidate();
        throw new AuthError(`Panel rejected the session twice for ${path}`);
      }
    }

    if (response.status < 200 || response.status >= 300) {
      throw new PanelRequestError(`${method} ${path} failed with HTTP ${response.status}`, response.status);
    }

    const envelope = readEnvelope(response.data);
    if (!envelope) {
      throw new PanelRequestError(`${method} ${path} returned an unexpected payload`, response.status);
    }
    return envelope;
  }

  private async login(): Promise<Session> {
    const response = await withRetry(
      async () => {
        const result = await this.http.request({
          method: "POST",
          url: "/login",
          data: { username: this.credentials.username, password: this.credentials.password },
          headers: { "Content-Type": "application/json" },
          validateStatus: () => true,
        });
        if (result.status >= 500) {
          throw new RetryableStatusError(result.status);
        }
        return result;
      },
      this.retry,
      { context: "panel login", isRetryable, logger: this.logger, sleep: this.sleep },
    );

    if (response.status === 401 || response.status === 403) {
      throw new AuthError(`Panel login rejected with HTTP ${response.status}`);
    }
    const envelope = readEnvelope(response.data);
    if (response.status !== 200 || !envelope?.success) {
      throw new AuthError(`Panel login failed: ${envelope?.msg || `HTTP ${response.status}`}`);
    }
    const token = extractSessionCookie(response);
    if (!token) {
      throw new AuthError("Panel login succeeded without a session cookie");
    }

    const issuedAt = this.now();
    const session: Session = Object.freeze({
      token,
      issuedAt,
      expiresAt: new Date(issuedAt.getTime() + this.sessionTtlMs),
    });
    this.session = session;
    logJson(
      "log",
      "panel.authenticated",
      { baseUrl: this.credentials.url, expiresAt: session.expiresAt.toISOString() },
      this.logger,
    );
    return session;
  }

  private send(method: Method, path: string, token: string, body?: unknown) {
    return withRetry(
      async () => {
        const result = await this.http.request({
          method,
          url: path,
          data: body,
          headers: {
            Cookie: token,
            ...(body === undefined ? {} : { "Content-Type": "application/json" }),
          },
          validateStatus: () => true,
        });
        if (result.status >= 500) {
          throw new RetryableStatusError(result.status);
        }
        return result;
      },
      this.retry,
      { context: `panel ${method} ${path}`, isRetryable, logger: this.logger, sleep: this.sleep },
    );
  }
}
