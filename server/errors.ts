export type AppErrorCode =
  | "AUTH_FAILED"
  | "TRANSIENT"
  | "RECONCILIATION_FAILED"
  | "PANEL_REQUEST_FAILED"
  | "CONFIG_INVALID";

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly status: number;

  constructor(code: AppErrorCode, message: string, status = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

/** Bad panel credentials, or a 401 that survived one re-authentication. */
export class AuthError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("AUTH_FAILED", message, 502, options);
  }
}

/** Network failure, timeout or 5xx after the retry policy was exhausted. */
export class TransientError extends AppError {
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super("TRANSIENT", message, 503, options);
    this.attempts = attempts;
  }
}

export class ReconciliationError extends AppError {
  readonly clientId: string;

  constructor(clientId: string, message: string) {
    super("RECONCILIATION_FAILED", `${clientId}: ${message}`, 422);
    this.clientId = clientId;
  }
}

export class PanelRequestError extends AppError {
  readonly httpStatus: number;

  constructor(message: string, httpStatus: number) {
    super("PANEL_REQUEST_FAILED", message, 502);
    this.httpStatus = httpStatus;
  }
}

export class ConfigError extends AppError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("CONFIG_INVALID", `Invalid configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}
