export type TransientProviderErrorKind = "rate_limit" | "server_error" | "timeout" | "network_error";
export type TerminalProviderErrorKind = "invalid_prompt" | "missing_credentials";
export type ProviderErrorKind = TransientProviderErrorKind | TerminalProviderErrorKind;

export abstract class ProviderError extends Error {
  abstract readonly kind: ProviderErrorKind;
  abstract readonly retryable: boolean;
  readonly provider: string;
  readonly status?: number;

  constructor(provider: string, message: string, status?: number) {
    super(message);
    this.provider = provider;
    this.status = status;
  }
}

export class TransientProviderError extends ProviderError {
  readonly kind: TransientProviderErrorKind;
  readonly retryable = true;

  constructor(provider: string, kind: TransientProviderErrorKind, message: string, status?: number) {
    super(provider, message, status);
    this.name = "TransientProviderError";
    this.kind = kind;
  }
}

export class TerminalProviderError extends ProviderError {
  readonly kind: TerminalProviderErrorKind;
  readonly retryable = false;

  constructor(provider: string, kind: TerminalProviderErrorKind, message: string, status?: number) {
    super(provider, message, status);
    this.name = "TerminalProviderError";
    this.kind = kind;
  }
}

export class PersistenceError extends Error {
  readonly phase: "download" | "upload";

  constructor(phase: "download" | "upload", message: string) {
    super(message);
    this.name = "PersistenceError";
    this.phase = phase;
  }
}

export type ValidationCode =
  | "invalid_profile"
  | "invalid_request"
  | "invalid_step"
  | "step_order"
  | "cardinality"
  | "duplicate_variant"
  | "session_closed"
  | "regeneration_limit";

export class ValidationError extends Error {
  readonly code: ValidationCode;

  constructor(code: ValidationCode, message: string) {
    super(message);
    this.name = "ValidationError";
    this.code = code;
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class ExpiredSessionError extends Error {
  readonly sessionId: string;
  readonly expiresAt: string;

  constructor(sessionId: string, expiresAt: string) {
    super(`Session ${sessionId} expired at ${expiresAt}`);
    this.name = "ExpiredSessionError";
    this.sessionId = sessionId;
    this.expiresAt = expiresAt;
  }
}

export class ConcurrentModificationError extends Error {
  readonly expectedVersion: number;
  readonly actualVersion: number | null;

  constructor(sessionId: string, expectedVersion: number, actualVersion: number | null) {
    super(
      `Session ${sessionId} was modified concurrently (expected version ${expectedVersion}, found ${actualVersion === null ? "none" : actualVersion})`
    );
    this.name = "ConcurrentModificationError";
    this.expectedVersion = expectedVersion;
    this.actualVersion = actualVersion;
  }
}

export class SessionBusyError extends Error {
  constructor(sessionId: string) {
    super(`Session ${sessionId} already has a generation in progress`);
    this.name = "SessionBusyError";
  }
}

export class CommitError extends Error {
  readonly sessionId: string;
  readonly durableKeys: string[];

  constructor(sessionId: string, durableKeys: string[], cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to commit session ${sessionId}: ${reason}`, { cause });
    this.name = "CommitError";
    this.sessionId = sessionId;
    this.durableKeys = durableKeys;
  }
}

export type HttpErrorBody = { error: { code: string; message: string } };

export function httpErrorOf(err: unknown): { status: number; body: HttpErrorBody } {
  if (err instanceof ValidationError) return { status: 400, body: { error: { code: err.code, message: err.message } } };
  if (err instanceof NotFoundError) return { status: 404, body: { error: { code: "not_found", message: err.message } } };
  if (err instanceof ExpiredSessionError) return { status: 410, body: { error: { code: "session_expired", message: err.message } } };
  if (err instanceof SessionBusyError) return { status: 409, body: { error: { code: "session_busy", message: err.message } } };
  if (err instanceof ConcurrentModificationError) {
    return { status: 409, body: { error: { code: "concurrent_modification", message: err.message } } };
  }
  if (err instanceof CommitError) return { status: 500, body: { error: { code: "commit_failed", message: err.message } } };
  const message = err instanceof Error ? err.message : String(err);
  return { status: 500, body: { error: { code: "internal", message } } };
}
