import type { AuthErrorCode } from "./codes.js";

export type AuthError = {
  code: AuthErrorCode;
  message: string;
  details?: Record<string, unknown>;
};

export type Result<T> = ({ ok: true } & T) | { ok: false; error: AuthError };

export function err(
  code: AuthErrorCode,
  message: string,
  details?: Record<string, unknown>,
): AuthError {
  return { code, message, ...(details !== undefined ? { details } : {}) };
}

export type UpstreamErrorKind = "timeout" | "aborted" | "failure";

/**
 * Thrown by calls to external collaborators (key fetch, user lookup,
 * session exchange). Translated into an {@link AuthError} at the facade.
 */
export class UpstreamError extends Error {
  readonly kind: UpstreamErrorKind;
  readonly operation: string;
  readonly status?: number;

  constructor(
    kind: UpstreamErrorKind,
    operation: string,
    message: string,
    options: { cause?: unknown; status?: number } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "UpstreamError";
    this.kind = kind;
    this.operation = operation;
    if (options.status !== undefined) this.status = options.status;
  }
}

/**
 * Timeouts and aborts are AUTH_UPSTREAM_UNAVAILABLE; anything else
 * AUTH_SERVICE_ERROR.
 */
export function fromUpstream(
  e: UpstreamError,
  details: Record<string, unknown> = {},
): AuthError {
  if (e.kind === "failure") {
    return err("AUTH_SERVICE_ERROR", e.message, {
      ...details,
      operation: e.operation,
      ...(e.status !== undefined ? { status: e.status } : {}),
    });
  }
  return err("AUTH_UPSTREAM_UNAVAILABLE", e.message, {
    ...details,
    operation: e.operation,
    kind: e.kind,
  });
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** HTTP status of a transport error, from `status` or `response.status`. */
export function statusOf(e: unknown): number | undefined {
  if (!e || typeof e !== "object") return undefined;
  if ("status" in e && typeof e.status === "number") return e.status;
  if ("response" in e && e.response && typeof e.response === "object") {
    const res = e.response;
    if ("status" in res && typeof res.status === "number") return res.status;
  }
  return undefined;
}

/** Malformed caller input, detected before any I/O. */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}
