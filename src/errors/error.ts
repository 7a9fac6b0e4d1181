import type { AuthErrorCode } from "./codes.js";
import { HTTP_STATUS_BY_CODE } from "./codes.js";

export type AuthError = {
  code: AuthErrorCode;
  message: string;
  details?: unknown;
};

export type Result<T extends object = object> =
  | ({ ok: true } & T)
  | { ok: false; error: AuthError };

export function err(
  code: AuthErrorCode,
  message: string,
  details?: unknown,
): AuthError {
  return { code, message, ...(details !== undefined ? { details } : {}) };
}

/**
 * Throwable form of {@link AuthError}, used by the HTTP layer where a failed
 * result has to unwind out of a route handler.
 */
export class GatewayError extends Error {
  readonly code: AuthErrorCode;
  readonly details?: unknown;

  constructor(error: AuthError) {
    super(error.message);
    this.name = "GatewayError";
    this.code = error.code;
    this.details = error.details;
  }

  get status(): number {
    return HTTP_STATUS_BY_CODE[this.code];
  }

  toJSON(): AuthError {
    return err(this.code, this.message, this.details);
  }
}

export function fail(
  code: AuthErrorCode,
  message: string,
  details?: unknown,
): never {
  throw new GatewayError(err(code, message, details));
}

/** A remote collaborator (identity source, cache) could not be reached. */
export class UpstreamUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UpstreamUnavailableError";
  }
}
