export type AuthErrorCode =
  | "AUTH_INVALID_CREDENTIALS"
  | "AUTH_UNAUTHORIZED"
  | "AUTH_TOKEN_INVALID"
  | "AUTH_TOKEN_REVOKED"
  | "AUTH_INACTIVE_ACCOUNT"
  | "AUTH_FORBIDDEN"
  | "NOT_FOUND"
  | "CONFLICT"
  | "VALIDATION_ERROR"
  | "SERVICE_UNAVAILABLE"
  | "INTERNAL_ERROR";

export const HTTP_STATUS_BY_CODE: Record<AuthErrorCode, number> = {
  AUTH_INVALID_CREDENTIALS: 401,
  AUTH_UNAUTHORIZED: 401,
  AUTH_TOKEN_INVALID: 401,
  AUTH_TOKEN_REVOKED: 401,
  AUTH_INACTIVE_ACCOUNT: 403,
  AUTH_FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  VALIDATION_ERROR: 400,
  SERVICE_UNAVAILABLE: 503,
  INTERNAL_ERROR: 500,
};
