export const AUTH_ERROR_CODES = [
  "AUTH_INVALID_ARGUMENT",
  "AUTH_INVALID_TOKEN",
  "AUTH_ISSUED_IN_THE_FUTURE",
  "AUTH_REVOKED_ID_TOKEN",
  "AUTH_REVOKED_SESSION_TOKEN",
  "AUTH_USER_NOT_FOUND",
  "AUTH_UNKNOWN_KEY",
  "AUTH_SERVICE_ERROR",
  "AUTH_UPSTREAM_UNAVAILABLE",
  "AUTH_TOKEN_PARSE_ERROR",
  "AUTH_INTERNAL_ERROR",
] as const;

export type AuthErrorCode = (typeof AUTH_ERROR_CODES)[number];
