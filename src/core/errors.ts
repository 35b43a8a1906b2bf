export type AuthorizationReason =
  | "access_denied"
  | "invalid_audience"
  | "invalid_issuer"
  | "invalid_key_id"
  | "invalid_signature"
  | "invalid_token"
  | "missing_authorization"
  | "service_unavailable"
  | "timeout"
  | "token_expired"
  | "unsupported_token_signing_algorithm";

export class AuthorizationError extends Error {
  constructor(
    public readonly reason: AuthorizationReason,
    message: string
  ) {
    super(message);
    this.name = "AuthorizationError";
  }
}

export function isAuthorizationError(error: unknown): error is AuthorizationError {
  return error instanceof AuthorizationError;
}

/**
 * HTTP status for a failed authorization. Authentication failures (including a
 * token that could not be verified in time) are 401 so clients re-authenticate;
 * a valid token without sufficient permission is 403.
 */
export function statusForReason(reason: AuthorizationReason): number {
  switch (reason) {
    case "access_denied":
      return 403;
    case "service_unavailable":
      return 503;
    case "invalid_audience":
    case "invalid_issuer":
    case "invalid_key_id":
    case "invalid_signature":
    case "invalid_token":
    case "missing_authorization":
    case "timeout":
    case "token_expired":
    case "unsupported_token_signing_algorithm":
      return 401;
  }
}
