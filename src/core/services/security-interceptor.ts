import { AuthorizationError } from "../errors.js";
import type { AccessLevel, TokenClaims } from "../types/access.js";
import { parseIntWithMin } from "../../lib/env.js";
import { deadlineSignal } from "../../lib/outbound.js";
import type { SecurityService } from "./security-service.js";
import type { TokenValidator } from "./token-validator.js";

export interface SecurityInterceptorOptions {
  applicationId?: string | undefined;
  authTimeoutMs?: number | undefined;
}

export interface SecurityDecision {
  accessLevel: AccessLevel;
  claims: TokenClaims;
}

export function bearerTokenFromHeader(authorizationHeader: string | undefined): string {
  if (!authorizationHeader) {
    throw new AuthorizationError("missing_authorization", "Authorization header is missing or invalid.");
  }
  const [scheme, value, ...rest] = authorizationHeader.trim().split(/\s+/);
  if (!scheme || !value || rest.length > 0 || scheme.toLowerCase() !== "bearer") {
    throw new AuthorizationError("missing_authorization", "Authorization header is missing or invalid.");
  }
  return value;
}

/**
 * Runs before every management operation: validates the bearer token, then
 * asks the cloud controller for the caller's access level. Both outbound
 * calls share one deadline linked to the request's abort signal.
 */
export class SecurityInterceptor {
  private readonly applicationId: string | null;
  private readonly authTimeoutMs: number;

  constructor(
    private readonly tokenValidator: TokenValidator,
    private readonly securityService: SecurityService,
    options?: SecurityInterceptorOptions
  ) {
    const applicationId = options?.applicationId ?? process.env.ACTUATOR_GATE_APPLICATION_ID;
    this.applicationId = applicationId && applicationId.trim().length > 0 ? applicationId.trim() : null;
    this.authTimeoutMs =
      options?.authTimeoutMs ?? parseIntWithMin(process.env.ACTUATOR_GATE_AUTH_TIMEOUT_MS, 5000, 1);
  }

  async preHandle(authorizationHeader: string | undefined, signal?: AbortSignal): Promise<SecurityDecision> {
    if (!this.applicationId) {
      throw new AuthorizationError("service_unavailable", "Application id is not available.");
    }
    const token = bearerTokenFromHeader(authorizationHeader);

    const deadline = deadlineSignal(signal, this.authTimeoutMs);
    try {
      const claims = await this.tokenValidator.validate(token, deadline.signal);
      const accessLevel = await this.securityService.getAccessLevel(token, this.applicationId, deadline.signal);
      return { accessLevel, claims };
    } finally {
      deadline.dispose();
    }
  }
}
