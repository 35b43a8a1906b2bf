import { AuthorizationError } from "../errors.js";
import type { AccessLevel } from "../types/access.js";
import { permissionsSchema, type PermissionsDocument } from "../types/schemas.js";
import { parseIntWithMin } from "../../lib/env.js";
import { defaultFetch, fetchJson, type FetchLike } from "../../lib/outbound.js";

export interface SecurityServiceOptions {
  cloudControllerUrl?: string | undefined;
  fetchFn?: FetchLike | undefined;
  retries?: number | undefined;
  backoffMs?: number | undefined;
}

const FULL_ACCESS_ROLES = new Set(["space_developer"]);
const RESTRICTED_ACCESS_ROLES = new Set(["space_auditor", "space_manager"]);

export function accessLevelFromPermissions(permissions: PermissionsDocument): AccessLevel {
  const roles = permissions.roles ?? [];
  if (permissions.read_sensitive_data === true || roles.some((role) => FULL_ACCESS_ROLES.has(role))) {
    return "full";
  }
  if (permissions.read_basic_data === true || roles.some((role) => RESTRICTED_ACCESS_ROLES.has(role))) {
    return "restricted";
  }
  return "none";
}

/**
 * Asks the cloud controller what the token's subject may do with an
 * application. Called once per request; decisions are never cached.
 */
export class SecurityService {
  private readonly cloudControllerUrl: string | null;
  private readonly fetchFn: FetchLike;
  private readonly retries: number;
  private readonly backoffMs: number;

  constructor(options?: SecurityServiceOptions) {
    const configuredUrl = options?.cloudControllerUrl ?? process.env.ACTUATOR_GATE_CLOUD_CONTROLLER_URL;
    this.cloudControllerUrl = configuredUrl ? configuredUrl.replace(/\/+$/, "") : null;
    this.fetchFn = options?.fetchFn ?? defaultFetch;
    this.retries = options?.retries ?? parseIntWithMin(process.env.ACTUATOR_GATE_OUTBOUND_RETRIES, 2, 0);
    this.backoffMs = options?.backoffMs ?? parseIntWithMin(process.env.ACTUATOR_GATE_OUTBOUND_BACKOFF_MS, 200, 0);
  }

  async getAccessLevel(token: string, applicationId: string, signal: AbortSignal): Promise<AccessLevel> {
    if (!this.cloudControllerUrl) {
      throw new AuthorizationError("service_unavailable", "Cloud controller URL is not configured.");
    }

    const response = await fetchJson(
      this.fetchFn,
      `${this.cloudControllerUrl}/v2/apps/${encodeURIComponent(applicationId)}/permissions`,
      {
        label: "cloud controller permissions",
        signal,
        retries: this.retries,
        backoffMs: this.backoffMs,
        headers: {
          authorization: `bearer ${token}`
        }
      }
    );

    // An unknown application is "no access", not a failure.
    if (response.status === 404) {
      return "none";
    }
    if (response.status !== 200) {
      throw new AuthorizationError("access_denied", "Access denied.");
    }

    const parsed = permissionsSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new AuthorizationError("access_denied", "Access denied.");
    }
    return accessLevelFromPermissions(parsed.data);
  }
}
