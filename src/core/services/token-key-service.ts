import { createPublicKey, type KeyObject } from "node:crypto";
import { AuthorizationError } from "../errors.js";
import { authorityInfoSchema, tokenKeysSchema, type TokenKey } from "../types/schemas.js";
import { parseIntWithMin } from "../../lib/env.js";
import { defaultFetch, fetchJson, type FetchLike } from "../../lib/outbound.js";

export interface TokenKeyServiceOptions {
  cloudControllerUrl?: string | undefined;
  fetchFn?: FetchLike | undefined;
  retries?: number | undefined;
  backoffMs?: number | undefined;
}

export interface TokenKeyServiceStatus {
  authorityUrl: string | null;
  keyIds: string[];
  lastRefreshedAt: string | null;
  lastError: string | null;
}

function trimTrailingSlash(url: string): string {
  return url.endsWith("/") ? url.slice(0, -1) : url;
}

function toPublicKey(key: TokenKey): KeyObject {
  if (key.value) {
    return createPublicKey(key.value);
  }
  if (key.n && key.e) {
    return createPublicKey({ key: { kty: "RSA", n: key.n, e: key.e }, format: "jwk" });
  }
  throw new Error("Key has neither a PEM value nor an RSA modulus and exponent.");
}

/**
 * Resolves the token authority from the cloud controller's `/info` document
 * and caches the RSA signing keys it publishes under `/token_keys`.
 */
export class TokenKeyService {
  private readonly cloudControllerUrl: string | null;
  private readonly fetchFn: FetchLike;
  private readonly retries: number;
  private readonly backoffMs: number;
  private authority: string | null = null;
  private keysById = new Map<string, KeyObject>();
  private lastRefreshedAt: string | null = null;
  private lastError: string | null = null;

  constructor(options?: TokenKeyServiceOptions) {
    const configuredUrl = options?.cloudControllerUrl ?? process.env.ACTUATOR_GATE_CLOUD_CONTROLLER_URL;
    this.cloudControllerUrl = configuredUrl ? trimTrailingSlash(configuredUrl) : null;
    this.fetchFn = options?.fetchFn ?? defaultFetch;
    this.retries = options?.retries ?? parseIntWithMin(process.env.ACTUATOR_GATE_OUTBOUND_RETRIES, 2, 0);
    this.backoffMs = options?.backoffMs ?? parseIntWithMin(process.env.ACTUATOR_GATE_OUTBOUND_BACKOFF_MS, 200, 0);
  }

  async authorityUrl(signal: AbortSignal): Promise<string> {
    if (this.authority) {
      return this.authority;
    }
    if (!this.cloudControllerUrl) {
      throw new AuthorizationError("service_unavailable", "Cloud controller URL is not configured.");
    }

    const response = await fetchJson(this.fetchFn, `${this.cloudControllerUrl}/info`, {
      label: "cloud controller info",
      signal,
      retries: this.retries,
      backoffMs: this.backoffMs
    });
    if (response.status !== 200) {
      this.lastError = `Cloud controller info returned HTTP ${response.status}.`;
      throw new AuthorizationError("service_unavailable", "Unable to fetch token authority URL.");
    }
    const parsed = authorityInfoSchema.safeParse(response.body);
    if (!parsed.success) {
      this.lastError = "Cloud controller info has no valid token_endpoint.";
      throw new AuthorizationError("service_unavailable", "Unable to fetch token authority URL.");
    }

    this.authority = trimTrailingSlash(parsed.data.token_endpoint);
    return this.authority;
  }

  async expectedIssuer(signal: AbortSignal): Promise<string> {
    return `${await this.authorityUrl(signal)}/oauth/token`;
  }

  async getSigningKey(kid: string, signal: AbortSignal): Promise<KeyObject> {
    const cached = this.keysById.get(kid);
    if (cached) {
      return cached;
    }
    await this.refreshKeys(signal);
    const refreshed = this.keysById.get(kid);
    if (!refreshed) {
      throw new AuthorizationError("invalid_key_id", "Key Id present in token header does not match.");
    }
    return refreshed;
  }

  async refreshKeys(signal: AbortSignal): Promise<void> {
    const authority = await this.authorityUrl(signal);
    const response = await fetchJson(this.fetchFn, `${authority}/token_keys`, {
      label: "token keys",
      signal,
      retries: this.retries,
      backoffMs: this.backoffMs
    });
    if (response.status !== 200) {
      this.lastError = `Token keys request returned HTTP ${response.status}.`;
      throw new AuthorizationError("service_unavailable", "Unable to fetch token keys.");
    }
    const parsed = tokenKeysSchema.safeParse(response.body);
    if (!parsed.success) {
      this.lastError = "Token keys payload is invalid.";
      throw new AuthorizationError("service_unavailable", "Unable to fetch token keys.");
    }

    const keysById = new Map<string, KeyObject>();
    const rejected: string[] = [];
    for (const key of parsed.data.keys) {
      try {
        keysById.set(key.kid, toPublicKey(key));
      } catch (error) {
        rejected.push(`${key.kid}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
    this.keysById = keysById;
    this.lastRefreshedAt = new Date().toISOString();
    this.lastError = rejected.length > 0 ? `Rejected keys ${rejected.join("; ")}` : null;
  }

  listKeyIds(): string[] {
    return [...this.keysById.keys()];
  }

  status(): TokenKeyServiceStatus {
    return {
      authorityUrl: this.authority,
      keyIds: this.listKeyIds(),
      lastRefreshedAt: this.lastRefreshedAt,
      lastError: this.lastError
    };
  }
}
