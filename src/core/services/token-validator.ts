import { verify } from "node:crypto";
import { AuthorizationError } from "../errors.js";
import type { TokenClaims } from "../types/access.js";
import { tokenHeaderSchema, tokenPayloadSchema } from "../types/schemas.js";
import type { TokenKeyService } from "./token-key-service.js";

export interface TokenValidatorOptions {
  requiredScope?: string | undefined;
  audience?: string | undefined;
}

const SEGMENT_PATTERN = /^[A-Za-z0-9_-]+={0,2}$/;

function decodeSegment(segment: string): unknown {
  return JSON.parse(Buffer.from(segment, "base64url").toString("utf8"));
}

function toList(value: string | string[] | undefined): string[] {
  if (value === undefined) {
    return [];
  }
  if (Array.isArray(value)) {
    return value;
  }
  return value
    .split(" ")
    .map((entry) => entry.trim())
    .filter(Boolean);
}

function invalidToken(message: string): AuthorizationError {
  return new AuthorizationError("invalid_token", message);
}

export class TokenValidator {
  private readonly requiredScope: string;
  private readonly audience: string | null;

  constructor(
    private readonly tokenKeyService: TokenKeyService,
    options?: TokenValidatorOptions
  ) {
    this.requiredScope = options?.requiredScope ?? process.env.ACTUATOR_GATE_REQUIRED_SCOPE ?? "actuator.read";
    this.audience = options?.audience ?? process.env.ACTUATOR_GATE_AUDIENCE ?? null;
  }

  async validate(token: string | undefined, signal: AbortSignal): Promise<TokenClaims> {
    if (!token || token.trim().length === 0) {
      throw invalidToken("Token is missing.");
    }

    const parts = token.split(".");
    if (parts.length !== 3) {
      throw invalidToken("JWT must have header, body and signature.");
    }
    const [headerSegment, payloadSegment, signatureSegment] = parts;
    if (
      !headerSegment ||
      !payloadSegment ||
      !signatureSegment ||
      !parts.every((part) => SEGMENT_PATTERN.test(part))
    ) {
      throw invalidToken("JWT segments must be base64url encoded.");
    }

    let rawHeader: unknown;
    let rawPayload: unknown;
    try {
      rawHeader = decodeSegment(headerSegment);
      rawPayload = decodeSegment(payloadSegment);
    } catch {
      throw invalidToken("Token could not be decoded.");
    }
    const header = tokenHeaderSchema.safeParse(rawHeader);
    const payload = tokenPayloadSchema.safeParse(rawPayload);
    if (!header.success || !payload.success) {
      throw invalidToken("Token header or claims are malformed.");
    }

    if (header.data.alg !== "RS256") {
      throw new AuthorizationError(
        "unsupported_token_signing_algorithm",
        `Signing algorithm ${header.data.alg ?? "(none)"} not supported.`
      );
    }
    if (!header.data.kid) {
      throw new AuthorizationError("invalid_key_id", "Token header has no key id.");
    }

    const publicKey = await this.tokenKeyService.getSigningKey(header.data.kid, signal);
    const isValid = verify(
      "RSA-SHA256",
      Buffer.from(`${headerSegment}.${payloadSegment}`),
      publicKey,
      Buffer.from(signatureSegment, "base64url")
    );
    if (!isValid) {
      throw new AuthorizationError("invalid_signature", "RSA Signature did not match content.");
    }

    const claims = payload.data;
    const nowSeconds = Math.floor(Date.now() / 1000);
    if (typeof claims.exp !== "number" || claims.exp <= nowSeconds) {
      throw new AuthorizationError("token_expired", "Token expired.");
    }

    const expectedIssuer = await this.tokenKeyService.expectedIssuer(signal);
    if (claims.iss !== expectedIssuer) {
      throw new AuthorizationError("invalid_issuer", "Token issuer does not match.");
    }

    const scopes = toList(claims.scope);
    if (!scopes.includes(this.requiredScope)) {
      throw new AuthorizationError("invalid_audience", "Token does not have audience actuator.");
    }
    if (this.audience && !toList(claims.aud).includes(this.audience)) {
      throw new AuthorizationError("invalid_audience", `Token is not intended for ${this.audience}.`);
    }

    return {
      tokenId: claims.jti ?? null,
      subject: claims.sub ?? null,
      issuer: expectedIssuer,
      scopes,
      expiresAt: new Date(claims.exp * 1000).toISOString()
    };
  }
}
