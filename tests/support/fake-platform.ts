import { generateKeyPairSync, sign, type KeyObject } from "node:crypto";
import type { FetchInit, FetchLike, FetchResponseLike } from "../../src/lib/outbound.js";

export const CLOUD_CONTROLLER_URL = "https://api.platform.test";
export const AUTHORITY_URL = "https://uaa.platform.test";
export const EXPECTED_ISSUER = `${AUTHORITY_URL}/oauth/token`;
export const APPLICATION_ID = "app-id";

export interface FakeResponse {
  status: number;
  body?: unknown;
}

export interface RecordedCall {
  url: string;
  headers: Record<string, string>;
}

export interface SignTokenInput {
  kid?: string | undefined;
  alg?: string | undefined;
  issuer?: string | undefined;
  scope?: string[] | string | undefined;
  audience?: string | string[] | undefined;
  expiresInSeconds?: number | undefined;
  subject?: string | undefined;
  privateKey?: KeyObject | undefined;
}

function respond(response: FakeResponse): FetchResponseLike {
  return {
    status: response.status,
    json: async () => response.body ?? {}
  };
}

function encodeSegment(value: unknown): string {
  return Buffer.from(JSON.stringify(value), "utf8").toString("base64url");
}

export function generateSigningKey(): { privateKey: KeyObject; publicKey: KeyObject } {
  return generateKeyPairSync("rsa", { modulusLength: 2048 });
}

/**
 * In-process stand-in for the cloud controller (`/info`, app permissions)
 * and the token authority (`/token_keys`).
 */
export function createFakePlatform() {
  const signingKey = generateSigningKey();
  const calls: RecordedCall[] = [];
  const state: {
    info: FakeResponse;
    tokenKeys: FakeResponse;
    permissions: FakeResponse[];
  } = {
    info: { status: 200, body: { token_endpoint: AUTHORITY_URL } },
    tokenKeys: { status: 200, body: { keys: [{ kid: "key-1", ...signingKey.publicKey.export({ format: "jwk" }) }] } },
    permissions: [{ status: 200, body: { read_sensitive_data: true, read_basic_data: true } }]
  };

  const fetchFn: FetchLike = async (url: string, init: FetchInit) => {
    calls.push({ url, headers: init.headers });
    if (url === `${CLOUD_CONTROLLER_URL}/info`) {
      return respond(state.info);
    }
    if (url === `${AUTHORITY_URL}/token_keys`) {
      return respond(state.tokenKeys);
    }
    if (url.startsWith(`${CLOUD_CONTROLLER_URL}/v2/apps/`)) {
      const next = state.permissions.length > 1 ? state.permissions.shift() : state.permissions[0];
      return respond(next ?? { status: 500 });
    }
    return respond({ status: 404 });
  };

  function signToken(input?: SignTokenInput): string {
    const now = Math.floor(Date.now() / 1000);
    const header = { alg: input?.alg ?? "RS256", kid: input?.kid ?? "key-1", typ: "JWT" };
    const payload: Record<string, unknown> = {
      jti: "token-1",
      sub: input?.subject ?? "user-1",
      iss: input?.issuer ?? EXPECTED_ISSUER,
      exp: now + (input?.expiresInSeconds ?? 600),
      scope: input?.scope ?? ["actuator.read", "cloud_controller.read"]
    };
    if (input?.audience !== undefined) {
      payload.aud = input.audience;
    }
    const signingInput = `${encodeSegment(header)}.${encodeSegment(payload)}`;
    const signature = sign("RSA-SHA256", Buffer.from(signingInput), input?.privateKey ?? signingKey.privateKey);
    return `${signingInput}.${signature.toString("base64url")}`;
  }

  function setAccess(permissions: { read_sensitive_data: boolean; read_basic_data: boolean }): void {
    state.permissions = [{ status: 200, body: permissions }];
  }

  function callsTo(fragment: string): RecordedCall[] {
    return calls.filter((call) => call.url.includes(fragment));
  }

  return { fetchFn, calls, callsTo, state, signingKey, signToken, setAccess };
}

export type FakePlatform = ReturnType<typeof createFakePlatform>;

/** A fetch that only settles when its signal aborts. */
export const hangingFetch: FetchLike = (_url, init) =>
  new Promise((_resolve, reject) => {
    init.signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
