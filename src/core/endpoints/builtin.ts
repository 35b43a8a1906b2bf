import { infoContributionSchema } from "../types/schemas.js";
import type { ManagementEndpoint } from "./types.js";

const REDACT_KEYS = ["password", "secret", "token", "key", "credential", "authorization"];

export interface BuiltinEndpointOptions {
  applicationName?: string | undefined;
  applicationVersion?: string | undefined;
  rawInfo?: string | undefined;
  environment?: NodeJS.ProcessEnv | undefined;
}

function shouldRedactKey(key: string): boolean {
  const normalized = key.toLowerCase();
  return REDACT_KEYS.some((candidate) => normalized.includes(candidate));
}

export function parseInfoContribution(raw: string | undefined): Record<string, unknown> {
  if (!raw) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error("ACTUATOR_GATE_INFO must be a JSON object.");
  }
  const result = infoContributionSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error("ACTUATOR_GATE_INFO must be a JSON object.");
  }
  return result.data;
}

export function sanitizeEnvironment(environment: NodeJS.ProcessEnv): Record<string, string> {
  const output: Record<string, string> = {};
  for (const key of Object.keys(environment).sort((a, b) => a.localeCompare(b))) {
    const value = environment[key];
    if (value === undefined) {
      continue;
    }
    output[key] = shouldRedactKey(key) ? "******" : value;
  }
  return output;
}

export function infoEndpoint(options?: BuiltinEndpointOptions): ManagementEndpoint {
  const info = {
    app: {
      name: options?.applicationName ?? process.env.ACTUATOR_GATE_APPLICATION_NAME ?? "actuator-gate",
      version: options?.applicationVersion ?? process.env.ACTUATOR_GATE_APPLICATION_VERSION ?? "0.1.0"
    },
    ...parseInfoContribution(options?.rawInfo ?? process.env.ACTUATOR_GATE_INFO)
  };
  return {
    id: "info",
    restricted: true,
    operations: [{ verb: "read", invoke: () => info }]
  };
}

export function envEndpoint(options?: BuiltinEndpointOptions): ManagementEndpoint {
  const environment = options?.environment ?? process.env;
  return {
    id: "env",
    operations: [
      {
        verb: "read",
        invoke: () => ({ properties: sanitizeEnvironment(environment) })
      },
      {
        verb: "read",
        selector: "name",
        invoke: (name) => {
          const value = name !== null && Object.hasOwn(environment, name) ? environment[name] : undefined;
          if (name === null || value === undefined) {
            return null;
          }
          return { name, value: shouldRedactKey(name) ? "******" : value };
        }
      }
    ]
  };
}

export function createDefaultEndpoints(options?: BuiltinEndpointOptions): ManagementEndpoint[] {
  return [infoEndpoint(options), envEndpoint(options)];
}
