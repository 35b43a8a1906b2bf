export type AccessLevel = "none" | "restricted" | "full";

export type Verb = "read" | "write";

export const SELF_LINK = "self";

export interface TokenClaims {
  tokenId: string | null;
  subject: string | null;
  issuer: string;
  scopes: string[];
  expiresAt: string;
}

export interface EndpointDescriptor {
  linkName: string;
  endpointId: string;
  path: string;
  templated: boolean;
  verbs: readonly Verb[];
  restricted: boolean;
}

export interface LinkEntry {
  href: string;
  templated: boolean;
}

export type LinkSet = Record<string, LinkEntry>;

export function accessLevelRank(level: AccessLevel): number {
  switch (level) {
    case "none":
      return 0;
    case "restricted":
      return 1;
    case "full":
      return 2;
  }
}

export function isAtLeast(level: AccessLevel, required: AccessLevel): boolean {
  return accessLevelRank(level) >= accessLevelRank(required);
}
