import { SELF_LINK, type AccessLevel, type Verb } from "../types/access.js";
import type { EndpointRegistry } from "../endpoints/registry.js";

export class OperationGate {
  constructor(private readonly registry: EndpointRegistry) {}

  /**
   * Unregistered ids are denied below full access, so a denial never reveals
   * whether an endpoint exists.
   */
  authorize(level: AccessLevel, endpointId: string, verb: Verb): boolean {
    switch (level) {
      case "none":
        return false;
      case "restricted":
        if (verb !== "read") {
          return false;
        }
        return endpointId === SELF_LINK || this.registry.isRestricted(endpointId);
      case "full":
        return endpointId === SELF_LINK || this.registry.has(endpointId);
    }
  }
}
