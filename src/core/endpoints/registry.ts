import { SELF_LINK, type EndpointDescriptor, type Verb } from "../types/access.js";
import { parseCsv } from "../../lib/env.js";
import type { ManagementEndpoint, OperationResult, ReadOperation, WriteOperation } from "./types.js";

const ENDPOINT_ID_PATTERN = /^[a-z][a-z0-9-]*$/;
const SELECTOR_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/;

interface RegisteredEndpoint {
  id: string;
  restricted: boolean;
  read: ReadOperation | null;
  selectedRead: ReadOperation | null;
  write: WriteOperation | null;
}

interface CachedResult {
  value: OperationResult;
  expiresAt: number;
}

export interface EndpointRegistryOptions {
  exposedEndpoints?: string[] | undefined;
  now?: (() => number) | undefined;
}

function register(endpoint: ManagementEndpoint): RegisteredEndpoint {
  if (!ENDPOINT_ID_PATTERN.test(endpoint.id) || endpoint.id === SELF_LINK) {
    throw new Error(`Invalid endpoint id: ${endpoint.id}`);
  }

  const registered: RegisteredEndpoint = {
    id: endpoint.id,
    restricted: endpoint.restricted ?? false,
    read: null,
    selectedRead: null,
    write: null
  };

  for (const operation of endpoint.operations) {
    if (operation.verb === "write") {
      if (registered.write) {
        throw new Error(`Endpoint ${endpoint.id} declares more than one write operation.`);
      }
      registered.write = operation;
      continue;
    }
    if (operation.selector === undefined) {
      if (registered.read) {
        throw new Error(`Endpoint ${endpoint.id} declares more than one read operation.`);
      }
      registered.read = operation;
      continue;
    }
    if (!SELECTOR_PATTERN.test(operation.selector)) {
      throw new Error(`Endpoint ${endpoint.id} has an invalid selector: ${operation.selector}`);
    }
    if (registered.selectedRead) {
      throw new Error(`Endpoint ${endpoint.id} declares more than one selector read operation.`);
    }
    registered.selectedRead = operation;
  }

  if (!registered.read && !registered.selectedRead && !registered.write) {
    throw new Error(`Endpoint ${endpoint.id} declares no operations.`);
  }
  return registered;
}

function descriptorsFor(endpoint: RegisteredEndpoint): EndpointDescriptor[] {
  const descriptors: EndpointDescriptor[] = [];
  const verbs: Verb[] = [];
  if (endpoint.read) {
    verbs.push("read");
  }
  if (endpoint.write) {
    verbs.push("write");
  }
  if (verbs.length > 0) {
    descriptors.push({
      linkName: endpoint.id,
      endpointId: endpoint.id,
      path: endpoint.id,
      templated: false,
      verbs,
      restricted: endpoint.restricted
    });
  }
  const selector = endpoint.selectedRead?.selector;
  if (selector) {
    descriptors.push({
      linkName: `${endpoint.id}-${selector}`,
      endpointId: endpoint.id,
      path: `${endpoint.id}/{${selector}}`,
      templated: true,
      verbs: ["read"],
      restricted: endpoint.restricted
    });
  }
  return descriptors;
}

/**
 * Immutable catalog of management endpoints, built once at start-up in
 * registration order.
 */
export class EndpointRegistry {
  private readonly endpointsById = new Map<string, RegisteredEndpoint>();
  private readonly catalog: readonly EndpointDescriptor[];
  private readonly readCache = new Map<string, CachedResult>();
  private readonly now: () => number;

  constructor(endpoints: ManagementEndpoint[], options?: EndpointRegistryOptions) {
    const exposed = options?.exposedEndpoints ?? parseCsv(process.env.ACTUATOR_GATE_EXPOSED_ENDPOINTS);
    const exposedSet = exposed.length > 0 ? new Set(exposed) : null;
    this.now = options?.now ?? Date.now;

    const descriptors: EndpointDescriptor[] = [];
    const linkNames = new Set<string>([SELF_LINK]);
    for (const endpoint of endpoints) {
      if (exposedSet && !exposedSet.has(endpoint.id)) {
        continue;
      }
      if (this.endpointsById.has(endpoint.id)) {
        throw new Error(`Duplicate endpoint id: ${endpoint.id}`);
      }
      const registered = register(endpoint);
      for (const descriptor of descriptorsFor(registered)) {
        if (linkNames.has(descriptor.linkName)) {
          throw new Error(`Duplicate link name: ${descriptor.linkName}`);
        }
        linkNames.add(descriptor.linkName);
        descriptors.push(Object.freeze({ ...descriptor, verbs: Object.freeze([...descriptor.verbs]) }));
      }
      this.endpointsById.set(endpoint.id, registered);
    }
    this.catalog = Object.freeze(descriptors);
  }

  descriptors(): readonly EndpointDescriptor[] {
    return this.catalog;
  }

  listEndpointIds(): string[] {
    return [...this.endpointsById.keys()];
  }

  has(endpointId: string): boolean {
    return this.endpointsById.has(endpointId);
  }

  isRestricted(endpointId: string): boolean {
    return this.endpointsById.get(endpointId)?.restricted ?? false;
  }

  findRead(endpointId: string, selected: boolean): ReadOperation | null {
    const endpoint = this.endpointsById.get(endpointId);
    if (!endpoint) {
      return null;
    }
    return selected ? endpoint.selectedRead : endpoint.read;
  }

  findWrite(endpointId: string): WriteOperation | null {
    return this.endpointsById.get(endpointId)?.write ?? null;
  }

  async invokeRead(endpointId: string, operation: ReadOperation, selection: string | null): Promise<OperationResult> {
    const ttl = operation.cacheTimeToLiveMs ?? 0;
    if (selection !== null || ttl <= 0) {
      return operation.invoke(selection);
    }

    const cached = this.readCache.get(endpointId);
    const now = this.now();
    if (cached && cached.expiresAt > now) {
      return cached.value;
    }
    const value = await operation.invoke(null);
    this.readCache.set(endpointId, { value, expiresAt: now + ttl });
    return value;
  }

  async invokeWrite(operation: WriteOperation, body: Record<string, unknown>): Promise<OperationResult> {
    return operation.invoke(body);
  }
}
