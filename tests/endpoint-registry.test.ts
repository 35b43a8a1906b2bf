import { describe, expect, it, vi } from "vitest";
import { createDefaultEndpoints, envEndpoint, infoEndpoint, sanitizeEnvironment } from "../src/core/endpoints/builtin.js";
import { EndpointRegistry } from "../src/core/endpoints/registry.js";
import type { ManagementEndpoint } from "../src/core/endpoints/types.js";

function readOnly(id: string, restricted = false): ManagementEndpoint {
  return { id, restricted, operations: [{ verb: "read", invoke: () => ({ id }) }] };
}

describe("EndpointRegistry", () => {
  it("describes one link per plain endpoint and one per selector read", () => {
    const registry = new EndpointRegistry(
      [
        readOnly("info", true),
        {
          id: "test",
          operations: [
            { verb: "read", invoke: () => ({ All: true }) },
            { verb: "read", selector: "part", invoke: (part) => ({ part }) },
            { verb: "write", invoke: () => undefined }
          ]
        }
      ],
      { exposedEndpoints: [] }
    );

    expect(registry.descriptors()).toEqual([
      { linkName: "info", endpointId: "info", path: "info", templated: false, verbs: ["read"], restricted: true },
      { linkName: "test", endpointId: "test", path: "test", templated: false, verbs: ["read", "write"], restricted: false },
      {
        linkName: "test-part",
        endpointId: "test",
        path: "test/{part}",
        templated: true,
        verbs: ["read"],
        restricted: false
      }
    ]);
    expect(registry.listEndpointIds()).toEqual(["info", "test"]);
    expect(registry.isRestricted("info")).toBe(true);
    expect(registry.isRestricted("test")).toBe(false);
    expect(registry.isRestricted("missing")).toBe(false);
    expect(registry.findRead("test", true)?.selector).toBe("part");
    expect(registry.findWrite("info")).toBeNull();
  });

  it("freezes the catalog", () => {
    const registry = new EndpointRegistry([readOnly("info")], { exposedEndpoints: [] });
    expect(Object.isFrozen(registry.descriptors())).toBe(true);
    expect(Object.isFrozen(registry.descriptors()[0])).toBe(true);
  });

  it("rejects invalid and duplicate ids", () => {
    expect(() => new EndpointRegistry([readOnly("self")], { exposedEndpoints: [] })).toThrow("Invalid endpoint id: self");
    expect(() => new EndpointRegistry([readOnly("Bad_Id")], { exposedEndpoints: [] })).toThrow(
      "Invalid endpoint id: Bad_Id"
    );
    expect(() => new EndpointRegistry([readOnly("info"), readOnly("info")], { exposedEndpoints: [] })).toThrow(
      "Duplicate endpoint id: info"
    );
  });

  it("rejects link names produced twice", () => {
    expect(
      () =>
        new EndpointRegistry(
          [
            { id: "test", operations: [{ verb: "read", selector: "part", invoke: () => ({}) }] },
            readOnly("test-part")
          ],
          { exposedEndpoints: [] }
        )
    ).toThrow("Duplicate link name: test-part");
  });

  it("rejects endpoints with conflicting or missing operations", () => {
    expect(
      () =>
        new EndpointRegistry(
          [
            {
              id: "test",
              operations: [
                { verb: "write", invoke: () => undefined },
                { verb: "write", invoke: () => undefined }
              ]
            }
          ],
          { exposedEndpoints: [] }
        )
    ).toThrow("Endpoint test declares more than one write operation.");
    expect(() => new EndpointRegistry([{ id: "empty", operations: [] }], { exposedEndpoints: [] })).toThrow(
      "Endpoint empty declares no operations."
    );
  });

  it("keeps only exposed endpoints when an allow-list is given", () => {
    const registry = new EndpointRegistry([readOnly("info"), readOnly("env"), readOnly("beans")], {
      exposedEndpoints: ["info", "beans"]
    });
    expect(registry.listEndpointIds()).toEqual(["info", "beans"]);
    expect(registry.has("env")).toBe(false);
  });

  it("caches plain read results for their time to live", async () => {
    let now = 1_000;
    const invoke = vi.fn(() => ({ value: now }));
    const registry = new EndpointRegistry([{ id: "metrics", operations: [{ verb: "read", cacheTimeToLiveMs: 500, invoke }] }], {
      exposedEndpoints: [],
      now: () => now
    });
    const operation = registry.findRead("metrics", false);
    expect(operation).not.toBeNull();
    if (!operation) {
      return;
    }

    expect(await registry.invokeRead("metrics", operation, null)).toEqual({ value: 1_000 });
    now = 1_400;
    expect(await registry.invokeRead("metrics", operation, null)).toEqual({ value: 1_000 });
    now = 1_500;
    expect(await registry.invokeRead("metrics", operation, null)).toEqual({ value: 1_500 });
    expect(invoke).toHaveBeenCalledTimes(2);
  });

  it("never caches selector reads", async () => {
    const invoke = vi.fn((part: string | null) => ({ part }));
    const registry = new EndpointRegistry(
      [{ id: "test", operations: [{ verb: "read", selector: "part", cacheTimeToLiveMs: 10_000, invoke }] }],
      { exposedEndpoints: [] }
    );
    const operation = registry.findRead("test", true);
    if (!operation) {
      throw new Error("selector read missing");
    }
    await registry.invokeRead("test", operation, "one");
    await registry.invokeRead("test", operation, "one");
    expect(invoke).toHaveBeenCalledTimes(2);
  });
});

describe("builtin endpoints", () => {
  it("reports application info merged with configured info", async () => {
    const endpoint = infoEndpoint({
      applicationName: "billing",
      applicationVersion: "2.3.1",
      rawInfo: JSON.stringify({ build: { commit: "abc123" } })
    });
    expect(endpoint.restricted).toBe(true);
    const registry = new EndpointRegistry([endpoint], { exposedEndpoints: [] });
    const operation = registry.findRead("info", false);
    if (!operation) {
      throw new Error("info read missing");
    }
    expect(await registry.invokeRead("info", operation, null)).toEqual({
      app: { name: "billing", version: "2.3.1" },
      build: { commit: "abc123" }
    });
  });

  it("rejects info configuration that is not a JSON object", () => {
    expect(() => infoEndpoint({ rawInfo: "[1, 2]" })).toThrow("ACTUATOR_GATE_INFO must be a JSON object.");
    expect(() => infoEndpoint({ rawInfo: "{" })).toThrow("ACTUATOR_GATE_INFO must be a JSON object.");
  });

  it("redacts secret-looking environment variables", () => {
    expect(
      sanitizeEnvironment({ PORT: "8080", DB_PASSWORD: "test-secret", API_TOKEN: "test-token", HOME: "/home/app" })
    ).toEqual({
      API_TOKEN: "******",
      DB_PASSWORD: "******",
      HOME: "/home/app",
      PORT: "8080"
    });
  });

  it("reads a single environment variable by name", async () => {
    const registry = new EndpointRegistry([envEndpoint({ environment: { REGION: "eu-1", SIGNING_KEY: "test-key" } })], {
      exposedEndpoints: []
    });
    const operation = registry.findRead("env", true);
    if (!operation) {
      throw new Error("env selector read missing");
    }
    expect(await registry.invokeRead("env", operation, "REGION")).toEqual({ name: "REGION", value: "eu-1" });
    expect(await registry.invokeRead("env", operation, "SIGNING_KEY")).toEqual({ name: "SIGNING_KEY", value: "******" });
    expect(await registry.invokeRead("env", operation, "MISSING")).toBeNull();
  });

  it("looks up only variables that are actually set", async () => {
    const registry = new EndpointRegistry([envEndpoint({ environment: { PATH: "/bin" } })], { exposedEndpoints: [] });
    const operation = registry.findRead("env", true);
    if (!operation) {
      throw new Error("env selector read missing");
    }
    expect(await registry.invokeRead("env", operation, "constructor")).toBeNull();
    expect(await registry.invokeRead("env", operation, "__proto__")).toBeNull();
    expect(await registry.invokeRead("env", operation, "toString")).toBeNull();
    expect(await registry.invokeRead("env", operation, "PATH")).toEqual({ name: "PATH", value: "/bin" });
  });

  it("registers info before env by default", () => {
    const registry = new EndpointRegistry(createDefaultEndpoints({ rawInfo: "{}", environment: {} }), {
      exposedEndpoints: []
    });
    expect(registry.descriptors().map((descriptor) => descriptor.linkName)).toEqual(["info", "env", "env-name"]);
  });
});
