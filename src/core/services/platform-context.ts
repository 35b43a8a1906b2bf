import { createDefaultEndpoints, type BuiltinEndpointOptions } from "../endpoints/builtin.js";
import { EndpointRegistry, type EndpointRegistryOptions } from "../endpoints/registry.js";
import type { ManagementEndpoint } from "../endpoints/types.js";
import type { FetchLike } from "../../lib/outbound.js";
import { OperationGate } from "./operation-gate.js";
import { SecurityInterceptor, type SecurityInterceptorOptions } from "./security-interceptor.js";
import { SecurityService } from "./security-service.js";
import { TokenKeyService } from "./token-key-service.js";
import { TokenValidator, type TokenValidatorOptions } from "./token-validator.js";

export interface PlatformContext {
  endpointRegistry: EndpointRegistry;
  operationGate: OperationGate;
  securityInterceptor: SecurityInterceptor;
  securityService: SecurityService;
  tokenKeyService: TokenKeyService;
  tokenValidator: TokenValidator;
}

export interface PlatformContextOptions {
  endpoints?: ManagementEndpoint[] | undefined;
  builtinOptions?: BuiltinEndpointOptions | undefined;
  registryOptions?: EndpointRegistryOptions | undefined;
  cloudControllerUrl?: string | undefined;
  fetchFn?: FetchLike | undefined;
  outboundRetries?: number | undefined;
  outboundBackoffMs?: number | undefined;
  tokenOptions?: TokenValidatorOptions | undefined;
  interceptorOptions?: SecurityInterceptorOptions | undefined;
}

export function createPlatformContext(options?: PlatformContextOptions): PlatformContext {
  const outbound = {
    cloudControllerUrl: options?.cloudControllerUrl,
    fetchFn: options?.fetchFn,
    retries: options?.outboundRetries,
    backoffMs: options?.outboundBackoffMs
  };

  const endpointRegistry = new EndpointRegistry(
    options?.endpoints ?? createDefaultEndpoints(options?.builtinOptions),
    options?.registryOptions
  );
  const operationGate = new OperationGate(endpointRegistry);
  const tokenKeyService = new TokenKeyService(outbound);
  const tokenValidator = new TokenValidator(tokenKeyService, options?.tokenOptions);
  const securityService = new SecurityService(outbound);
  const securityInterceptor = new SecurityInterceptor(tokenValidator, securityService, options?.interceptorOptions);

  return {
    endpointRegistry,
    operationGate,
    securityInterceptor,
    securityService,
    tokenKeyService,
    tokenValidator
  };
}
