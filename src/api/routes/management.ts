import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { AuthorizationError } from "../../core/errors.js";
import type { PlatformContext } from "../../core/services/platform-context.js";
import { buildLinks } from "../../core/services/link-set-builder.js";
import { SELF_LINK, type AccessLevel, type Verb } from "../../core/types/access.js";
import { writeBodySchema } from "../../core/types/schemas.js";
import { HttpError, abortSignalFor, authHeaderFromHeaders, handleError, requestIdFromHeaders } from "../http.js";

interface EndpointParams {
  endpoint: string;
}

interface SelectorParams extends EndpointParams {
  selector: string;
}

type Target = (request: FastifyRequest) => string | null;

function baseUrlFor(request: FastifyRequest, basePath: string): string {
  const host = typeof request.headers.host === "string" && request.headers.host.length > 0 ? request.headers.host : "localhost";
  return `${request.protocol}://${host}${basePath}`;
}

function notFound(): HttpError {
  return new HttpError(404, "not_found", "No such management operation.");
}

const discoveryTarget: Target = () => SELF_LINK;

// The discovery root is only reachable at the base path itself.
const endpointTarget: Target = (request) => {
  const params = request.params;
  if (typeof params !== "object" || params === null || !("endpoint" in params)) {
    return null;
  }
  const endpoint = params.endpoint;
  return typeof endpoint === "string" && endpoint !== SELF_LINK ? endpoint : null;
};

export function registerManagementRoutes(app: FastifyInstance, context: PlatformContext, basePath: string): void {
  const registry = context.endpointRegistry;
  const accessLevels = new WeakMap<FastifyRequest, AccessLevel>();

  function fail(request: FastifyRequest, reply: FastifyReply, error: unknown) {
    if (error instanceof AuthorizationError) {
      request.log.info({ reason: error.reason, url: request.url }, "management request rejected");
    }
    return handleError(error, reply, requestIdFromHeaders(request.headers));
  }

  /**
   * Runs on `onRequest`, ahead of body parsing, so a caller without a valid
   * token gets 401 whatever it sends.
   */
  function guard(target: Target, verb: Verb) {
    return async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const decision = await context.securityInterceptor.preHandle(
          authHeaderFromHeaders(request.headers),
          abortSignalFor(reply)
        );
        const endpointId = target(request);
        if (endpointId === null || !context.operationGate.authorize(decision.accessLevel, endpointId, verb)) {
          request.log.info(
            { endpointId, verb, accessLevel: decision.accessLevel, subject: decision.claims.subject },
            "management operation denied"
          );
          throw new AuthorizationError("access_denied", "Access denied.");
        }
        accessLevels.set(request, decision.accessLevel);
      } catch (error) {
        return fail(request, reply, error);
      }
    };
  }

  function accessLevelOf(request: FastifyRequest): AccessLevel {
    const accessLevel = accessLevels.get(request);
    if (!accessLevel) {
      throw new AuthorizationError("access_denied", "Access denied.");
    }
    return accessLevel;
  }

  app.get(basePath, { onRequest: guard(discoveryTarget, "read") }, async (request, reply) => {
    try {
      const accessLevel = accessLevelOf(request);
      return reply.send({
        _links: buildLinks(accessLevel, registry.descriptors(), baseUrlFor(request, basePath))
      });
    } catch (error) {
      return fail(request, reply, error);
    }
  });

  app.get<{ Params: EndpointParams }>(
    `${basePath}/:endpoint`,
    { onRequest: guard(endpointTarget, "read") },
    async (request, reply) => {
      try {
        const { endpoint } = request.params;
        const operation = registry.findRead(endpoint, false);
        if (!operation) {
          throw notFound();
        }
        const result = await registry.invokeRead(endpoint, operation, null);
        if (result === null || result === undefined) {
          throw notFound();
        }
        return reply.send(result);
      } catch (error) {
        return fail(request, reply, error);
      }
    }
  );

  app.get<{ Params: SelectorParams }>(
    `${basePath}/:endpoint/:selector`,
    { onRequest: guard(endpointTarget, "read") },
    async (request, reply) => {
      try {
        const { endpoint, selector } = request.params;
        const operation = registry.findRead(endpoint, true);
        if (!operation) {
          throw notFound();
        }
        const result = await registry.invokeRead(endpoint, operation, selector);
        if (result === null || result === undefined) {
          throw notFound();
        }
        return reply.send(result);
      } catch (error) {
        return fail(request, reply, error);
      }
    }
  );

  app.post<{ Params: EndpointParams }>(
    `${basePath}/:endpoint`,
    { onRequest: guard(endpointTarget, "write") },
    async (request, reply) => {
      try {
        const { endpoint } = request.params;
        const operation = registry.findWrite(endpoint);
        if (!operation) {
          throw notFound();
        }
        const body = writeBodySchema.parse(request.body ?? {});
        const result = await registry.invokeWrite(operation, body);
        if (result === null || result === undefined) {
          return reply.status(204).send();
        }
        return reply.send(result);
      } catch (error) {
        return fail(request, reply, error);
      }
    }
  );
}
