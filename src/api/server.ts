import Fastify from "fastify";
import { createPlatformContext, type PlatformContext } from "../core/services/platform-context.js";
import { parseCsv, parseIntWithMin } from "../lib/env.js";
import { handleError, requestIdFromHeaders } from "./http.js";
import { registerManagementRoutes } from "./routes/management.js";
import { registerPublicRoutes } from "./routes/public.js";

export interface ServerOptions {
  basePath?: string | undefined;
  corsOrigins?: string[] | undefined;
  corsMethods?: string[] | undefined;
  logLevel?: string | undefined;
  bodyLimitBytes?: number | undefined;
}

export function normalizeBasePath(raw: string): string {
  const trimmed = raw.trim().replace(/\/+$/, "");
  if (trimmed.length === 0) {
    throw new Error("Management base path must not be the server root.");
  }
  return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}

export function buildServer(context = createPlatformContext(), options?: ServerOptions) {
  const basePath = normalizeBasePath(options?.basePath ?? process.env.ACTUATOR_GATE_BASE_PATH ?? "/app");
  const bodyLimitBytes =
    options?.bodyLimitBytes ?? parseIntWithMin(process.env.ACTUATOR_GATE_BODY_LIMIT_BYTES, 1_048_576, 1);
  const logLevel = options?.logLevel ?? process.env.ACTUATOR_GATE_LOG_LEVEL;
  const corsOrigins = options?.corsOrigins ?? parseCsv(process.env.ACTUATOR_GATE_CORS_ORIGINS);
  const corsMethods = (
    options?.corsMethods ?? parseCsv(process.env.ACTUATOR_GATE_CORS_METHODS ?? "GET,POST")
  ).map((method) => method.toUpperCase());

  const app = Fastify({
    logger: logLevel
      ? {
          level: logLevel,
          redact: ["req.headers.authorization"]
        }
      : false,
    bodyLimit: bodyLimitBytes
  });

  app.addHook("onRequest", async (request, reply) => {
    const requestId = requestIdFromHeaders(request.headers);
    request.headers["x-request-id"] = requestId;
    reply.header("x-request-id", requestId);
    reply.header("x-content-type-options", "nosniff");
    reply.header("x-frame-options", "DENY");
    reply.header("cache-control", "no-store");
    // Deprecated in modern browsers; set to 0 to avoid legacy misbehavior.
    reply.header("x-xss-protection", "0");
  });

  // CORS is settled here, before any authorization runs.
  if (corsOrigins.length > 0) {
    const allowAll = corsOrigins.includes("*");

    app.addHook("onRequest", async (request, reply) => {
      const origin = request.headers.origin;
      const originAllowed = typeof origin === "string" && (allowAll || corsOrigins.includes(origin));
      if (originAllowed) {
        reply.header("access-control-allow-origin", allowAll ? "*" : origin);
        if (!allowAll) {
          reply.header("vary", "Origin");
        }
      }

      const requestedMethod = request.headers["access-control-request-method"];
      if (request.method !== "OPTIONS" || typeof requestedMethod !== "string") {
        return;
      }
      if (!originAllowed || !corsMethods.includes(requestedMethod.toUpperCase())) {
        return reply.status(403).send({
          error: {
            code: "cors_forbidden",
            message: "Invalid CORS request."
          }
        });
      }
      reply.header("access-control-allow-methods", corsMethods.join(","));
      reply.header("access-control-allow-headers", "Authorization, Content-Type, X-Request-Id");
      reply.header("access-control-max-age", "1800");
      return reply.status(200).send();
    });
  }

  registerPublicRoutes(app);
  registerManagementRoutes(app, context, basePath);

  app.setErrorHandler((error, request, reply) =>
    handleError(error, reply, requestIdFromHeaders(request.headers))
  );

  return app;
}

export type { PlatformContext };
