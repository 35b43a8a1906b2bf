import type { FastifyReply } from "fastify";
import { ZodError } from "zod";
import { isAuthorizationError, statusForReason } from "../core/errors.js";
import { createId } from "../lib/id.js";

export function requestIdFromHeaders(headers: Record<string, unknown>): string {
  const header = headers["x-request-id"];
  if (typeof header === "string" && header.trim().length > 0) {
    return header;
  }
  if (Array.isArray(header) && typeof header[0] === "string" && header[0].trim().length > 0) {
    return header[0];
  }
  return createId("req");
}

export function authHeaderFromHeaders(headers: Record<string, unknown>): string | undefined {
  const header = headers.authorization;
  if (typeof header === "string") {
    return header;
  }
  if (Array.isArray(header) && typeof header[0] === "string") {
    return header[0];
  }
  return undefined;
}

export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly errorCode: string,
    message: string
  ) {
    super(message);
  }
}

/** Aborts when the client goes away before the response has been written. */
export function abortSignalFor(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once("close", () => {
    if (!reply.raw.writableEnded) {
      controller.abort(new Error("Client closed the connection."));
    }
  });
  return controller.signal;
}

export function handleError(
  error: unknown,
  reply: { status: (code: number) => { send: (body: unknown) => unknown } },
  requestId?: string
) {
  const errorBody = (body: Record<string, unknown>) =>
    requestId
      ? {
          ...body,
          requestId
        }
      : body;

  if (isAuthorizationError(error)) {
    return reply.status(statusForReason(error.reason)).send({
      error: errorBody({
        code: error.reason,
        message: error.message
      })
    });
  }

  if (error instanceof ZodError) {
    return reply.status(400).send({
      error: errorBody({
        code: "validation_error",
        message: "Invalid request payload.",
        details: error.issues
      })
    });
  }

  if (error instanceof HttpError) {
    return reply.status(error.statusCode).send({
      error: errorBody({
        code: error.errorCode,
        message: error.message
      })
    });
  }

  if (error instanceof Error) {
    const maybeStatus = "statusCode" in error ? error.statusCode : undefined;
    const statusCode =
      typeof maybeStatus === "number" && Number.isFinite(maybeStatus) && maybeStatus >= 400 && maybeStatus <= 599
        ? maybeStatus
        : 500;
    return reply.status(statusCode).send({
      error: errorBody({
        code: statusCode === 500 ? "internal_error" : "request_error",
        message: statusCode === 500 ? "Unexpected error." : error.message
      })
    });
  }

  return reply.status(500).send({
    error: errorBody({
      code: "internal_error",
      message: "Unexpected error."
    })
  });
}
