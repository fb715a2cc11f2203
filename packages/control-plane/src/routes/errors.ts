/**
 * Maps domain errors to HTTP responses. Expected signal outcomes (Busy,
 * Unreachable, ...) are mapped by the routes themselves.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from "fastify"
import { ZodError } from "zod"

import {
  AgentAlreadyEnrolledError,
  EntityStoppedError,
  EventValidationError,
  InvalidAgentIdError,
  UnknownAgentError,
} from "../errors.js"

export interface ErrorBody {
  error: string
  message: string
  details?: unknown
}

export function errorResponse(err: unknown): { statusCode: number; body: ErrorBody } | null {
  if (err instanceof UnknownAgentError) {
    return { statusCode: 404, body: { error: "not_found", message: err.message } }
  }
  if (err instanceof AgentAlreadyEnrolledError) {
    return { statusCode: 409, body: { error: "conflict", message: err.message } }
  }
  if (err instanceof InvalidAgentIdError) {
    return { statusCode: 400, body: { error: "bad_request", message: err.message } }
  }
  if (err instanceof EventValidationError) {
    return { statusCode: 400, body: { error: "bad_request", message: err.message, details: err.issues } }
  }
  if (err instanceof ZodError) {
    return {
      statusCode: 400,
      body: { error: "bad_request", message: "Invalid request body", details: err.issues },
    }
  }
  if (err instanceof EntityStoppedError) {
    return { statusCode: 503, body: { error: "unavailable", message: err.message } }
  }
  return null
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    const mapped = errorResponse(error)
    if (mapped) {
      return reply.status(mapped.statusCode).send(mapped.body)
    }

    // Fastify's own schema and parser errors carry a 4xx status.
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: "bad_request", message: error.message })
    }

    request.log.error({ err: error }, "Unhandled route error")
    return reply.status(500).send({ error: "internal_error", message: "Internal server error" })
  })
}
