/**
 * Error classification for directive delivery. Decides whether a failed
 * attempt is worth retrying.
 *
 * - TRANSIENT: retry (HTTP 429/5xx, connection resets)
 * - PERMANENT: give up at once (HTTP 4xx, unknown host)
 * - TIMEOUT: retry (ack timeout, aborted request)
 * - UNKNOWN: retry
 */

export type ErrorCategory = "TRANSIENT" | "PERMANENT" | "TIMEOUT" | "UNKNOWN"

export interface ErrorClassification {
  category: ErrorCategory
  retryable: boolean
  message: string
}

const TRANSIENT_HTTP_CODES = new Set([429, 502, 503])

const TRANSIENT_NODE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "EPIPE",
  "ETIMEDOUT",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "EAI_AGAIN",
  "UND_ERR_SOCKET",
])

/** Error thrown by the HTTP transport for a non-2xx response. */
export class TransportHttpError extends Error {
  readonly status: number

  constructor(status: number, body: string) {
    super(`transport responded ${String(status)}: ${body.slice(0, 200)}`)
    this.name = "TransportHttpError"
    this.status = status
  }
}

export function classifyHttpStatus(status: number): ErrorClassification {
  if (TRANSIENT_HTTP_CODES.has(status)) {
    return { category: "TRANSIENT", retryable: true, message: `HTTP ${String(status)} (transient)` }
  }
  if (status === 408 || status === 504) {
    return { category: "TIMEOUT", retryable: true, message: `HTTP ${String(status)} (timeout)` }
  }
  if (status >= 500) {
    return { category: "TRANSIENT", retryable: true, message: `HTTP ${String(status)} (server error)` }
  }
  return { category: "PERMANENT", retryable: false, message: `HTTP ${String(status)} (client error)` }
}

function classifyNodeError(code: string): ErrorClassification {
  if (TRANSIENT_NODE_CODES.has(code)) {
    return { category: "TRANSIENT", retryable: true, message: `Node error: ${code}` }
  }
  if (code === "ENOTFOUND") {
    return { category: "PERMANENT", retryable: false, message: `Node error: ${code}` }
  }
  return { category: "UNKNOWN", retryable: true, message: `Unknown node error: ${code}` }
}

export function classifyError(error: unknown): ErrorClassification {
  if (!(error instanceof Error)) {
    return { category: "UNKNOWN", retryable: true, message: String(error) }
  }

  if (error.name === "AbortError") {
    return { category: "TIMEOUT", retryable: true, message: "Request aborted" }
  }

  if (error instanceof TransportHttpError) {
    return classifyHttpStatus(error.status)
  }

  if ("code" in error && typeof error.code === "string") {
    return classifyNodeError(error.code)
  }

  // fetch wraps socket errors in a TypeError with the system error as cause
  if (error.cause instanceof Error && "code" in error.cause && typeof error.cause.code === "string") {
    return classifyNodeError(error.cause.code)
  }

  if (error.message.toLowerCase().includes("timeout")) {
    return { category: "TIMEOUT", retryable: true, message: error.message }
  }

  return { category: "UNKNOWN", retryable: true, message: error.message }
}
