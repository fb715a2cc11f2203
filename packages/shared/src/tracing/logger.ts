/**
 * Structured JSON logger with automatic trace context inclusion.
 *
 * Every entry carries traceId and spanId from the active OTel span, if any.
 * Error values among the fields are written as `{ type, message, cause? }`.
 */

import { trace } from "@opentelemetry/api"

export type LogLevel = "debug" | "info" | "warn" | "error"

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_ORDER
}

/** Receives one serialized entry per call, without the trailing newline. */
export type LogSink = (level: LogLevel, line: string) => void

/** warn and error go to stderr, the rest to stdout. */
export const stdioSink: LogSink = (level, line) => {
  const out = level === "error" || level === "warn" ? process.stderr : process.stdout
  out.write(line + "\n")
}

export interface SerializedError {
  type: string
  message: string
  cause?: unknown
}

export function serializeError(err: Error): SerializedError {
  const serialized: SerializedError = { type: err.name, message: err.message }
  if (err.cause !== undefined) {
    serialized.cause = err.cause instanceof Error ? serializeError(err.cause) : err.cause
  }
  return serialized
}

export interface TracingLoggerOptions {
  /** Minimum log level to emit. Defaults to "info". */
  level?: LogLevel
  /** Service name to include in every log line. */
  serviceName?: string
  /** Fields added to every entry, e.g. the agent id of an actor. */
  bindings?: Record<string, unknown>
  /** Defaults to `stdioSink`. */
  sink?: LogSink
}

export class TracingLogger {
  private readonly level: LogLevel
  private readonly minLevel: number
  private readonly serviceName: string
  private readonly bindings: Record<string, unknown>
  private readonly sink: LogSink

  constructor(options?: TracingLoggerOptions) {
    this.level = options?.level ?? "info"
    this.minLevel = LOG_LEVEL_ORDER[this.level]
    this.serviceName = options?.serviceName ?? "aether"
    this.bindings = options?.bindings ?? {}
    this.sink = options?.sink ?? stdioSink
  }

  /** Logger sharing level and service, with extra bound fields. */
  child(bindings: Record<string, unknown>): TracingLogger {
    return new TracingLogger({
      level: this.level,
      serviceName: this.serviceName,
      bindings: { ...this.bindings, ...bindings },
      sink: this.sink,
    })
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this.log("debug", message, extra)
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this.log("info", message, extra)
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this.log("warn", message, extra)
  }

  error(message: string, extra?: Record<string, unknown>): void {
    this.log("error", message, extra)
  }

  private log(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
    if (LOG_LEVEL_ORDER[level] < this.minLevel) return

    const entry: Record<string, unknown> = {
      level,
      time: new Date().toISOString(),
      service: this.serviceName,
      msg: message,
      ...this.bindings,
    }

    const span = trace.getActiveSpan()
    if (span) {
      const ctx = span.spanContext()
      entry.traceId = ctx.traceId
      entry.spanId = ctx.spanId
    }

    if (extra) {
      for (const [key, value] of Object.entries(extra)) {
        entry[key] = value instanceof Error ? serializeError(value) : value
      }
    }

    this.sink(level, JSON.stringify(entry))
  }
}
