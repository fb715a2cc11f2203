/**
 * Tracing span helpers: typed wrappers around the OpenTelemetry API with
 * one attribute vocabulary for the whole fleet service.
 */

import {
  type Attributes,
  type Context,
  type Span,
  SpanStatusCode,
  context,
  propagation,
  trace,
} from "@opentelemetry/api"

// ──────────────────────────────────────────────────
// Semantic Attribute Constants
// ──────────────────────────────────────────────────

export const AetherAttributes = {
  AGENT_ID: "aether.agent.id",
  MISSION_ID: "aether.mission.id",
  PLAN_ID: "aether.plan.id",
  EVENT_KIND: "aether.event.kind",
  LIFECYCLE_FROM: "aether.lifecycle.from",
  LIFECYCLE_TO: "aether.lifecycle.to",
  ASSIGN_STATUS: "aether.assign.status",
  DISPATCH_STATUS: "aether.dispatch.status",
  COMPACTION_SEGMENT: "aether.compaction.segment",
  JOB_ATTEMPT: "aether.job.attempt",
} as const

// ──────────────────────────────────────────────────
// Tracer
// ──────────────────────────────────────────────────

const TRACER_NAME = "aether"

function getTracer() {
  return trace.getTracer(TRACER_NAME)
}

// ──────────────────────────────────────────────────
// withSpan
// ──────────────────────────────────────────────────

/**
 * Execute an async function inside a new active span.
 *
 * The span ends OK on success; on error it records the exception, sets
 * ERROR status and re-throws.
 *
 * ```ts
 * const result = await withSpan("aether.entity.handle", { [AetherAttributes.AGENT_ID]: id }, async (span) => {
 *   // ... instrumented work
 * })
 * ```
 */
export async function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const tracer = getTracer()
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span)
      span.setStatus({ code: SpanStatusCode.OK })
      return result
    } catch (err) {
      span.setStatus({ code: SpanStatusCode.ERROR, message: err instanceof Error ? err.message : String(err) })
      if (err instanceof Error) {
        span.recordException(err)
      }
      throw err
    } finally {
      span.end()
    }
  })
}

// ──────────────────────────────────────────────────
// W3C Trace Context Propagation
// ──────────────────────────────────────────────────

export type TraceCarrier = Record<string, string>

/**
 * Inject the current trace context into a carrier. Used when enqueuing
 * worker jobs so the task continues the request's trace.
 */
export function injectTraceContext(carrier: TraceCarrier = {}): TraceCarrier {
  propagation.inject(context.active(), carrier)
  return carrier
}

export function extractTraceContext(carrier: TraceCarrier): Context {
  return propagation.extract(context.active(), carrier)
}

/** Run `fn` with the carrier's trace context active. */
export async function withExtractedContext<T>(carrier: TraceCarrier, fn: () => Promise<T>): Promise<T> {
  return context.with(extractTraceContext(carrier), fn)
}

// ──────────────────────────────────────────────────
// Utility
// ──────────────────────────────────────────────────

/** Record an event on the current active span, if any. */
export function addSpanEvent(name: string, attributes?: Attributes): void {
  const span = trace.getActiveSpan()
  if (span) {
    span.addEvent(name, attributes)
  }
}
