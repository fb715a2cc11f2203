/**
 * OpenTelemetry SDK initialization.
 *
 * Call `initTracing()` once before the application starts and
 * `shutdownTracing()` during graceful shutdown to flush buffered spans.
 * While no SDK runs the OTel API falls back to no-op implementations.
 */

import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http"
import { FastifyInstrumentation } from "@opentelemetry/instrumentation-fastify"
import { HttpInstrumentation } from "@opentelemetry/instrumentation-http"
import { resourceFromAttributes } from "@opentelemetry/resources"
import { NodeSDK } from "@opentelemetry/sdk-node"
import {
  AlwaysOffSampler,
  AlwaysOnSampler,
  BatchSpanProcessor,
  ConsoleSpanExporter,
  ParentBasedSampler,
  type Sampler,
  SimpleSpanProcessor,
  type SpanProcessor,
  TraceIdRatioBasedSampler,
} from "@opentelemetry/sdk-trace-node"
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from "@opentelemetry/semantic-conventions"

export type ExporterType = "otlp" | "console" | "none"

export interface TracingConfig {
  enabled: boolean
  /** OTLP/HTTP collector base URL; spans go to `<endpoint>/v1/traces`. */
  endpoint: string
  /** Fraction of root traces kept, 0.0–1.0. */
  sampleRate: number
  serviceName: string
  serviceVersion: string
  /** Reported as `deployment.environment.name`. */
  environment: string
  exporterType: ExporterType
}

export const DEFAULT_TRACING_CONFIG: TracingConfig = {
  enabled: true,
  endpoint: "http://localhost:4318",
  sampleRate: 1.0,
  serviceName: "aether-control-plane",
  serviceVersion: "0.1.0",
  environment: "development",
  exporterType: "otlp",
}

const ATTR_DEPLOYMENT_ENVIRONMENT = "deployment.environment.name"

let sdk: NodeSDK | undefined

export function tracingResourceAttributes(config: TracingConfig): Record<string, string> {
  return {
    [ATTR_SERVICE_NAME]: config.serviceName,
    [ATTR_SERVICE_VERSION]: config.serviceVersion,
    [ATTR_DEPLOYMENT_ENVIRONMENT]: config.environment,
  }
}

/** Root traces are kept at `sampleRate`; child spans follow their parent. */
export function createSampler(sampleRate: number): Sampler {
  if (sampleRate >= 1) return new AlwaysOnSampler()
  if (sampleRate <= 0) return new AlwaysOffSampler()
  return new ParentBasedSampler({ root: new TraceIdRatioBasedSampler(sampleRate) })
}

function createSpanProcessor(config: TracingConfig): SpanProcessor {
  if (config.exporterType === "console") {
    return new SimpleSpanProcessor(new ConsoleSpanExporter())
  }
  return new BatchSpanProcessor(new OTLPTraceExporter({ url: `${config.endpoint}/v1/traces` }))
}

/**
 * Start the SDK. Returns false when tracing is disabled; a second call
 * while running is ignored and returns true.
 */
export function initTracing(config: Partial<TracingConfig> = {}): boolean {
  if (sdk) return true

  const resolved: TracingConfig = { ...DEFAULT_TRACING_CONFIG, ...config }
  if (!resolved.enabled || resolved.exporterType === "none") {
    return false
  }

  sdk = new NodeSDK({
    resource: resourceFromAttributes(tracingResourceAttributes(resolved)),
    sampler: createSampler(resolved.sampleRate),
    spanProcessors: [createSpanProcessor(resolved)],
    instrumentations: [new HttpInstrumentation(), new FastifyInstrumentation()],
  })
  sdk.start()
  return true
}

export function isTracingActive(): boolean {
  return sdk !== undefined
}

/** Flush buffered spans and stop the SDK. */
export async function shutdownTracing(): Promise<void> {
  if (!sdk) return
  try {
    await sdk.shutdown()
  } finally {
    sdk = undefined
  }
}
