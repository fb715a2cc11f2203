export {
  isLogLevel,
  type LogLevel,
  type LogSink,
  serializeError,
  type SerializedError,
  stdioSink,
  TracingLogger,
  type TracingLoggerOptions,
} from "./logger.js"
export {
  createSampler,
  DEFAULT_TRACING_CONFIG,
  type ExporterType,
  initTracing,
  isTracingActive,
  shutdownTracing,
  type TracingConfig,
  tracingResourceAttributes,
} from "./sdk.js"
export {
  addSpanEvent,
  AetherAttributes,
  extractTraceContext,
  injectTraceContext,
  type TraceCarrier,
  withExtractedContext,
  withSpan,
} from "./spans.js"
