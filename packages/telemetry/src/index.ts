/**
 * @trace-chain/telemetry
 *
 * Telemetry pipelines, shutdown coordination and trace context propagation
 * shared by the services of the chain.
 */

// Errors
export {
  TeardownError,
  TelemetryBuildError,
  TelemetryShutdownError,
  type PipelineKind
} from "./errors.js"

// Ordered, run-once teardown of the pipelines
export { makeShutdownRegistry, type ShutdownRegistry, type Teardown } from "./ShutdownRegistry.js"

// Settings read from the environment
export {
  loadTelemetryConfig,
  DEFAULT_OTLP_GRPC_ENDPOINT,
  DEFAULT_OTLP_HTTP_ENDPOINT,
  type ExporterKind,
  type TelemetryConfig
} from "./TelemetryConfig.js"

// Trace, metric and log pipelines
export {
  buildTelemetryPipeline,
  defaultFactories,
  grpcUrl,
  type LogPipeline,
  type MetricPipeline,
  type PipelineFactories,
  type TelemetryPipeline,
  type TracePipeline
} from "./TelemetryPipeline.js"

// Handle injected into the code that records telemetry
export { Telemetry, layerTelemetry, makePropagator, type TelemetryHandle } from "./Telemetry.js"

// Trace context carried by fibers
export {
  CurrentTraceContext,
  currentBaggage,
  currentTraceContext,
  withBaggage,
  withParentContext
} from "./TraceContext.js"

// Spans opened as scoped resources
export { useSpan } from "./Span.js"

// Server middleware for extracting incoming trace context
export { headersGetter, withTraceContext } from "./TraceContextMiddleware.js"

// HTTP client layer with automatic trace header injection
export { TracedHttpClientLive, traceHttpClient } from "./TracedHttpClient.js"

// Effect logs forwarded to the log pipeline
export { makeOtelLogger, OtelLoggerLive } from "./OtelLogger.js"
