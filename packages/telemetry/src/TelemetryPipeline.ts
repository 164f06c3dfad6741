/**
 * Telemetry Pipeline Builder
 *
 * Builds the trace, metric and log pipelines of a service. Each pipeline owns a
 * batching (or periodic) processor in front of its exporter and registers its
 * own shutdown, so the caller gets back one handle and one shutdown effect.
 */

import type { Meter, Tracer } from "@opentelemetry/api"
import type { Logger } from "@opentelemetry/api-logs"
import { OTLPLogExporter } from "@opentelemetry/exporter-logs-otlp-http"
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http"
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-grpc"
import { Resource } from "@opentelemetry/resources"
import {
  BatchLogRecordProcessor,
  ConsoleLogRecordExporter,
  LoggerProvider,
  type LogRecordExporter
} from "@opentelemetry/sdk-logs"
import {
  ConsoleMetricExporter,
  MeterProvider,
  PeriodicExportingMetricReader,
  type PushMetricExporter
} from "@opentelemetry/sdk-metrics"
import { BatchSpanProcessor, NodeTracerProvider } from "@opentelemetry/sdk-trace-node"
import { ATTR_SERVICE_NAME } from "@opentelemetry/semantic-conventions"
import { Effect } from "effect"
import { describeCause, type PipelineKind, TelemetryBuildError, type TelemetryShutdownError } from "./errors.js"
import { makeShutdownRegistry, type ShutdownRegistry } from "./ShutdownRegistry.js"
import { makePropagator, type TelemetryHandle } from "./Telemetry.js"
import { DEFAULT_OTLP_GRPC_ENDPOINT, type TelemetryConfig } from "./TelemetryConfig.js"

export interface TracePipeline {
  readonly tracer: Tracer
  readonly shutdown: () => Promise<void>
}

export interface MetricPipeline {
  readonly meter: Meter
  readonly shutdown: () => Promise<void>
}

export interface LogPipeline {
  readonly logger: Logger
  readonly shutdown: () => Promise<void>
}

/**
 * Constructors for the three pipelines. A constructor signals failure by throwing.
 */
export interface PipelineFactories {
  readonly traces: (config: TelemetryConfig, resource: Resource) => TracePipeline
  readonly metrics: (config: TelemetryConfig, resource: Resource) => MetricPipeline
  readonly logs: (config: TelemetryConfig, resource: Resource) => LogPipeline
}

export interface TelemetryPipeline {
  readonly telemetry: TelemetryHandle
  /**
   * Shut down every pipeline that was built. Safe to run more than once.
   */
  readonly shutdown: Effect.Effect<void, TelemetryShutdownError>
}

// The gRPC exporter dials plaintext when given an http:// URL
export const grpcUrl = (endpoint: string): string => {
  const target = endpoint.trim() === "" ? DEFAULT_OTLP_GRPC_ENDPOINT : endpoint.trim()
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(target) ? target : `http://${target}`
}

const otlpHttpUrl = (config: TelemetryConfig, signal: "metrics" | "logs"): string =>
  `${config.otlpHttpEndpoint.replace(/\/+$/, "")}/v1/${signal}`

export const defaultFactories: PipelineFactories = {
  traces: (config, resource) => {
    const exporter = new OTLPTraceExporter({ url: grpcUrl(config.otlpEndpoint) })
    const provider = new NodeTracerProvider({
      resource,
      spanProcessors: [
        new BatchSpanProcessor(exporter, { scheduledDelayMillis: config.traceBatchDelayMs })
      ]
    })
    return {
      tracer: provider.getTracer(config.serviceName),
      shutdown: () => provider.shutdown()
    }
  },

  metrics: (config, resource) => {
    const exporter: PushMetricExporter = config.metricsExporter === "otlp"
      ? new OTLPMetricExporter({ url: otlpHttpUrl(config, "metrics") })
      : new ConsoleMetricExporter()
    const provider = new MeterProvider({
      resource,
      readers: [
        new PeriodicExportingMetricReader({
          exporter,
          exportIntervalMillis: config.metricIntervalMs,
          // the reader rejects a timeout longer than its interval
          exportTimeoutMillis: Math.min(config.metricIntervalMs, 30_000)
        })
      ]
    })
    return {
      meter: provider.getMeter(config.serviceName),
      shutdown: () => provider.shutdown()
    }
  },

  logs: (config, resource) => {
    const exporter: LogRecordExporter = config.logsExporter === "otlp"
      ? new OTLPLogExporter({ url: otlpHttpUrl(config, "logs") })
      : new ConsoleLogRecordExporter()
    const provider = new LoggerProvider({ resource })
    provider.addLogRecordProcessor(new BatchLogRecordProcessor(exporter))
    return {
      logger: provider.getLogger(config.serviceName),
      shutdown: () => provider.shutdown()
    }
  }
}

const construct = <A extends { readonly shutdown: () => Promise<void> }>(
  pipeline: Exclude<PipelineKind, "resource">,
  registry: ShutdownRegistry,
  build: () => A
): Effect.Effect<A, TelemetryBuildError> =>
  Effect.try({
    try: build,
    catch: (cause) =>
      new TelemetryBuildError({
        pipeline,
        cause,
        message: `failed to build ${pipeline} pipeline: ${describeCause(cause)}`
      })
  }).pipe(
    Effect.tap((built) =>
      registry.register(
        `${pipeline} pipeline`,
        Effect.tryPromise({ try: () => built.shutdown(), catch: (cause) => cause })
      )
    )
  )

/**
 * Build the trace, metric and log pipelines for a service.
 *
 * When a pipeline fails to build, the ones built before it are shut down
 * before the error is returned. A teardown failure at that point is attached
 * to the returned error.
 */
export const buildTelemetryPipeline = (
  config: TelemetryConfig,
  factories: PipelineFactories = defaultFactories
): Effect.Effect<TelemetryPipeline, TelemetryBuildError> =>
  Effect.gen(function* () {
    if (config.serviceName.trim() === "") {
      return yield* Effect.fail(
        new TelemetryBuildError({
          pipeline: "resource",
          cause: config.serviceName,
          message: "service name must not be empty"
        })
      )
    }

    const registry = yield* makeShutdownRegistry
    const resource = new Resource({ [ATTR_SERVICE_NAME]: config.serviceName })

    const pipelines = yield* Effect.gen(function* () {
      const traces = yield* construct("trace", registry, () => factories.traces(config, resource))
      const metrics = yield* construct("metric", registry, () => factories.metrics(config, resource))
      const logs = yield* construct("log", registry, () => factories.logs(config, resource))
      return { traces, metrics, logs }
    }).pipe(
      Effect.catchAll((error) =>
        registry.shutdown.pipe(
          Effect.matchEffect({
            onFailure: (teardown) =>
              Effect.fail(
                new TelemetryBuildError({
                  pipeline: error.pipeline,
                  cause: error.cause,
                  message: `${error.message}\n${teardown.message}`,
                  teardown
                })
              ),
            onSuccess: () => Effect.fail(error)
          })
        )
      )
    )

    yield* Effect.logInfo("Telemetry configured", {
      serviceName: config.serviceName,
      traceEndpoint: grpcUrl(config.otlpEndpoint),
      metricsExporter: config.metricsExporter,
      logsExporter: config.logsExporter
    })

    return {
      telemetry: {
        serviceName: config.serviceName,
        tracer: pipelines.traces.tracer,
        meter: pipelines.metrics.meter,
        logger: pipelines.logs.logger,
        propagator: makePropagator()
      },
      shutdown: registry.shutdown
    }
  })
