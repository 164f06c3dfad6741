import { Config, Effect } from "effect"

export const DEFAULT_OTLP_GRPC_ENDPOINT = "localhost:4317"
export const DEFAULT_OTLP_HTTP_ENDPOINT = "http://localhost:4318"

export type ExporterKind = "console" | "otlp"

export interface TelemetryConfig {
  readonly serviceName: string
  // gRPC endpoint of the trace collector, with or without scheme
  readonly otlpEndpoint: string
  // base URL of the OTLP/HTTP collector used by the "otlp" metric and log exporters
  readonly otlpHttpEndpoint: string
  readonly traceBatchDelayMs: number
  readonly metricIntervalMs: number
  readonly metricsExporter: ExporterKind
  readonly logsExporter: ExporterKind
}

const orDefaultWhenBlank = (fallback: string) => (value: string): string =>
  value.trim() === "" ? fallback : value.trim()

/**
 * Read the telemetry settings from the environment.
 */
export const loadTelemetryConfig = (defaultServiceName: string) =>
  Effect.gen(function* () {
    return {
      serviceName: yield* Config.string("OTEL_SERVICE_NAME").pipe(
        Config.withDefault(defaultServiceName)
      ),
      otlpEndpoint: yield* Config.string("OTEL_EXPORTER_OTLP_ENDPOINT").pipe(
        Config.withDefault(DEFAULT_OTLP_GRPC_ENDPOINT),
        Config.map(orDefaultWhenBlank(DEFAULT_OTLP_GRPC_ENDPOINT))
      ),
      otlpHttpEndpoint: yield* Config.string("OTEL_EXPORTER_OTLP_HTTP_ENDPOINT").pipe(
        Config.withDefault(DEFAULT_OTLP_HTTP_ENDPOINT),
        Config.map(orDefaultWhenBlank(DEFAULT_OTLP_HTTP_ENDPOINT))
      ),
      traceBatchDelayMs: yield* Config.number("OTEL_BSP_SCHEDULE_DELAY").pipe(
        Config.withDefault(1000)
      ),
      metricIntervalMs: yield* Config.number("OTEL_METRIC_EXPORT_INTERVAL").pipe(
        Config.withDefault(3000)
      ),
      metricsExporter: yield* Config.literal("console", "otlp")("OTEL_METRICS_EXPORTER").pipe(
        Config.withDefault("console" as const)
      ),
      logsExporter: yield* Config.literal("console", "otlp")("OTEL_LOGS_EXPORTER").pipe(
        Config.withDefault("console" as const)
      )
    } satisfies TelemetryConfig
  })
