/**
 * In-memory telemetry for tests: spans, metrics and log records stay in the
 * process and can be inspected after the code under test ran.
 */

import { Resource } from "@opentelemetry/resources"
import {
  InMemoryLogRecordExporter,
  LoggerProvider,
  SimpleLogRecordProcessor
} from "@opentelemetry/sdk-logs"
import {
  AggregationTemporality,
  InMemoryMetricExporter,
  MeterProvider,
  PeriodicExportingMetricReader
} from "@opentelemetry/sdk-metrics"
import { InMemorySpanExporter, NodeTracerProvider, SimpleSpanProcessor } from "@opentelemetry/sdk-trace-node"
import { ATTR_SERVICE_NAME } from "@opentelemetry/semantic-conventions"
import { makePropagator, type TelemetryHandle } from "./Telemetry.js"

export interface InMemoryTelemetry {
  readonly telemetry: TelemetryHandle
  readonly spans: InMemorySpanExporter
  readonly metrics: InMemoryMetricExporter
  readonly logs: InMemoryLogRecordExporter
  /**
   * Push the current metric values to `metrics`.
   */
  readonly collectMetrics: () => Promise<void>
  readonly shutdown: () => Promise<void>
}

export const makeInMemoryTelemetry = (serviceName = "test-service"): InMemoryTelemetry => {
  const resource = new Resource({ [ATTR_SERVICE_NAME]: serviceName })

  const spans = new InMemorySpanExporter()
  const tracerProvider = new NodeTracerProvider({
    resource,
    spanProcessors: [new SimpleSpanProcessor(spans)]
  })

  const metrics = new InMemoryMetricExporter(AggregationTemporality.CUMULATIVE)
  const reader = new PeriodicExportingMetricReader({
    exporter: metrics,
    exportIntervalMillis: 60_000,
    exportTimeoutMillis: 30_000
  })
  const meterProvider = new MeterProvider({ resource, readers: [reader] })

  const logs = new InMemoryLogRecordExporter()
  const loggerProvider = new LoggerProvider({ resource })
  loggerProvider.addLogRecordProcessor(new SimpleLogRecordProcessor(logs))

  return {
    telemetry: {
      serviceName,
      tracer: tracerProvider.getTracer(serviceName),
      meter: meterProvider.getMeter(serviceName),
      logger: loggerProvider.getLogger(serviceName),
      propagator: makePropagator()
    },
    spans,
    metrics,
    logs,
    collectMetrics: () => reader.forceFlush(),
    shutdown: async () => {
      await tracerProvider.shutdown()
      await meterProvider.shutdown()
      await loggerProvider.shutdown()
    }
  }
}
