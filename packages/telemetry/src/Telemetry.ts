import type { Meter, TextMapPropagator, Tracer } from "@opentelemetry/api"
import type { Logger } from "@opentelemetry/api-logs"
import { CompositePropagator, W3CBaggagePropagator, W3CTraceContextPropagator } from "@opentelemetry/core"
import { Context, Layer } from "effect"

/**
 * Handle on the tracer, meter and logger of one process, passed to the code
 * that records telemetry instead of being installed globally.
 */
export interface TelemetryHandle {
  readonly serviceName: string
  readonly tracer: Tracer
  readonly meter: Meter
  readonly logger: Logger
  readonly propagator: TextMapPropagator
}

export class Telemetry extends Context.Tag("Telemetry")<Telemetry, TelemetryHandle>() {}

/**
 * W3C trace-context plus W3C baggage. Each propagator only touches its own
 * header, so a carrier missing either one still extracts the other.
 */
export const makePropagator = (): TextMapPropagator =>
  new CompositePropagator({
    propagators: [new W3CTraceContextPropagator(), new W3CBaggagePropagator()]
  })

export const layerTelemetry = (handle: TelemetryHandle): Layer.Layer<Telemetry> =>
  Layer.succeed(Telemetry, handle)
