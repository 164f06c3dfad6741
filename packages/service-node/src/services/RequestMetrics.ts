import { Telemetry } from "@trace-chain/telemetry"
import { Context, Effect, Layer } from "effect"

export interface CompletedRequest {
  readonly method: string
  readonly route: string
  readonly statusCode: number
  readonly durationMs: number
}

export class RequestMetrics extends Context.Tag("RequestMetrics")<
  RequestMetrics,
  {
    readonly record: (request: CompletedRequest) => Effect.Effect<void>
  }
>() {}

export const RequestMetricsLive = Layer.effect(
  RequestMetrics,
  Effect.map(Telemetry, ({ meter }) => {
    const requests = meter.createCounter("http.server.requests", {
      description: "Number of HTTP requests served",
      unit: "{request}"
    })
    const duration = meter.createHistogram("http.server.request.duration", {
      description: "Duration of HTTP server requests",
      unit: "s"
    })

    return {
      record: (request) =>
        Effect.sync(() => {
          const attributes = {
            "http.request.method": request.method,
            "http.route": request.route,
            "http.response.status_code": request.statusCode
          }
          requests.add(1, attributes)
          duration.record(request.durationMs / 1000, attributes)
        })
    }
  })
)
