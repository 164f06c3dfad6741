import { HttpServerRequest, type HttpServerResponse } from "@effect/platform"
import { SpanKind, SpanStatusCode } from "@opentelemetry/api"
import { type Telemetry, useSpan, withTraceContext } from "@trace-chain/telemetry"
import { Clock, Effect, Exit } from "effect"
import { RequestMetrics } from "../services/RequestMetrics.js"

export const pathOf = (url: string): string => new URL(url, "http://localhost").pathname

/**
 * Serve a route under a SERVER span that continues the caller's trace, and
 * count the request with its duration once the response is known.
 */
export const instrumentRoute = (route: string) =>
  <E, R>(
    handler: Effect.Effect<HttpServerResponse.HttpServerResponse, E, R>
  ): Effect.Effect<
    HttpServerResponse.HttpServerResponse,
    E,
    R | Telemetry | RequestMetrics | HttpServerRequest.HttpServerRequest
  > =>
    Effect.gen(function* () {
      const request = yield* HttpServerRequest.HttpServerRequest
      const metrics = yield* RequestMetrics
      const startedAt = yield* Clock.currentTimeMillis

      const served = useSpan(
        `${request.method} ${route}`,
        (span) =>
          Effect.tap(handler, (response) =>
            Effect.sync(() => {
              span.setAttribute("http.response.status_code", response.status)
              if (response.status >= 500) {
                span.setStatus({ code: SpanStatusCode.ERROR })
              }
            })
          ),
        {
          kind: SpanKind.SERVER,
          attributes: {
            "http.request.method": request.method,
            "http.route": route,
            "url.path": pathOf(request.url)
          }
        }
      )

      return yield* withTraceContext(served).pipe(
        Effect.onExit((exit) =>
          Effect.flatMap(Clock.currentTimeMillis, (finishedAt) =>
            metrics.record({
              method: request.method,
              route,
              statusCode: Exit.isSuccess(exit) ? exit.value.status : 500,
              durationMs: finishedAt - startedAt
            })
          )
        )
      )
    })
