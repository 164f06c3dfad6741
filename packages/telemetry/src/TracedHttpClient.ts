/**
 * Outgoing propagation: every request made through the client carries the
 * calling fiber's traceparent, tracestate and baggage headers.
 */

import { HttpClient, HttpClientRequest } from "@effect/platform"
import { NodeHttpClient } from "@effect/platform-node"
import { Effect, Layer } from "effect"
import { Telemetry, type TelemetryHandle } from "./Telemetry.js"
import { currentTraceContext } from "./TraceContext.js"

// An empty context injects nothing and the request goes out as it was
export const traceHttpClient = (
  client: HttpClient.HttpClient,
  telemetry: TelemetryHandle
): HttpClient.HttpClient =>
  HttpClient.mapRequestEffect(client, (request) =>
    Effect.map(currentTraceContext, (context) => {
      const carrier: Record<string, string> = {}
      telemetry.propagator.inject(context, carrier, {
        set: (target, key, value) => {
          target[key] = value
        }
      })
      return HttpClientRequest.setHeaders(request, carrier)
    })
  ).pipe(
    // The platform client would otherwise overwrite traceparent with its own span
    HttpClient.transform((effect) => HttpClient.withTracerPropagation(effect, false))
  )

/** Node's HTTP client, wrapped with `traceHttpClient` for the handle in context. */
export const TracedHttpClientLive: Layer.Layer<HttpClient.HttpClient, never, Telemetry> = Layer.effect(
  HttpClient.HttpClient,
  Effect.gen(function* () {
    const baseClient = yield* HttpClient.HttpClient
    const telemetry = yield* Telemetry
    return traceHttpClient(baseClient, telemetry)
  })
).pipe(Layer.provide(NodeHttpClient.layer))
