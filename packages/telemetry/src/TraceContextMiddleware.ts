/**
 * Incoming propagation for HTTP handlers.
 */

import { HttpServerRequest } from "@effect/platform"
import type { Headers } from "@effect/platform"
import { ROOT_CONTEXT, type TextMapGetter } from "@opentelemetry/api"
import { Effect } from "effect"
import { Telemetry } from "./Telemetry.js"
import { withParentContext } from "./TraceContext.js"

// Platform headers are stored with lower-cased keys
export const headersGetter: TextMapGetter<Headers.Headers> = {
  keys: (carrier) => Object.keys(carrier),
  get: (carrier, key) => carrier[key.toLowerCase()]
}

/**
 * Runs `handler` with the context extracted from the request's headers as its
 * parent. A valid traceparent makes the handler's spans children of the
 * caller's span; baggage comes along with it. Without one, or with a
 * malformed one, the handler starts a new trace.
 *
 * @example
 * ```ts
 * const handleRoot = withTraceContext(
 *   useSpan("GET /", () => respond, { kind: SpanKind.SERVER })
 * )
 * ```
 */
export const withTraceContext = <A, E, R>(
  handler: Effect.Effect<A, E, R>
): Effect.Effect<A, E, R | Telemetry | HttpServerRequest.HttpServerRequest> =>
  Effect.gen(function* () {
    const request = yield* HttpServerRequest.HttpServerRequest
    const { propagator } = yield* Telemetry
    const extracted = propagator.extract(ROOT_CONTEXT, request.headers, headersGetter)

    return yield* withParentContext(extracted)(handler)
  })
