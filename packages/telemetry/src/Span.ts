import { type Span, type SpanOptions, SpanStatusCode, trace } from "@opentelemetry/api"
import { Cause, Effect, Exit } from "effect"
import { describeCause } from "./errors.js"
import { CurrentTraceContext, currentTraceContext } from "./TraceContext.js"
import { Telemetry } from "./Telemetry.js"

const recordFailure = <E>(span: Span, cause: Cause.Cause<E>): void => {
  if (Cause.isInterruptedOnly(cause)) {
    span.setAttribute("span.interrupted", true)
    return
  }
  const error = Cause.squash(cause)
  span.recordException(error instanceof Error ? error : describeCause(error))
  span.setStatus({ code: SpanStatusCode.ERROR, message: describeCause(error) })
}

/**
 * Open a span as a scoped resource around `body`.
 *
 * The span is a child of the fiber's current trace context and becomes the
 * current context while `body` runs. It is ended exactly once when `body`
 * exits, whether it succeeds, fails, dies or is interrupted; a failure is
 * recorded on the span before it ends.
 *
 * @example
 * ```ts
 * const handler = useSpan("handleRoot", (span) =>
 *   Effect.gen(function* () {
 *     span.setAttribute("http.method", "GET")
 *     // work here runs under the span
 *   })
 * )
 * ```
 */
export const useSpan = <A, E, R>(
  name: string,
  body: (span: Span) => Effect.Effect<A, E, R>,
  options: SpanOptions = {}
): Effect.Effect<A, E, R | Telemetry> =>
  Effect.gen(function* () {
    const { tracer } = yield* Telemetry
    const parent = yield* currentTraceContext

    return yield* Effect.acquireUseRelease(
      Effect.sync(() => tracer.startSpan(name, options, parent)),
      (span) => Effect.locally(body(span), CurrentTraceContext, trace.setSpan(parent, span)),
      (span, exit) =>
        Effect.sync(() => {
          if (Exit.isFailure(exit)) {
            recordFailure(span, exit.cause)
          }
          span.end()
        })
    )
  })
