/**
 * Trace context carried by fibers.
 *
 * Cancellation and deadlines come from the fiber itself; the causal identity
 * (span context and baggage) rides along in a FiberRef so that forked fibers
 * inherit it and a nested scope can replace it without touching its parent.
 */

import { type Context as OtelContext, propagation, ROOT_CONTEXT } from "@opentelemetry/api"
import { Effect, FiberRef } from "effect"

export const CurrentTraceContext: FiberRef.FiberRef<OtelContext> = FiberRef.unsafeMake(ROOT_CONTEXT)

export const currentTraceContext: Effect.Effect<OtelContext> = FiberRef.get(CurrentTraceContext)

/**
 * Run an effect with the given context as its parent trace context.
 */
export const withParentContext = (context: OtelContext) =>
  <A, E, R>(self: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    Effect.locally(self, CurrentTraceContext, context)

/**
 * Run an effect with extra baggage entries added to the current context.
 * Entries already present keep their value unless overridden here.
 */
export const withBaggage = (entries: Readonly<Record<string, string>>) =>
  <A, E, R>(self: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    Effect.flatMap(currentTraceContext, (context) => {
      const existing = propagation.getBaggage(context) ?? propagation.createBaggage()
      const baggage = Object.entries(entries).reduce(
        (acc, [key, value]) => acc.setEntry(key, { value }),
        existing
      )
      return Effect.locally(self, CurrentTraceContext, propagation.setBaggage(context, baggage))
    })

/**
 * Baggage entries of the current context as a plain record.
 */
export const currentBaggage: Effect.Effect<Record<string, string>> = Effect.map(
  currentTraceContext,
  (context) => {
    const baggage = propagation.getBaggage(context)
    if (!baggage) {
      return {}
    }
    return Object.fromEntries(baggage.getAllEntries().map(([key, entry]) => [key, entry.value]))
  }
)
