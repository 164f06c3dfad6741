/**
 * Shutdown Registry
 *
 * Ordered set of teardown effects shared by the telemetry pipelines of one
 * process. Shutting down runs every teardown once, in registration order, and
 * reports all failures together.
 */

import { Cause, Effect, Exit, Ref } from "effect"
import { makeShutdownError, makeTeardownError, type TeardownError, type TelemetryShutdownError } from "./errors.js"

export interface Teardown {
  readonly name: string
  readonly run: Effect.Effect<void, unknown>
}

export interface ShutdownRegistry {
  /**
   * Append a teardown. It runs after every teardown registered before it.
   */
  readonly register: (name: string, run: Effect.Effect<void, unknown>) => Effect.Effect<void>

  /**
   * Run and forget all registered teardowns.
   * A teardown that fails does not prevent the ones after it from running.
   * Calling this again once the registry is empty succeeds without doing anything.
   */
  readonly shutdown: Effect.Effect<void, TelemetryShutdownError>

  readonly size: Effect.Effect<number>
}

const runTeardown = (teardown: Teardown): Effect.Effect<ReadonlyArray<TeardownError>> =>
  Effect.exit(teardown.run).pipe(
    Effect.map((exit) =>
      Exit.isSuccess(exit) ? [] : [makeTeardownError(teardown.name, Cause.squash(exit.cause))]
    )
  )

export const makeShutdownRegistry: Effect.Effect<ShutdownRegistry> = Effect.gen(function* () {
  const teardowns = yield* Ref.make<ReadonlyArray<Teardown>>([])

  const shutdown = Effect.gen(function* () {
    // Taking the sequence empties it, so a concurrent or later call sees nothing to run
    const pending = yield* Ref.getAndSet(teardowns, [])
    if (pending.length === 0) {
      return
    }

    const failures = yield* Effect.forEach(pending, runTeardown).pipe(
      Effect.map((results) => results.flat())
    )

    if (failures.length > 0) {
      return yield* Effect.fail(makeShutdownError(failures))
    }
  })

  return {
    register: (name, run) => Ref.update(teardowns, (current) => [...current, { name, run }]),
    shutdown,
    size: Ref.get(teardowns).pipe(Effect.map((current) => current.length))
  }
})
