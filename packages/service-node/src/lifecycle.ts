/**
 * Process Lifecycle
 *
 * Starting → Listening → Draining | Failed → Stopped
 *
 * Telemetry is built before anything listens and shut down after the listener
 * is gone, so every span a request produced is flushed on the way out.
 */

import {
  layerTelemetry,
  OtelLoggerLive,
  type TelemetryBuildError,
  type TelemetryHandle,
  type TelemetryPipeline,
  type TelemetryShutdownError
} from "@trace-chain/telemetry"
import { Cause, Deferred, Duration, Effect, Either, Exit, Fiber } from "effect"
import {
  makeDrainTimeoutError,
  makeLifecycleError,
  makeListenerError,
  type LifecycleError
} from "./domain/errors.js"
import { makeDrainGate, type DrainGateService } from "./services/DrainGate.js"

export type LifecycleState = "Starting" | "Listening" | "Draining" | "Failed" | "Stopped"

export interface LifecycleOptions<E> {
  readonly serviceName: string
  readonly drainTimeoutMs: number
  readonly startTelemetry: Effect.Effect<TelemetryPipeline, TelemetryBuildError>
  /**
   * Serve until interrupted. Returning or failing on its own counts as a listener failure.
   */
  readonly listen: (telemetry: TelemetryHandle, gate: DrainGateService) => Effect.Effect<unknown, E>
  /**
   * Completes when the process was asked to stop.
   */
  readonly interrupted: Effect.Effect<void>
  readonly onTransition?: (state: LifecycleState) => void
}

type Outcome<E> =
  | { readonly _tag: "ListenerExited"; readonly exit: Exit.Exit<unknown, E> }
  | { readonly _tag: "Interrupted" }

const listenerFailure = <E>(exit: Exit.Exit<unknown, E>): unknown =>
  Exit.isFailure(exit) ? Cause.squash(exit.cause) : "listener returned before shutdown was requested"

type LifecycleErrorCause = LifecycleError["errors"][number]

// Listening until the listener stops or the process is interrupted, then draining and stopping
const superviseListener = <E>(
  options: LifecycleOptions<E>,
  enter: (state: LifecycleState) => Effect.Effect<void>,
  gate: DrainGateService,
  listener: Fiber.RuntimeFiber<unknown, E>,
  shutdownTelemetry: Effect.Effect<void, TelemetryShutdownError>
) =>
  Effect.gen(function* () {
    yield* enter("Listening")

    const outcome: Outcome<E> = yield* Effect.race(
      Effect.map(Fiber.await(listener), (exit): Outcome<E> => ({ _tag: "ListenerExited", exit })),
      Effect.as(options.interrupted, { _tag: "Interrupted" } satisfies Outcome<E>)
    )

    const errors: Array<LifecycleErrorCause> = []

    if (outcome._tag === "ListenerExited") {
      const error = makeListenerError(listenerFailure(outcome.exit))
      yield* Effect.logError("Listener stopped", { error: error.message })
      yield* enter("Failed")
      errors.push(error)
    } else {
      yield* enter("Draining")
      const drained = yield* gate.drain.pipe(
        Effect.timeoutFail({
          duration: Duration.millis(options.drainTimeoutMs),
          onTimeout: () => makeDrainTimeoutError(options.drainTimeoutMs)
        }),
        Effect.either
      )
      if (Either.isLeft(drained)) {
        yield* Effect.logWarning("Drain timed out", { inFlight: yield* gate.inFlight })
        errors.push(drained.left)
      }
      // Interrupting the listener closes the server; only a failure while closing is an error
      const closed = yield* Fiber.interrupt(listener)
      if (Exit.isFailure(closed) && !Cause.isInterruptedOnly(closed.cause)) {
        const error = makeListenerError(Cause.squash(closed.cause))
        yield* Effect.logError("Listener failed to close", { error: error.message })
        errors.push(error)
      }
    }

    yield* enter("Stopped")
    const shutdown = yield* Effect.either(shutdownTelemetry)
    if (Either.isLeft(shutdown)) {
      yield* Effect.logError("Telemetry shutdown failed", { error: shutdown.left.message })
      errors.push(shutdown.left)
    }

    if (errors.length > 0) {
      return yield* Effect.fail(makeLifecycleError(errors))
    }
  })

export const runLifecycle = <E>(options: LifecycleOptions<E>): Effect.Effect<void, LifecycleError> =>
  Effect.gen(function* () {
    const enter = (state: LifecycleState) =>
      Effect.sync(() => options.onTransition?.(state)).pipe(
        Effect.zipRight(Effect.logInfo("Lifecycle transition", { service: options.serviceName, state }))
      )

    yield* enter("Starting")
    const started = yield* Effect.either(options.startTelemetry)
    if (Either.isLeft(started)) {
      yield* Effect.logError("Telemetry setup failed", { error: started.left.message })
      yield* enter("Failed")
      yield* enter("Stopped")
      return yield* Effect.fail(makeLifecycleError([started.left]))
    }
    const pipeline = started.right
    // Runs at most once, whether the lifecycle stops normally or is cut short
    const shutdownTelemetry = yield* Effect.once(pipeline.shutdown)

    // From here on, log entries also go to the pipeline's logger
    return yield* Effect.gen(function* () {
      const gate = yield* makeDrainGate
      const listener = yield* Effect.fork(options.listen(pipeline.telemetry, gate))

      return yield* superviseListener(options, enter, gate, listener, shutdownTelemetry).pipe(
        Effect.ensuring(
          Fiber.interrupt(listener).pipe(
            Effect.zipRight(shutdownTelemetry),
            Effect.catchAll((error) => Effect.logError("Telemetry shutdown failed", { error: error.message }))
          )
        )
      )
    }).pipe(
      Effect.provide(OtelLoggerLive),
      Effect.provide(layerTelemetry(pipeline.telemetry))
    )
  })

/**
 * Run `program` until it finishes on its own or the fiber running this is
 * interrupted. Interruption does not stop `program`; it completes the latch
 * the program watches and then waits for it to wind down. A program that
 * fails after the latch turns the interruption into a defect, so the process
 * still exits with a failure code.
 */
export const runUntilInterrupted = <E>(
  program: (interrupted: Effect.Effect<void>) => Effect.Effect<void, E>
): Effect.Effect<void, E> =>
  Effect.gen(function* () {
    const signal = yield* Deferred.make<void>()
    const fiber = yield* Effect.forkDaemon(program(Deferred.await(signal)))

    return yield* Fiber.join(fiber).pipe(
      Effect.onInterrupt(() =>
        Deferred.succeed(signal, undefined).pipe(
          Effect.zipRight(Fiber.await(fiber)),
          Effect.flatMap((exit) => (Exit.isFailure(exit) ? Effect.die(Cause.squash(exit.cause)) : Effect.void))
        )
      )
    )
  })
