import { HttpServerResponse } from "@effect/platform"
import { Context, Deferred, Effect, Ref } from "effect"

interface GateState {
  readonly inFlight: number
  readonly draining: boolean
}

/**
 * Counts the requests being served so shutdown can wait for them.
 */
export interface DrainGateService {
  /**
   * Serve `handler` as one in-flight request, or answer 503 once draining began.
   */
  readonly guard: <E, R>(
    handler: Effect.Effect<HttpServerResponse.HttpServerResponse, E, R>
  ) => Effect.Effect<HttpServerResponse.HttpServerResponse, E, R>
  /**
   * Stop admitting requests and wait until the in-flight ones are done.
   */
  readonly drain: Effect.Effect<void>
  readonly inFlight: Effect.Effect<number>
  readonly isDraining: Effect.Effect<boolean>
}

export class DrainGate extends Context.Tag("DrainGate")<DrainGate, DrainGateService>() {}

export const makeDrainGate: Effect.Effect<DrainGateService> = Effect.gen(function* () {
  const state = yield* Ref.make<GateState>({ inFlight: 0, draining: false })
  const idle = yield* Deferred.make<void>()

  const admit = Ref.modify(state, (current): [boolean, GateState] =>
    current.draining ? [false, current] : [true, { ...current, inFlight: current.inFlight + 1 }]
  )

  const release = Ref.modify(state, (current): [boolean, GateState] => {
    const next = { ...current, inFlight: current.inFlight - 1 }
    return [next.draining && next.inFlight === 0, next]
  }).pipe(
    Effect.flatMap((lastOut) => (lastOut ? Deferred.succeed(idle, undefined).pipe(Effect.asVoid) : Effect.void))
  )

  const guard = <E, R>(handler: Effect.Effect<HttpServerResponse.HttpServerResponse, E, R>) =>
    Effect.uninterruptibleMask((restore) =>
      Effect.flatMap(admit, (admitted) =>
        admitted
          ? restore(handler).pipe(Effect.ensuring(release))
          : Effect.succeed(HttpServerResponse.text("service is draining", { status: 503 }))
      )
    )

  const drain = Ref.modify(state, (current): [boolean, GateState] => [
    current.inFlight === 0,
    { ...current, draining: true }
  ]).pipe(
    Effect.flatMap((empty) => (empty ? Deferred.succeed(idle, undefined).pipe(Effect.asVoid) : Effect.void)),
    Effect.zipRight(Deferred.await(idle))
  )

  return {
    guard,
    drain,
    inFlight: Effect.map(Ref.get(state), (current) => current.inFlight),
    isDraining: Effect.map(Ref.get(state), (current) => current.draining)
  }
})
