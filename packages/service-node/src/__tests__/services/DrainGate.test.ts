import { describe, it, expect } from "vitest"
import { HttpServerResponse } from "@effect/platform"
import { Deferred, Effect, Fiber } from "effect"
import { makeDrainGate } from "../../services/DrainGate.js"

const ok = Effect.succeed(HttpServerResponse.text("done"))

describe("DrainGate", () => {
  describe("guard", () => {
    it("should serve requests while open", async () => {
      const result = await Effect.gen(function* () {
        const gate = yield* makeDrainGate
        const response = yield* gate.guard(ok)
        return { status: response.status, inFlight: yield* gate.inFlight }
      }).pipe(Effect.runPromise)

      expect(result).toEqual({ status: 200, inFlight: 0 })
    })

    it("should count a request while it is served", async () => {
      const inFlight = await Effect.gen(function* () {
        const gate = yield* makeDrainGate
        const admitted = yield* Deferred.make<void>()
        const release = yield* Deferred.make<void>()
        const request = yield* Effect.fork(
          gate.guard(
            Deferred.succeed(admitted, undefined).pipe(
              Effect.zipRight(Deferred.await(release)),
              Effect.zipRight(ok)
            )
          )
        )
        yield* Deferred.await(admitted)
        const during = yield* gate.inFlight
        yield* Deferred.succeed(release, undefined)
        yield* Fiber.join(request)
        return { during, after: yield* gate.inFlight }
      }).pipe(Effect.runPromise)

      expect(inFlight).toEqual({ during: 1, after: 0 })
    })

    it("should stop counting a request that failed or was interrupted", async () => {
      const inFlight = await Effect.gen(function* () {
        const gate = yield* makeDrainGate
        yield* Effect.either(gate.guard(Effect.fail("handler failed")))
        const admitted = yield* Deferred.make<void>()
        const request = yield* Effect.fork(
          gate.guard(Deferred.succeed(admitted, undefined).pipe(Effect.zipRight(Effect.never)))
        )
        yield* Deferred.await(admitted)
        yield* Fiber.interrupt(request)
        return yield* gate.inFlight
      }).pipe(Effect.runPromise)

      expect(inFlight).toBe(0)
    })

    it("should refuse requests with 503 once draining", async () => {
      let served = false

      const response = await Effect.gen(function* () {
        const gate = yield* makeDrainGate
        yield* gate.drain
        return yield* gate.guard(
          Effect.sync(() => {
            served = true
            return HttpServerResponse.text("done")
          })
        )
      }).pipe(Effect.runPromise)

      expect(served).toBe(false)
      expect(response.status).toBe(503)
      expect(HttpServerResponse.toWeb(response).headers.get("content-type")).toContain("text/plain")
    })
  })

  describe("drain", () => {
    it("should finish at once when nothing is in flight", async () => {
      const draining = await Effect.gen(function* () {
        const gate = yield* makeDrainGate
        yield* gate.drain
        return yield* gate.isDraining
      }).pipe(Effect.runPromise)

      expect(draining).toBe(true)
    })

    it("should wait for in-flight requests to finish", async () => {
      const events: Array<string> = []

      await Effect.gen(function* () {
        const gate = yield* makeDrainGate
        const admitted = yield* Deferred.make<void>()
        const release = yield* Deferred.make<void>()
        const request = yield* Effect.fork(
          gate.guard(
            Deferred.succeed(admitted, undefined).pipe(
              Effect.zipRight(Deferred.await(release)),
              Effect.zipRight(ok)
            )
          )
        )
        yield* Deferred.await(admitted)

        const drain = yield* Effect.fork(
          gate.drain.pipe(Effect.zipRight(Effect.sync(() => { events.push("drained") })))
        )
        yield* Effect.sleep("10 millis")
        events.push("request finished")
        yield* Deferred.succeed(release, undefined)

        yield* Fiber.join(request)
        yield* Fiber.join(drain)
      }).pipe(Effect.runPromise)

      expect(events).toEqual(["request finished", "drained"])
    })

    it("should be safe to call twice", async () => {
      const draining = await Effect.gen(function* () {
        const gate = yield* makeDrainGate
        yield* gate.drain
        yield* gate.drain
        return yield* gate.isDraining
      }).pipe(Effect.runPromise)

      expect(draining).toBe(true)
    })
  })
})
