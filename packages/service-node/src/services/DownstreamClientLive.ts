import { HttpClient } from "@effect/platform"
import { SpanKind } from "@opentelemetry/api"
import { Telemetry, useSpan } from "@trace-chain/telemetry"
import { Duration, Effect, Layer, Schema } from "effect"
import { ServiceNodeConfig, type DownstreamTarget } from "../config.js"
import { DownstreamPayload } from "../domain/NodeResponse.js"
import { makeDecodeError, makeTransportError } from "../domain/errors.js"
import { DownstreamClient } from "./DownstreamClient.js"

export const DownstreamClientLive = Layer.effect(
  DownstreamClient,
  Effect.gen(function* () {
    const config = yield* ServiceNodeConfig
    const telemetry = yield* Telemetry
    const client = yield* HttpClient.HttpClient

    const call = (target: DownstreamTarget) => {
      const url = `${target.url}/`

      return useSpan(
        `call ${target.name}`,
        (span) =>
          Effect.gen(function* () {
            span.setAttribute("downstream.url", url)
            yield* Effect.logInfo("Calling downstream", { downstream: target.name, url })

            // The timeout covers connecting, the status line and the body
            const { status, text } = yield* Effect.gen(function* () {
              const response = yield* client.get(url)
              span.setAttribute("http.status_code", response.status)
              return { status: response.status, text: yield* response.text }
            }).pipe(
              Effect.scoped,
              Effect.timeout(Duration.millis(config.downstreamTimeoutMs)),
              Effect.catchTags({
                TimeoutException: () =>
                  Effect.fail(
                    makeTransportError(target.name, url, `timed out after ${config.downstreamTimeoutMs}ms`)
                  ),
                RequestError: (error) => Effect.fail(makeTransportError(target.name, url, error.message)),
                ResponseError: (error) => Effect.fail(makeTransportError(target.name, url, error.message))
              })
            )

            const json = yield* Effect.try({
              try: (): unknown => JSON.parse(text),
              catch: () => makeDecodeError(target.name, url, status, "response body is not valid JSON")
            })

            if (Array.isArray(json)) {
              return yield* Effect.fail(makeDecodeError(target.name, url, status, "response body is not a JSON object"))
            }

            return yield* Schema.decodeUnknown(DownstreamPayload)(json).pipe(
              Effect.mapError(() =>
                makeDecodeError(target.name, url, status, "response body is not a JSON object")
              )
            )
          }).pipe(
            Effect.tapError((error) =>
              Effect.logWarning("Downstream call failed", { downstream: target.name, reason: error.reason })
            )
          ),
        { kind: SpanKind.CLIENT }
      ).pipe(Effect.provideService(Telemetry, telemetry))
    }

    return { call }
  })
)
