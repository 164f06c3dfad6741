import { HttpRouter, HttpServerRequest, HttpServerResponse } from "@effect/platform"
import { useSpan } from "@trace-chain/telemetry"
import { Effect } from "effect"
import { ServiceNodeConfig } from "../config.js"
import type { DownstreamDecodeError, DownstreamTransportError } from "../domain/errors.js"
import { DrainGate } from "../services/DrainGate.js"
import { NodeWork } from "../services/NodeWork.js"
import { instrumentRoute, pathOf } from "./instrumentation.js"

// GET / - do this node's part of the chain
export const handleRoot = Effect.gen(function* () {
  const request = yield* HttpServerRequest.HttpServerRequest
  const config = yield* ServiceNodeConfig
  const work = yield* NodeWork
  const path = pathOf(request.url)

  const body = yield* useSpan("handleRoot", (span) =>
    Effect.gen(function* () {
      span.setAttributes({ "http.method": request.method, "http.path": path })
      yield* Effect.logInfo("Request received", { service: config.serviceName, path })
      return yield* work.perform(span)
    })
  )

  return HttpServerResponse.unsafeJson(body)
}).pipe(
  Effect.catchTags({
    // Downstream unreachable or timed out (500 Internal Server Error)
    DownstreamTransportError: (error: DownstreamTransportError) =>
      Effect.succeed(HttpServerResponse.text(error.message, { status: 500 })),

    // Downstream answered something other than a JSON object (500 Internal Server Error)
    DownstreamDecodeError: (error: DownstreamDecodeError) =>
      Effect.succeed(HttpServerResponse.text(error.message, { status: 500 }))
  })
)

export const rootRoute = Effect.flatMap(DrainGate, (gate) =>
  gate.guard(handleRoot.pipe(instrumentRoute("/")))
)

export const RootRoutes = HttpRouter.empty.pipe(
  HttpRouter.get("/", rootRoute)
)
