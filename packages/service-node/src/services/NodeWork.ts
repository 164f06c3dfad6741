import type { Span } from "@opentelemetry/api"
import { Context, Duration, Effect, Layer } from "effect"
import { ServiceNodeConfig, type DownstreamTarget, type ServiceNodeSettings } from "../config.js"
import { finalResponse, forwardResponse, type NodeResponse } from "../domain/NodeResponse.js"
import type { DownstreamDecodeError, DownstreamTransportError } from "../domain/errors.js"
import { DownstreamClient } from "./DownstreamClient.js"

/**
 * What a node does for `GET /` once the request span is open.
 */
export class NodeWork extends Context.Tag("NodeWork")<
  NodeWork,
  {
    readonly perform: (
      requestSpan: Span
    ) => Effect.Effect<NodeResponse, DownstreamTransportError | DownstreamDecodeError>
  }
>() {}

// Calls the next node and wraps its answer
const forwardingWork = (serviceName: string, target: DownstreamTarget) =>
  Effect.map(DownstreamClient, (client) =>
    NodeWork.of({
      perform: () =>
        client.call(target).pipe(
          Effect.map((result) => forwardResponse(serviceName, target.name, result))
        )
    })
  )

// Last node of the chain: emulates some work and answers on its own
const localWork = (config: ServiceNodeSettings) =>
  NodeWork.of({
    perform: (requestSpan) =>
      Effect.sleep(Duration.millis(config.workDelayMs)).pipe(
        Effect.andThen(
          Effect.sync(() => {
            requestSpan.setAttribute("response.status", "success")
          })
        ),
        Effect.as(finalResponse(config.serviceName))
      )
  })

export const NodeWorkLive: Layer.Layer<NodeWork, never, ServiceNodeConfig | DownstreamClient> = Layer.effect(
  NodeWork,
  Effect.gen(function* () {
    const config = yield* ServiceNodeConfig
    if (config.downstream === undefined) {
      return localWork(config)
    }
    return yield* forwardingWork(config.serviceName, config.downstream)
  })
)
