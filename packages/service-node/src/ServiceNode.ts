import { HttpServer } from "@effect/platform"
import { NodeHttpServer } from "@effect/platform-node"
import {
  buildTelemetryPipeline,
  layerTelemetry,
  loadTelemetryConfig,
  type TelemetryHandle,
  TracedHttpClientLive
} from "@trace-chain/telemetry"
import { Effect, Layer } from "effect"
import { createServer } from "node:http"
import { ServiceNodeRouter } from "./api/router.js"
import { loadServiceNodeConfig, type NodeDefinition, ServiceNodeConfig, type ServiceNodeSettings } from "./config.js"
import { runLifecycle } from "./lifecycle.js"
import { DownstreamClientLive } from "./services/DownstreamClientLive.js"
import { DrainGate, type DrainGateService } from "./services/DrainGate.js"
import { NodeWorkLive } from "./services/NodeWork.js"
import { RequestMetricsLive } from "./services/RequestMetrics.js"

// Node work depends on the downstream client, which depends on the traced HTTP client
const NodeWorkLayer = NodeWorkLive.pipe(
  Layer.provide(DownstreamClientLive),
  Layer.provide(TracedHttpClientLive)
)

/**
 * Everything the routes need, for one process.
 */
export const makeAppLayer = (
  settings: ServiceNodeSettings,
  telemetry: TelemetryHandle,
  gate: DrainGateService
) =>
  Layer.mergeAll(NodeWorkLayer, RequestMetricsLive).pipe(
    Layer.provideMerge(
      Layer.mergeAll(
        layerTelemetry(telemetry),
        Layer.succeed(ServiceNodeConfig, settings),
        Layer.succeed(DrainGate, gate)
      )
    )
  )

// Serve the node's routes on its port until interrupted; logging comes from the lifecycle
export const serveNode = (
  settings: ServiceNodeSettings,
  telemetry: TelemetryHandle,
  gate: DrainGateService
) => {
  const HttpLive = ServiceNodeRouter.pipe(
    HttpServer.serve(),
    HttpServer.withLogAddress,
    Layer.provide(NodeHttpServer.layer(createServer, { port: settings.port })),
    Layer.provide(makeAppLayer(settings, telemetry, gate))
  )

  return Layer.launch(HttpLive)
}

/**
 * Read the configuration of `definition` and run it as a process until
 * `interrupted` completes.
 */
export const runServiceNode = (definition: NodeDefinition) => (interrupted: Effect.Effect<void>) =>
  Effect.gen(function* () {
    const settings = yield* loadServiceNodeConfig(definition)
    const telemetryConfig = yield* loadTelemetryConfig(definition.serviceName)

    return yield* runLifecycle({
      serviceName: settings.serviceName,
      drainTimeoutMs: settings.drainTimeoutMs,
      startTelemetry: buildTelemetryPipeline(telemetryConfig),
      listen: (telemetry, gate) => serveNode(settings, telemetry, gate),
      interrupted
    })
  }).pipe(Effect.annotateLogs("service", definition.serviceName))
