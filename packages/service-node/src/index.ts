/**
 * @trace-chain/service-node
 *
 * One node of the chain: its routes, the call to the next node, and the
 * lifecycle of the process that serves it.
 */

// Configuration
export {
  loadServiceNodeConfig,
  ServiceNodeConfig,
  ServiceNodeConfigLive,
  type DownstreamDefinition,
  type DownstreamTarget,
  type NodeDefinition,
  type ServiceNodeSettings
} from "./config.js"

// Errors
export {
  DownstreamDecodeError,
  DownstreamTransportError,
  DrainTimeoutError,
  LifecycleError,
  ListenerError
} from "./domain/errors.js"

// Response bodies
export {
  DownstreamPayload,
  type FinalResponse,
  type ForwardResponse,
  type NodeResponse
} from "./domain/NodeResponse.js"

// Routes
export { healthCheck, HealthRoutes } from "./api/health.js"
export { instrumentRoute } from "./api/instrumentation.js"
export { handleRoot, rootRoute, RootRoutes } from "./api/root.js"
export { ServiceNodeRouter } from "./api/router.js"

// Services
export { DownstreamClient } from "./services/DownstreamClient.js"
export { DownstreamClientLive } from "./services/DownstreamClientLive.js"
export { DrainGate, makeDrainGate, type DrainGateService } from "./services/DrainGate.js"
export { NodeWork, NodeWorkLive } from "./services/NodeWork.js"
export { RequestMetrics, RequestMetricsLive, type CompletedRequest } from "./services/RequestMetrics.js"

// Lifecycle
export { runLifecycle, runUntilInterrupted, type LifecycleOptions, type LifecycleState } from "./lifecycle.js"
export { makeAppLayer, runServiceNode, serveNode } from "./ServiceNode.js"
