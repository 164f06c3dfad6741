import { NodeRuntime } from "@effect/platform-node"
import { runServiceNode, runUntilInterrupted } from "@trace-chain/service-node"
import { AppBNode } from "./node.js"

// SIGINT/SIGTERM interrupt the main fiber; the node then drains and flushes its telemetry
runUntilInterrupted(runServiceNode(AppBNode)).pipe(NodeRuntime.runMain)
