import type { NodeDefinition } from "@trace-chain/service-node"

// Last node: answers on its own
export const AppCNode: NodeDefinition = {
  serviceName: "app-c",
  defaultPort: 8082
}
