import type { NodeDefinition } from "@trace-chain/service-node"

// Entry point of the chain: forwards every request to app-b
export const AppANode: NodeDefinition = {
  serviceName: "app-a",
  defaultPort: 8080,
  downstream: {
    name: "app-b",
    urlEnv: "APP_B_URL",
    defaultUrl: "http://localhost:8081"
  }
}
