import type { NodeDefinition } from "@trace-chain/service-node"

export const AppBNode: NodeDefinition = {
  serviceName: "app-b",
  defaultPort: 8081,
  downstream: {
    name: "app-c",
    urlEnv: "APP_C_URL",
    defaultUrl: "http://localhost:8082"
  }
}
