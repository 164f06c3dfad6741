import { describe, it, expect } from "vitest"
import { loadServiceNodeConfig } from "@trace-chain/service-node"
import { ConfigProvider, Effect } from "effect"
import { AppANode } from "../node.js"

const loadWith = (env: Record<string, string>) =>
  loadServiceNodeConfig(AppANode).pipe(
    Effect.withConfigProvider(ConfigProvider.fromMap(new Map(Object.entries(env)))),
    Effect.runPromise
  )

describe("app-a", () => {
  it("should listen on 8080 and call app-b on 8081 by default", async () => {
    const config = await loadWith({})

    expect(config.serviceName).toBe("app-a")
    expect(config.port).toBe(8080)
    expect(config.downstream).toEqual({ name: "app-b", url: "http://localhost:8081" })
  })

  it("should follow APP_B_URL", async () => {
    const config = await loadWith({ APP_B_URL: "http://app-b:8081" })

    expect(config.downstream?.url).toBe("http://app-b:8081")
  })
})
