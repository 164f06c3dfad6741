import { describe, it, expect, beforeEach, afterEach } from "vitest"
import { SpanKind } from "@opentelemetry/api"
import type { ReadableSpan } from "@opentelemetry/sdk-trace-node"
import { forwardingTo, get, makeNodeUnderTest, makeSettings, type NodeUnderTest } from "./harness.js"

const spanNamed = (node: NodeUnderTest, name: string): ReadableSpan => {
  const span = node.memory.spans.getFinishedSpans().find((candidate) => candidate.name === name)
  if (!span) {
    throw new Error(`${node.settings.serviceName} recorded no span named "${name}"`)
  }
  return span
}

describe("app-a → app-b → app-c", () => {
  let appA: NodeUnderTest
  let appB: NodeUnderTest
  let appC: NodeUnderTest

  beforeEach(async () => {
    appC = await makeNodeUnderTest(makeSettings({ serviceName: "app-c", port: 8082, downstream: undefined }))
    appB = await makeNodeUnderTest(
      makeSettings({ serviceName: "app-b", port: 8081, downstream: { name: "app-c", url: "http://app-c.test" } }),
      forwardingTo(appC)
    )
    appA = await makeNodeUnderTest(makeSettings(), forwardingTo(appB))
  })

  afterEach(async () => {
    await appA.dispose()
    await appB.dispose()
    await appC.dispose()
  })

  it("should nest the answer of every node", async () => {
    const response = await appA.handle(get("/"))

    expect(response.status).toBe(200)
    expect(response.headers.get("content-type")).toBe("application/json")
    expect(await response.json()).toEqual({
      service: "app-a",
      message: "Called app-b successfully",
      result: {
        service: "app-b",
        message: "Called app-c successfully",
        result: {
          service: "app-c",
          message: "Final response from app-c",
          status: "success"
        }
      }
    })
  })

  it("should call each downstream root once", async () => {
    await appA.handle(get("/"))

    expect(appA.sent.map((request) => request.url)).toEqual(["http://app-b.test/"])
    expect(appB.sent.map((request) => request.url)).toEqual(["http://app-c.test/"])
    expect(appC.sent).toHaveLength(0)
  })

  it("should record the whole chain in one trace", async () => {
    await appA.handle(get("/"))

    const traceIds = new Set(
      [appA, appB, appC].flatMap((node) =>
        node.memory.spans.getFinishedSpans().map((span) => span.spanContext().traceId)
      )
    )
    expect(traceIds.size).toBe(1)
  })

  it("should link each hop to the client span that called it", async () => {
    await appA.handle(get("/"))

    expect(spanNamed(appB, "GET /").parentSpanId).toBe(spanNamed(appA, "call app-b").spanContext().spanId)
    expect(spanNamed(appC, "GET /").parentSpanId).toBe(spanNamed(appB, "call app-c").spanContext().spanId)
  })

  it("should nest spans within a node", async () => {
    await appA.handle(get("/"))

    const server = spanNamed(appA, "GET /")
    const handler = spanNamed(appA, "handleRoot")
    const client = spanNamed(appA, "call app-b")

    expect(server.kind).toBe(SpanKind.SERVER)
    expect(server.parentSpanId).toBeUndefined()
    expect(handler.parentSpanId).toBe(server.spanContext().spanId)
    expect(client.kind).toBe(SpanKind.CLIENT)
    expect(client.parentSpanId).toBe(handler.spanContext().spanId)
  })

  it("should open one request span per node and request", async () => {
    await appA.handle(get("/"))
    await appA.handle(get("/"))

    for (const node of [appA, appB, appC]) {
      const handlers = node.memory.spans.getFinishedSpans().filter((span) => span.name === "handleRoot")
      expect(handlers).toHaveLength(2)
    }
  })

  it("should forward baggage to every hop", async () => {
    await appA.handle(get("/", { baggage: "user=u-1" }))

    expect(appA.sent[0]?.headers["baggage"]).toBe("user=u-1")
    expect(appB.sent[0]?.headers["baggage"]).toBe("user=u-1")
  })

  it("should continue a trace started before app-a", async () => {
    const traceId = "0af7651916cd43dd8448eb211c80319c"
    await appA.handle(get("/", { traceparent: `00-${traceId}-b7ad6b7169203331-01` }))

    expect(spanNamed(appA, "GET /").parentSpanId).toBe("b7ad6b7169203331")
    expect(spanNamed(appC, "handleRoot").spanContext().traceId).toBe(traceId)
  })
})
