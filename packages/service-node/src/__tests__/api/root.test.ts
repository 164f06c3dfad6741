import { describe, it, expect, afterEach } from "vitest"
import { SpanStatusCode } from "@opentelemetry/api"
import { Effect } from "effect"
import {
  answering,
  get,
  makeNodeUnderTest,
  makeSettings,
  neverAnswering,
  unreachable,
  type NodeUnderTest
} from "../harness.js"

describe("GET /", () => {
  let node: NodeUnderTest

  afterEach(async () => {
    await node.dispose()
  })

  const spanNamed = (name: string) =>
    node.memory.spans.getFinishedSpans().find((span) => span.name === name)

  describe("terminal node", () => {
    it("should answer on its own after the work delay", async () => {
      node = await makeNodeUnderTest(makeSettings({ serviceName: "app-c", downstream: undefined, workDelayMs: 20 }))

      const startedAt = Date.now()
      const response = await node.handle(get("/"))

      expect(Date.now() - startedAt).toBeGreaterThanOrEqual(15)
      expect(response.status).toBe(200)
      expect(await response.json()).toEqual({
        service: "app-c",
        message: "Final response from app-c",
        status: "success"
      })
      expect(node.sent).toHaveLength(0)
    })

    it("should tag the request span", async () => {
      node = await makeNodeUnderTest(makeSettings({ serviceName: "app-c", downstream: undefined }))

      await node.handle(get("/"))

      expect(spanNamed("handleRoot")?.attributes).toEqual({
        "http.method": "GET",
        "http.path": "/",
        "response.status": "success"
      })
    })

    it("should tag the server span", async () => {
      node = await makeNodeUnderTest(makeSettings({ serviceName: "app-c", downstream: undefined }))

      await node.handle(get("/?verbose=1"))

      expect(spanNamed("GET /")?.attributes).toEqual({
        "http.request.method": "GET",
        "http.route": "/",
        "url.path": "/",
        "http.response.status_code": 200
      })
    })
  })

  describe("forwarding node", () => {
    it("should wrap the downstream answer", async () => {
      node = await makeNodeUnderTest(makeSettings(), answering(JSON.stringify({ service: "app-b", depth: 2 })))

      const response = await node.handle(get("/"))

      expect(await response.json()).toEqual({
        service: "app-a",
        message: "Called app-b successfully",
        result: { service: "app-b", depth: 2 }
      })
    })

    it("should tag the client span with the downstream URL and status", async () => {
      node = await makeNodeUnderTest(makeSettings(), answering("{}", 201))

      await node.handle(get("/"))

      expect(spanNamed("call app-b")?.attributes).toEqual({
        "downstream.url": "http://app-b.test/",
        "http.status_code": 201
      })
    })

    it("should send the trace context of the client span", async () => {
      node = await makeNodeUnderTest(makeSettings())

      await node.handle(get("/"))

      const client = spanNamed("call app-b")
      expect(node.sent[0]?.headers["traceparent"]).toBe(
        `00-${client?.spanContext().traceId}-${client?.spanContext().spanId}-01`
      )
    })
  })

  describe("downstream failures", () => {
    it("should answer 500 with the reason when the downstream is unreachable", async () => {
      node = await makeNodeUnderTest(makeSettings(), unreachable("connect ECONNREFUSED 127.0.0.1:8081"))

      const response = await node.handle(get("/"))
      const body = await response.text()

      expect(response.status).toBe(500)
      expect(response.headers.get("content-type")).toContain("text/plain")
      expect(body.startsWith("request to app-b at http://app-b.test/ failed: ")).toBe(true)
    })

    it("should record the failure on the request and client spans", async () => {
      node = await makeNodeUnderTest(makeSettings(), unreachable("connect ECONNREFUSED 127.0.0.1:8081"))

      const body = await node.handle(get("/")).then((response) => response.text())

      expect(spanNamed("handleRoot")?.status).toEqual({ code: SpanStatusCode.ERROR, message: body })
      expect(spanNamed("handleRoot")?.events.map((event) => event.name)).toEqual(["exception"])
      expect(spanNamed("call app-b")?.status.code).toBe(SpanStatusCode.ERROR)
      expect(spanNamed("GET /")?.attributes["http.response.status_code"]).toBe(500)
      expect(spanNamed("GET /")?.status.code).toBe(SpanStatusCode.ERROR)
    })

    it("should give up after the downstream timeout", async () => {
      node = await makeNodeUnderTest(makeSettings({ downstreamTimeoutMs: 50 }), neverAnswering)

      const startedAt = Date.now()
      const response = await node.handle(get("/"))

      expect(Date.now() - startedAt).toBeLessThan(5000)
      expect(response.status).toBe(500)
      expect(await response.text()).toBe("request to app-b at http://app-b.test/ failed: timed out after 50ms")
    })

    it("should reject a body that is not JSON", async () => {
      node = await makeNodeUnderTest(makeSettings(), answering("upstream exploded", 500))

      const response = await node.handle(get("/"))

      expect(response.status).toBe(500)
      expect(await response.text()).toBe(
        "invalid response from app-b (status 500): response body is not valid JSON"
      )
    })

    it("should reject JSON that is not an object", async () => {
      node = await makeNodeUnderTest(makeSettings(), answering("[1,2]"))

      const response = await node.handle(get("/"))

      expect(response.status).toBe(500)
      expect(await response.text()).toBe(
        "invalid response from app-b (status 200): response body is not a JSON object"
      )
    })

    it("should reject a null body", async () => {
      node = await makeNodeUnderTest(makeSettings(), answering("null"))

      const response = await node.handle(get("/"))

      expect(await response.text()).toBe(
        "invalid response from app-b (status 200): response body is not a JSON object"
      )
    })
  })

  describe("draining", () => {
    it("should refuse new requests once draining began", async () => {
      node = await makeNodeUnderTest(makeSettings())
      await node.gate.drain.pipe(Effect.runPromise)

      const response = await node.handle(get("/"))

      expect(response.status).toBe(503)
      expect(await response.text()).toBe("service is draining")
      expect(node.sent).toHaveLength(0)
      expect(node.memory.spans.getFinishedSpans()).toHaveLength(0)
    })
  })
})
