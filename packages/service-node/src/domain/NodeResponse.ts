import { Schema } from "effect"

// Whatever the downstream node answered, as long as it is a JSON object
export const DownstreamPayload = Schema.Record({ key: Schema.String, value: Schema.Unknown })
export type DownstreamPayload = typeof DownstreamPayload.Type

// Answer of a node that called the next one
export interface ForwardResponse {
  readonly service: string
  readonly message: string
  readonly result: DownstreamPayload
}

// Answer of the last node of the chain
export interface FinalResponse {
  readonly service: string
  readonly message: string
  readonly status: "success"
}

export type NodeResponse = ForwardResponse | FinalResponse

export const forwardResponse = (service: string, downstream: string, result: DownstreamPayload): ForwardResponse => ({
  service,
  message: `Called ${downstream} successfully`,
  result
})

export const finalResponse = (service: string): FinalResponse => ({
  service,
  message: `Final response from ${service}`,
  status: "success"
})
