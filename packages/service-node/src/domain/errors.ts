import { Data } from "effect"

// The downstream node could not be reached, timed out, or the transport failed
export class DownstreamTransportError extends Data.TaggedError("DownstreamTransportError")<{
  readonly service: string
  readonly url: string
  readonly reason: string
  readonly message: string
}> {}

// The downstream node answered, but not with a JSON object
export class DownstreamDecodeError extends Data.TaggedError("DownstreamDecodeError")<{
  readonly service: string
  readonly url: string
  readonly statusCode: number
  readonly reason: string
  readonly message: string
}> {}

// The HTTP listener stopped on its own
export class ListenerError extends Data.TaggedError("ListenerError")<{
  readonly cause: unknown
  readonly message: string
}> {}

// In-flight requests did not finish within the drain window
export class DrainTimeoutError extends Data.TaggedError("DrainTimeoutError")<{
  readonly timeoutMs: number
  readonly message: string
}> {}

// Everything that went wrong over the life of the process
export class LifecycleError extends Data.TaggedError("LifecycleError")<{
  readonly errors: ReadonlyArray<{ readonly _tag: string; readonly message: string }>
  readonly message: string
}> {}

export const makeTransportError = (service: string, url: string, reason: string) =>
  new DownstreamTransportError({
    service,
    url,
    reason,
    message: `request to ${service} at ${url} failed: ${reason}`
  })

export const makeDecodeError = (service: string, url: string, statusCode: number, reason: string) =>
  new DownstreamDecodeError({
    service,
    url,
    statusCode,
    reason,
    message: `invalid response from ${service} (status ${statusCode}): ${reason}`
  })

export const makeListenerError = (cause: unknown) =>
  new ListenerError({
    cause,
    message: `listener stopped: ${cause instanceof Error ? cause.message : String(cause)}`
  })

export const makeDrainTimeoutError = (timeoutMs: number) =>
  new DrainTimeoutError({
    timeoutMs,
    message: `in-flight requests did not finish within ${timeoutMs}ms`
  })

export const makeLifecycleError = (errors: LifecycleError["errors"]) =>
  new LifecycleError({
    errors,
    message: errors.map((error) => error.message).join("\n")
  })
