import { Context, type Effect } from "effect"
import type { DownstreamTarget } from "../config.js"
import type { DownstreamPayload } from "../domain/NodeResponse.js"
import type { DownstreamDecodeError, DownstreamTransportError } from "../domain/errors.js"

export class DownstreamClient extends Context.Tag("DownstreamClient")<
  DownstreamClient,
  {
    /**
     * GET the root of the next node under a `call <name>` client span.
     * Fails with DownstreamTransportError if the node cannot be reached in time.
     * Fails with DownstreamDecodeError if the body is not a JSON object.
     */
    readonly call: (
      target: DownstreamTarget
    ) => Effect.Effect<DownstreamPayload, DownstreamTransportError | DownstreamDecodeError>
  }
>() {}
