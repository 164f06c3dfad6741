import { Data } from "effect"

export type PipelineKind = "resource" | "trace" | "metric" | "log"

// A single teardown callback failed
export class TeardownError extends Data.TaggedError("TeardownError")<{
  readonly name: string
  readonly cause: unknown
  readonly message: string
}> {}

// One or more teardown callbacks failed during shutdown
export class TelemetryShutdownError extends Data.TaggedError("TelemetryShutdownError")<{
  readonly failures: ReadonlyArray<TeardownError>
  readonly message: string
}> {}

// A telemetry pipeline could not be constructed
export class TelemetryBuildError extends Data.TaggedError("TelemetryBuildError")<{
  readonly pipeline: PipelineKind
  readonly cause: unknown
  readonly message: string
  readonly teardown?: TelemetryShutdownError
}> {}

export const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause)

export const makeTeardownError = (name: string, cause: unknown): TeardownError =>
  new TeardownError({
    name,
    cause,
    message: `${name}: ${describeCause(cause)}`
  })

export const makeShutdownError = (
  failures: ReadonlyArray<TeardownError>
): TelemetryShutdownError =>
  new TelemetryShutdownError({
    failures,
    message: failures.map((failure) => failure.message).join("\n")
  })
