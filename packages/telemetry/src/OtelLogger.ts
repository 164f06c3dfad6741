import { type Logger as OtelLogger, SeverityNumber } from "@opentelemetry/api-logs"
import type { AttributeValue } from "@opentelemetry/api"
import { Effect, FiberRefs, Layer, Logger, type LogLevel } from "effect"
import { Telemetry } from "./Telemetry.js"
import { CurrentTraceContext } from "./TraceContext.js"

const severityOf = (level: LogLevel.LogLevel): SeverityNumber => {
  switch (level._tag) {
    case "Fatal":
      return SeverityNumber.FATAL
    case "Error":
      return SeverityNumber.ERROR
    case "Warning":
      return SeverityNumber.WARN
    case "Info":
      return SeverityNumber.INFO
    case "Debug":
      return SeverityNumber.DEBUG
    case "Trace":
    case "All":
      return SeverityNumber.TRACE
    case "None":
      return SeverityNumber.UNSPECIFIED
  }
}

const toAttributeValue = (value: unknown): AttributeValue => {
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value
  }
  if (value instanceof Error) {
    return value.message
  }
  try {
    return JSON.stringify(value) ?? String(value)
  } catch {
    // bigints and circular structures
    return String(value)
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Error)

/**
 * Effect logger that writes each entry to an OpenTelemetry logger.
 *
 * String message parts form the body; object parts and fiber annotations
 * become attributes. The record is tied to the fiber's trace context so
 * collectors can correlate it with the active span.
 */
export const makeOtelLogger = (logger: OtelLogger): Logger.Logger<unknown, void> =>
  Logger.make(({ annotations, context, date, logLevel, message }) => {
    const parts: ReadonlyArray<unknown> = Array.isArray(message) ? message : [message]
    const attributes: Record<string, AttributeValue> = {}

    for (const [key, value] of annotations) {
      attributes[key] = toAttributeValue(value)
    }
    const text: Array<string> = []
    for (const part of parts) {
      if (isRecord(part)) {
        for (const [key, value] of Object.entries(part)) {
          attributes[key] = toAttributeValue(value)
        }
      } else {
        text.push(typeof part === "string" ? part : String(toAttributeValue(part)))
      }
    }

    logger.emit({
      severityNumber: severityOf(logLevel),
      severityText: logLevel.label,
      body: text.join(" "),
      attributes,
      timestamp: date,
      context: FiberRefs.getOrDefault(context, CurrentTraceContext)
    })
  })

/**
 * Adds the OpenTelemetry logger next to the default one.
 */
export const OtelLoggerLive: Layer.Layer<never, never, Telemetry> = Layer.unwrapEffect(
  Effect.map(Telemetry, ({ logger }) => Logger.add(makeOtelLogger(logger)))
)
