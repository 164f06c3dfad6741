import { HttpRouter, HttpServerResponse } from "@effect/platform"
import { Effect } from "effect"

// Liveness only: no span, no drain gate, no downstream
export const healthCheck = Effect.succeed(HttpServerResponse.text("OK"))

export const HealthRoutes = HttpRouter.empty.pipe(
  HttpRouter.get("/health", healthCheck)
)
