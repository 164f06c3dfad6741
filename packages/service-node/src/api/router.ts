import { HttpRouter } from "@effect/platform"
import { HealthRoutes } from "./health.js"
import { RootRoutes } from "./root.js"

export const ServiceNodeRouter = HttpRouter.empty.pipe(
  HttpRouter.concat(RootRoutes),
  HttpRouter.concat(HealthRoutes)
)
