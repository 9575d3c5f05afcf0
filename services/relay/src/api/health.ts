import { HttpRouter, HttpServerResponse } from "@effect/platform"
import { Effect } from "effect"

const healthCheck = Effect.suspend(() =>
  HttpServerResponse.json({
    status: "healthy",
    service: "relay",
    timestamp: new Date().toISOString()
  })
)

export const HealthRoutes = HttpRouter.empty.pipe(
  HttpRouter.get("/health", healthCheck)
)
