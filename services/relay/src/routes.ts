import { HttpRouter, HttpServerResponse } from "@effect/platform"
import { Effect } from "effect"
import { HealthRoutes } from "./api/health.js"
import { RelayRoutes } from "./api/relay.js"

// Root route - service identification
const rootRoute = HttpRouter.empty.pipe(
  HttpRouter.get(
    "/",
    Effect.succeed(
      HttpServerResponse.text("Relay Service - trace id propagation")
    )
  )
)

// Compose all routes
export const router = HttpRouter.empty.pipe(
  HttpRouter.mount("/", rootRoute),
  HttpRouter.mount("/", HealthRoutes),
  HttpRouter.mount("/", RelayRoutes)
)
