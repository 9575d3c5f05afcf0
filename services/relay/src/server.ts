import { HttpServer } from "@effect/platform"
import { NodeHttpServer, NodeRuntime } from "@effect/platform-node"
import { Effect, Layer } from "effect"
import { createServer } from "node:http"
import { traceIdMiddleware } from "@correlate/trace-id"
import { AppLive } from "./layers.js"
import { RelayConfig } from "./config.js"
import { router } from "./routes.js"

// Create HTTP server with dynamic port from config; every response carries X-Trace-Id
const HttpLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const config = yield* RelayConfig

    return router.pipe(
      HttpServer.serve(traceIdMiddleware),
      HttpServer.withLogAddress,
      Layer.provide(
        NodeHttpServer.layer(createServer, { port: config.port })
      )
    )
  })
)

// Compose final application layer
const MainLive = HttpLive.pipe(Layer.provide(AppLive))

// Launch the server
Layer.launch(MainLive).pipe(NodeRuntime.runMain)
