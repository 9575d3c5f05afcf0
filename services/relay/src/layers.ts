import { Layer } from "effect"
import { TracedHttpClientLive } from "@correlate/trace-id"
import { RelayConfigLive } from "./config.js"
import { LoggerLive } from "./logging.js"
import { UpstreamClientLive } from "./clients/UpstreamClientLive.js"

// Upstream client sends through the traced Node HTTP client
const ClientsLive = UpstreamClientLive.pipe(
  Layer.provide(TracedHttpClientLive),
  Layer.provide(RelayConfigLive)
)

// Export composed application layer
export const AppLive = Layer.mergeAll(
  RelayConfigLive,
  ClientsLive,
  LoggerLive.pipe(Layer.provide(RelayConfigLive))
)
