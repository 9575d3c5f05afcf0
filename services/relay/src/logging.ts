import { Effect, Layer, Logger } from "effect"
import { RelayConfig } from "./config.js"

// Log format and minimum level from RelayConfig
export const LoggerLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const config = yield* RelayConfig

    return Layer.merge(
      config.logFormat === "json" ? Logger.json : Logger.logFmt,
      Logger.minimumLogLevel(config.logLevel)
    )
  })
)
