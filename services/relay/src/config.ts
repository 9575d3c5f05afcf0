import { Config, Context, Effect, Layer, LogLevel } from "effect"

export class RelayConfig extends Context.Tag("RelayConfig")<
  RelayConfig,
  {
    readonly port: number
    readonly upstreamUrl: string
    readonly upstreamTimeoutMs: number
    readonly logFormat: "json" | "logfmt"
    readonly logLevel: LogLevel.LogLevel
  }
>() {}

export const RelayConfigLive = Layer.effect(
  RelayConfig,
  Effect.gen(function* () {
    return {
      port: yield* Config.number("PORT").pipe(Config.withDefault(3010)),
      upstreamUrl: yield* Config.string("UPSTREAM_URL").pipe(
        Config.withDefault("http://localhost:3011")
      ),
      upstreamTimeoutMs: yield* Config.number("UPSTREAM_TIMEOUT_MS").pipe(
        Config.withDefault(5000)
      ),
      logFormat: yield* Config.literal("json", "logfmt")("LOG_FORMAT").pipe(
        Config.withDefault("logfmt" as const)
      ),
      logLevel: yield* Config.logLevel("LOG_LEVEL").pipe(
        Config.withDefault(LogLevel.Info)
      )
    }
  })
)
