import { Layer, Effect, Duration, Option } from "effect"
import { Headers, HttpClient, HttpClientRequest } from "@effect/platform"
import { TraceId, TraceIdContext } from "@correlate/trace-id"
import { UpstreamClient, type FetchUpstreamParams, type FetchUpstreamResult } from "./UpstreamClient.js"
import { UpstreamConnectionError } from "../domain/errors.js"
import { RelayConfig } from "../config.js"

export const UpstreamClientLive = Layer.effect(
  UpstreamClient,
  Effect.gen(function* () {
    const config = yield* RelayConfig
    const client = yield* HttpClient.HttpClient

    return {
      fetch: (params: FetchUpstreamParams) =>
        Effect.gen(function* () {
          const url = `${config.upstreamUrl}${params.path}`

          const handleConnectionError = (error: unknown) =>
            Effect.fail(new UpstreamConnectionError({
              url,
              reason: error instanceof Error ? error.message : String(error)
            }))

          yield* Effect.logDebug("Calling upstream", { url })

          const base = HttpClientRequest.get(url)
          const request = params.traceId === undefined
            ? base
            : HttpClientRequest.setHeader(base, TraceId.TraceIdHeader, params.traceId)

          const response = yield* client.execute(request).pipe(
            Effect.timeout(Duration.millis(config.upstreamTimeoutMs)),
            Effect.catchTag("TimeoutException", handleConnectionError),
            Effect.catchTag("RequestError", handleConnectionError),
            Effect.catchTag("ResponseError", handleConnectionError)
          )

          const traceId = Option.getOrUndefined(Headers.get(response.headers, TraceId.TraceIdHeader))
          const sentTraceId = params.traceId ?? (yield* TraceIdContext.current)

          if (traceId !== undefined && sentTraceId !== "" && traceId !== sentTraceId) {
            yield* Effect.logWarning("Upstream answered with a different trace id", {
              sent: sentTraceId,
              received: traceId
            })
          }

          yield* Effect.logInfo("Upstream responded", { url, status: response.status })

          return {
            status: response.status,
            traceId
          } satisfies FetchUpstreamResult
        })
    }
  })
)
