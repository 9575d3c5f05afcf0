import { HttpRouter, HttpServerRequest, HttpServerResponse } from "@effect/platform"
import { Effect } from "effect"
import { TraceId, TraceIdContext } from "@correlate/trace-id"
import { UpstreamClient } from "../clients/UpstreamClient.js"
import { RelayRequest } from "../domain/Relay.js"

// GET /trace - Report the trace id this request runs under
const getTrace = Effect.gen(function* () {
  const traceId = yield* TraceIdContext.current

  yield* Effect.logInfo("Trace id requested")

  return yield* HttpServerResponse.json({
    trace_id: traceId,
    testing: TraceId.isTesting(traceId)
  })
})

// POST /relay - Forward a GET to the upstream under the current trace id
const relay = Effect.gen(function* () {
  const upstream = yield* UpstreamClient
  const request = yield* HttpServerRequest.schemaBodyJson(RelayRequest)

  const result = yield* upstream.fetch({
    path: request.path,
    traceId: request.trace_id
  })

  return yield* HttpServerResponse.json({
    trace_id: yield* TraceIdContext.current,
    upstream_status: result.status,
    upstream_trace_id: result.traceId ?? null
  })
}).pipe(
  Effect.catchTags({
    ParseError: (error) =>
      HttpServerResponse.json(
        {
          error: "validation_error",
          message: "Invalid request body",
          details: error.message
        },
        { status: 400 }
      ),
    RequestError: () =>
      HttpServerResponse.json(
        { error: "request_error", message: "Failed to read request body" },
        { status: 400 }
      ),
    UpstreamConnectionError: (error) =>
      Effect.logWarning("Upstream unavailable", { url: error.url, reason: error.reason }).pipe(
        Effect.zipRight(
          HttpServerResponse.json(
            { error: "upstream_unavailable", message: `Upstream request to ${error.url} failed` },
            { status: 502 }
          )
        )
      )
  })
)

export const RelayRoutes = HttpRouter.empty.pipe(
  HttpRouter.get("/trace", getTrace),
  HttpRouter.post("/relay", relay)
)
