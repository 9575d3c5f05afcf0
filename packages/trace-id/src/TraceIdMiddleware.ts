/**
 * Trace Id Middleware
 *
 * Reads the X-Trace-Id header from incoming HTTP requests, attaches the id
 * to the handler's context and echoes it back on the response.
 */

import { Headers, HttpApp, HttpMiddleware, HttpServerRequest, HttpServerResponse } from "@effect/platform"
import { Effect, Option } from "effect"
import * as TraceId from "./TraceId.js"
import * as TraceIdContext from "./TraceIdContext.js"

/**
 * Wraps a handler effect so it runs under the request's trace id.
 *
 * A missing or invalid header is replaced with a freshly generated id; the
 * request is never rejected because of it. The id is registered as a
 * pre-response handler before the handler runs, so whatever response goes
 * out for the request carries it, error responses included.
 *
 * @example
 * ```ts
 * const myHandler = withTraceIdHeader(
 *   Effect.gen(function* () {
 *     const traceId = yield* TraceIdContext.current
 *     return yield* HttpServerResponse.json({ traceId })
 *   })
 * )
 * ```
 */
export const withTraceIdHeader = <E, R>(
  handler: Effect.Effect<HttpServerResponse.HttpServerResponse, E, R>
): Effect.Effect<HttpServerResponse.HttpServerResponse, E, R | HttpServerRequest.HttpServerRequest> =>
  Effect.gen(function* () {
    const request = yield* HttpServerRequest.HttpServerRequest
    const header = Headers.get(request.headers, TraceId.TraceIdHeader)
    const traceId = TraceId.orElseNew(Option.getOrUndefined(header))

    yield* HttpApp.appendPreResponseHandler((_request, response) =>
      Effect.succeed(HttpServerResponse.setHeader(response, TraceId.TraceIdHeader, traceId))
    )

    return yield* handler.pipe(TraceIdContext.withTraceId(traceId))
  })

/**
 * {@link withTraceIdHeader} as an HttpMiddleware, for whole routers.
 */
export const traceIdMiddleware = HttpMiddleware.make((app) => withTraceIdHeader(app))
