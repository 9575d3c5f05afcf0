/**
 * Traced HTTP Client Layer
 *
 * Wraps an HttpClient so outgoing requests carry the X-Trace-Id header of
 * the current fiber context.
 */

import { Headers, HttpClient, HttpClientRequest } from "@effect/platform"
import { NodeHttpClient } from "@effect/platform-node"
import { Effect, Layer, Option } from "effect"
import * as TraceId from "./TraceId.js"
import * as TraceIdContext from "./TraceIdContext.js"

const hasTraceIdHeader = (request: HttpClientRequest.HttpClientRequest): boolean =>
  Option.match(Headers.get(request.headers, TraceId.TraceIdHeader), {
    onNone: () => false,
    onSome: (value) => value !== ""
  })

/**
 * Set the trace id header on a request that does not carry one yet.
 *
 * An explicitly set header is left as is, since the caller may be forwarding
 * a different id on purpose. Otherwise the id comes from the context, or is
 * generated when the context has none. Requests are immutable, so the
 * header is set on a copy.
 */
export const setTraceIdHeader = (
  request: HttpClientRequest.HttpClientRequest
): Effect.Effect<HttpClientRequest.HttpClientRequest> =>
  hasTraceIdHeader(request)
    ? Effect.succeed(request)
    : Effect.map(TraceIdContext.currentOrNew, (traceId) =>
      HttpClientRequest.setHeader(request, TraceId.TraceIdHeader, traceId)
    )

/**
 * Decorate a client so every request goes through {@link setTraceIdHeader}.
 * Errors of the underlying client are passed through untouched.
 */
export const withTraceIdPropagation = <E, R>(
  client: HttpClient.HttpClient.With<E, R>
): HttpClient.HttpClient.With<E, R> => HttpClient.mapRequestEffect(client, setTraceIdHeader)

/**
 * Replaces the provided HttpClient with a traced one.
 */
export const TracedHttpClient: Layer.Layer<HttpClient.HttpClient, never, HttpClient.HttpClient> =
  Layer.effect(
    HttpClient.HttpClient,
    Effect.map(HttpClient.HttpClient, withTraceIdPropagation)
  )

/**
 * Traced HTTP client on top of the default Node transport.
 */
export const TracedHttpClientLive: Layer.Layer<HttpClient.HttpClient> = TracedHttpClient.pipe(
  Layer.provide(NodeHttpClient.layer)
)
