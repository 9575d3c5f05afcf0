/**
 * @correlate/trace-id
 *
 * X-Trace-Id propagation between HTTP boundaries and the Effect fiber context.
 */

// Trace id generation, validation and the testing marker
export * as TraceId from "./TraceId.js"

// Reading and attaching the trace id of the current fiber
export * as TraceIdContext from "./TraceIdContext.js"

// Server middleware for incoming trace ids
export { withTraceIdHeader, traceIdMiddleware } from "./TraceIdMiddleware.js"

// HTTP client layer with automatic trace id header injection
export {
  setTraceIdHeader,
  withTraceIdPropagation,
  TracedHttpClient,
  TracedHttpClientLive
} from "./TracedHttpClient.js"
