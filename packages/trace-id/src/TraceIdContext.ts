/**
 * Trace id propagation through the fiber context.
 *
 * The id lives in a FiberRef owned by this module, so only the functions
 * below can read or set it. Values are scoped to the wrapped effect and
 * inherited by fibers forked inside it.
 */

import { Effect, FiberRef } from "effect"
import * as TraceId from "./TraceId.js"

const currentTraceId: FiberRef.FiberRef<string> = FiberRef.unsafeMake("")

/**
 * The trace id attached to the current fiber, or "" when none was attached.
 */
export const current: Effect.Effect<string> = FiberRef.get(currentTraceId)

/**
 * The attached trace id, or a freshly generated one when none was attached.
 * The generated id is not attached.
 */
export const currentOrNew: Effect.Effect<string> = Effect.flatMap(current, (id) =>
  id === "" ? TraceId.next : Effect.succeed(id)
)

/**
 * Run an effect with the given trace id attached. An empty id is replaced
 * with a fresh one.
 *
 * The id is also added as the `trace_id` log annotation, so every log line
 * written inside the effect carries it.
 *
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   const id = yield* TraceIdContext.current
 *   yield* Effect.logInfo("handling request")
 * }).pipe(TraceIdContext.withTraceId(incomingId))
 * ```
 */
export const withTraceId = (id: string) =>
  <A, E, R>(self: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    Effect.suspend(() => {
      const traceId = id === "" ? TraceId.make() : id
      return self.pipe(
        Effect.locally(currentTraceId, traceId),
        Effect.annotateLogs(TraceId.TraceIdLogKey, traceId)
      )
    })

/**
 * Run an effect with the id marked as a testing trace id.
 */
export const withTestingTraceId = (id: string) =>
  <A, E, R>(self: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    Effect.suspend(() => withTraceId(TraceId.withTestingPrefix(id))(self))

/**
 * Run an effect under a freshly generated trace id.
 */
export const withNewTraceId = <A, E, R>(self: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
  withTraceId("")(self)

/**
 * Run an effect with the id attached if it is valid, or a fresh one otherwise.
 */
export const withValidTraceId = (id: string | undefined) =>
  <A, E, R>(self: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    Effect.suspend(() => withTraceId(TraceId.orElseNew(id))(self))
