import { Context, Effect } from "effect"
import type { UpstreamConnectionError } from "../domain/errors.js"

export interface FetchUpstreamParams {
  readonly path: string
  // Explicit trace id to send instead of the one in the current context
  readonly traceId?: string
}

export interface FetchUpstreamResult {
  readonly status: number
  // X-Trace-Id echoed back by the upstream, if any
  readonly traceId: string | undefined
}

export class UpstreamClient extends Context.Tag("UpstreamClient")<
  UpstreamClient,
  {
    /**
     * GET a path on the upstream service.
     * The request carries the current trace id unless params.traceId is set.
     * Any HTTP status is a success; only transport failures and timeouts fail.
     */
    readonly fetch: (
      params: FetchUpstreamParams
    ) => Effect.Effect<FetchUpstreamResult, UpstreamConnectionError>
  }
>() {}
