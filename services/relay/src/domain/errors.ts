import { Data } from "effect"

/**
 * The upstream service could not be reached or did not answer in time.
 */
export class UpstreamConnectionError extends Data.TaggedError("UpstreamConnectionError")<{
  readonly url: string
  readonly reason: string
}> {}
