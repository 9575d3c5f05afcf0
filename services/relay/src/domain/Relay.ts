import { Schema } from "effect"
import { TraceId } from "@correlate/trace-id"

// Request schema for POST /relay
export class RelayRequest extends Schema.Class<RelayRequest>("RelayRequest")({
  path: Schema.String.pipe(
    Schema.startsWith("/", { message: () => "Path must start with /" })
  ),
  // Forwarded as-is instead of the request's own trace id
  trace_id: Schema.optional(TraceId.TraceId)
}) {}
