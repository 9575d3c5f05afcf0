/**
 * Trace id policy: generation, validation and the testing marker.
 *
 * A standard trace id is the canonical text form of a UUID, e.g.
 * 550e8400-e29b-41d4-a716-446655440000. A testing trace id is any string
 * starting with "testing-" and is used to keep test traffic out of audit
 * pipelines downstream.
 */

import { Effect, Schema } from "effect"
import { randomUUID } from "node:crypto"

export const TraceIdHeader = "X-Trace-Id"

export const TraceIdLogKey = "trace_id"

export const TestingPrefix = "testing-"

const isUUID = Schema.is(Schema.UUID)

/**
 * Generate a new random (v4) trace id.
 */
export const make = (): string => randomUUID()

/**
 * Suspended {@link make}, for use inside Effect pipelines.
 */
export const next: Effect.Effect<string> = Effect.sync(make)

/**
 * Whether the id was crafted for testing purposes only.
 */
export const isTesting = (id: string): boolean => id.startsWith(TestingPrefix)

/**
 * Empty ids are invalid. Testing ids are accepted without looking at the
 * suffix; anything else must parse as a UUID.
 */
export const isValid = (id: string): boolean => {
  if (id === "") {
    return false
  }

  if (isTesting(id)) {
    return true
  }

  return isUUID(id)
}

/**
 * Prefix the id with the testing marker unless it already carries it.
 * An empty id is replaced with a fresh one first.
 */
export const withTestingPrefix = (id: string): string => {
  if (isTesting(id)) {
    return id
  }

  return TestingPrefix + (id === "" ? make() : id)
}

/**
 * Return the id when it is valid, otherwise a fresh one.
 */
export const orElseNew = (id: string | undefined): string =>
  id !== undefined && isValid(id) ? id : make()

// Branded schema for callers that want the check carried in the type
export const TraceId = Schema.String.pipe(
  Schema.filter(isValid, { message: () => "Invalid trace id" }),
  Schema.brand("TraceId")
)
export type TraceId = typeof TraceId.Type
