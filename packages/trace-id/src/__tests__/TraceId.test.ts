import { describe, it, expect } from "vitest"
import { Effect, Either, Schema } from "effect"
import * as TraceId from "../TraceId.js"

const validUUID = "550e8400-e29b-41d4-a716-446655440000"

describe("TraceId", () => {
  describe("make", () => {
    it("should generate valid, non-testing ids", () => {
      for (let i = 0; i < 20; i++) {
        const id = TraceId.make()
        expect(TraceId.isValid(id)).toBe(true)
        expect(TraceId.isTesting(id)).toBe(false)
      }
    })

    it("should generate version 4 UUIDs", () => {
      expect(TraceId.make()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/)
    })

    it("should not repeat ids", () => {
      const ids = new Set(Array.from({ length: 100 }, () => TraceId.make()))
      expect(ids.size).toBe(100)
    })

    it("should generate a new id each time next is run", async () => {
      const [a, b] = await Effect.runPromise(Effect.all([TraceId.next, TraceId.next]))
      expect(TraceId.isValid(a)).toBe(true)
      expect(a).not.toBe(b)
    })
  })

  describe("isValid", () => {
    it("should reject the empty string", () => {
      expect(TraceId.isValid("")).toBe(false)
    })

    it("should accept a canonical UUID", () => {
      expect(TraceId.isValid(validUUID)).toBe(true)
    })

    it("should reject strings that are not UUIDs", () => {
      expect(TraceId.isValid("asdasdasdas")).toBe(false)
      expect(TraceId.isValid("abc-123-invalid")).toBe(false)
      expect(TraceId.isValid(`${validUUID}0`)).toBe(false)
    })

    it("should only accept the hyphenated 36 character form", () => {
      expect(TraceId.isValid(`{${validUUID}}`)).toBe(false)
      expect(TraceId.isValid(`urn:uuid:${validUUID}`)).toBe(false)
      expect(TraceId.isValid(validUUID.replaceAll("-", ""))).toBe(false)
    })

    it("should replace non-canonical UUID forms with a fresh id", () => {
      const result = TraceId.orElseNew(`urn:uuid:${validUUID}`)
      expect(result).not.toBe(`urn:uuid:${validUUID}`)
      expect(TraceId.isValid(result)).toBe(true)
    })

    it("should accept any testing id without checking the suffix", () => {
      expect(TraceId.isValid("testing-")).toBe(true)
      expect(TraceId.isValid("testing-garbage")).toBe(true)
      expect(TraceId.isValid(`testing-${validUUID}`)).toBe(true)
    })
  })

  describe("isTesting", () => {
    it("should detect the testing prefix", () => {
      expect(TraceId.isTesting("testing-abc")).toBe(true)
      expect(TraceId.isTesting("testing-")).toBe(true)
    })

    it("should only look at the start of the string", () => {
      expect(TraceId.isTesting(validUUID)).toBe(false)
      expect(TraceId.isTesting("not-testing-abc")).toBe(false)
      expect(TraceId.isTesting("")).toBe(false)
    })
  })

  describe("withTestingPrefix", () => {
    it("should prefix an id", () => {
      expect(TraceId.withTestingPrefix(validUUID)).toBe(`testing-${validUUID}`)
      expect(TraceId.withTestingPrefix("abc")).toBe("testing-abc")
    })

    it("should not prefix twice", () => {
      const once = TraceId.withTestingPrefix("abc")
      expect(TraceId.withTestingPrefix(once)).toBe(once)
    })

    it("should generate an id when given the empty string", () => {
      const id = TraceId.withTestingPrefix("")
      expect(id.startsWith("testing-")).toBe(true)
      expect(TraceId.isValid(id.slice("testing-".length))).toBe(true)
    })
  })

  describe("orElseNew", () => {
    it("should keep a valid id", () => {
      expect(TraceId.orElseNew(validUUID)).toBe(validUUID)
      expect(TraceId.orElseNew("testing-x")).toBe("testing-x")
    })

    it("should replace missing or invalid ids", () => {
      for (const input of [undefined, "", "abc-123-invalid"]) {
        const id = TraceId.orElseNew(input)
        expect(id).not.toBe(input)
        expect(TraceId.isValid(id)).toBe(true)
      }
    })
  })

  describe("TraceId schema", () => {
    it("should decode valid ids", () => {
      const result = Schema.decodeUnknownEither(TraceId.TraceId)(validUUID)
      expect(Either.isRight(result)).toBe(true)
    })

    it("should reject invalid ids", () => {
      expect(Either.isLeft(Schema.decodeUnknownEither(TraceId.TraceId)(""))).toBe(true)
      expect(Either.isLeft(Schema.decodeUnknownEither(TraceId.TraceId)("not-a-uuid"))).toBe(true)
      expect(Either.isLeft(Schema.decodeUnknownEither(TraceId.TraceId)(42))).toBe(true)
    })
  })
})
