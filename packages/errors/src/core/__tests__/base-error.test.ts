import { BaseError } from "../base-error"

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("creates error with required fields", () => {
      const err = new BaseError("Unexpected provider state tag", { code: "corrupt-state" })

      expect(err.message).toBe("Unexpected provider state tag")
      expect(err.code).toBe("corrupt-state")
    })

    it("sets name to constructor name", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.name).toBe("BaseError")
    })

    it("defaults isRetryable to false and isOperational to true", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
    })

    it("sets timestamp to current time", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("keeps an explicit timestamp", () => {
      const raisedAt = new Date("2023-12-31T23:59:59.000Z")
      const err = new BaseError("test", { code: "test", timestamp: raisedAt })

      expect(err.timestamp).toBe(raisedAt)
    })

    it("accepts context and cause", () => {
      const cause = new Error("root cause")
      const err = new BaseError("wrapped", {
        code: "test",
        context: { tag: 7, offset: 12 },
        cause,
      })

      expect(err.context).toEqual({ tag: 7, offset: 12 })
      expect(err.cause).toBe(cause)
    })

    it("freezes context, including the default empty one", () => {
      const withContext = new BaseError("test", { code: "test", context: { foo: "bar" } })
      const withoutContext = new BaseError("test", { code: "test" })

      expect(Object.isFrozen(withContext.context)).toBe(true)
      expect(withoutContext.context).toEqual({})
      expect(Object.isFrozen(withoutContext.context)).toBe(true)
    })

    it("has a stack trace", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.stack).toContain("BaseError")
    })
  })

  describe("type safety", () => {
    it("preserves generic code type", () => {
      type CodecCode = "corrupt-state" | "unsupported-value"
      const err = new BaseError<CodecCode>("bad tag", { code: "corrupt-state" })

      const code: CodecCode = err.code
      expect(code).toBe("corrupt-state")
    })
  })

  describe("inheritance", () => {
    it("is instanceof Error and BaseError", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err).toBeInstanceOf(Error)
      expect(err).toBeInstanceOf(BaseError)
    })
  })

  describe("toJSON", () => {
    it("returns serialized error", () => {
      const err = new BaseError("test error", {
        code: "test",
        context: { id: 123 },
      })

      expect(err.toJSON()).toEqual({
        name: "BaseError",
        code: "test",
        message: "test error",
        context: { id: 123 },
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })
  })
})
