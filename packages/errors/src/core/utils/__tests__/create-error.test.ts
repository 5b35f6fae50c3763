import { BaseError } from "../../base-error"
import { createError } from "../create-error"

describe("createError", () => {
  it("creates BaseError with code and message", () => {
    const err = createError("unsupported-value", "No codec for value")

    expect(err).toBeInstanceOf(BaseError)
    expect(err.code).toBe("unsupported-value")
    expect(err.message).toBe("No codec for value")
  })

  it("accepts context and cause", () => {
    const cause = new Error("Original failure")
    const err = createError("corrupt-state", "Bad ordinal", {
      context: { ordinal: 9, candidates: 3 },
      cause,
    })

    expect(err.context).toEqual({ ordinal: 9, candidates: 3 })
    expect(err.cause).toBe(cause)
  })

  it("accepts isRetryable and isOperational", () => {
    const err = createError("invariant-violation", "Bug", {
      isRetryable: false,
      isOperational: false,
    })

    expect(err.isRetryable).toBe(false)
    expect(err.isOperational).toBe(false)
  })

  it("preserves generic code type", () => {
    type CodecCode = "corrupt-state" | "unknown-type"
    const err = createError<CodecCode>("unknown-type", "Test")

    const code: CodecCode = err.code
    expect(code).toBe("unknown-type")
  })
})
