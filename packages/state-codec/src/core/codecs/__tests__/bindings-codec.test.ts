import type { Codec } from "../../../ports/codec"
import { sessionHarness } from "../../__tests__/session-harness"
import { BindingsCodec, bind } from "../bindings-codec"

const numbers: Codec<number> = {
  async encode(ctx, value) {
    ctx.writeInt(value)
  },
  async decode(ctx) {
    return ctx.readInt()
  },
}

const strings: Codec<string> = {
  async encode(ctx, value) {
    ctx.writeString(value)
  },
  async decode(ctx) {
    return ctx.readString()
  },
}

const isNumber = (v: unknown): v is number => typeof v === "number"
const isString = (v: unknown): v is string => typeof v === "string"
const isInteger = (v: unknown): v is number => Number.isInteger(v)

describe("BindingsCodec", () => {
  const harness = sessionHarness()

  it("writes the ordinal of the first matching binding", async () => {
    const codec = new BindingsCodec([bind("string", isString, strings), bind("number", isNumber, numbers)])
    const ctx = harness.writer()

    await codec.encode(ctx, 5)

    expect([...ctx.toBytes()]).toEqual([1, 0, 0, 0, 5])
  })

  it("prefers earlier bindings when several match", async () => {
    const numberFirst = new BindingsCodec([bind("number", isNumber, numbers), bind("integer", isInteger, numbers)])
    const integerFirst = new BindingsCodec([bind("integer", isInteger, numbers), bind("number", isNumber, numbers)])

    const a = harness.writer()
    const b = harness.writer()
    await numberFirst.encode(a, 3)
    await integerFirst.encode(b, 3)

    expect(a.toBytes()[0]).toBe(0)
    expect(b.toBytes()[0]).toBe(0)

    const c = harness.writer()
    await integerFirst.encode(c, 1.5)
    expect(c.toBytes()[0]).toBe(1)
  })

  it("decodes with the binding named by the ordinal", async () => {
    const codec = new BindingsCodec([bind("string", isString, strings), bind("number", isNumber, numbers)])
    const ctx = harness.writer()
    await codec.encode(ctx, "state")
    await codec.encode(ctx, 12)

    const reader = harness.reader(ctx.toBytes())

    await expect(codec.decode(reader)).resolves.toBe("state")
    await expect(codec.decode(reader)).resolves.toBe(12)
  })

  it("rejects values no binding supports", async () => {
    const codec = new BindingsCodec([bind("number", isNumber, numbers)])

    await expect(codec.encode(harness.writer(), "text")).rejects.toMatchObject({
      code: "unsupported-value",
      context: { value: "string", bindings: ["number"] },
    })
  })

  it("rejects an ordinal out of range", async () => {
    const codec = new BindingsCodec([bind("number", isNumber, numbers)])

    await expect(codec.decode(harness.reader(new Uint8Array([1])))).rejects.toMatchObject({
      code: "corrupt-state",
      context: { ordinal: 1, bindings: 1 },
    })
  })

  it("names the class of unsupported objects", async () => {
    class Unsupported {}
    const codec = new BindingsCodec([bind("number", isNumber, numbers)])

    await expect(codec.encode(harness.writer(), new Unsupported())).rejects.toMatchObject({
      message: "No codec supports Unsupported",
    })
  })
})
