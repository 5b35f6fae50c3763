import { ByteReader } from "../byte-reader"
import { ByteWriter } from "../byte-writer"

function written(write: (writer: ByteWriter) => void): number[] {
  const writer = new ByteWriter()
  write(writer)
  return [...writer.toBytes()]
}

describe("ByteWriter", () => {
  it("writes ints as four big-endian bytes", () => {
    expect(written((w) => w.writeInt(1))).toEqual([0, 0, 0, 1])
    expect(written((w) => w.writeInt(-1))).toEqual([0xff, 0xff, 0xff, 0xff])
  })

  it("writes small ints in as few bytes as possible", () => {
    expect(written((w) => w.writeSmallInt(0))).toEqual([0])
    expect(written((w) => w.writeSmallInt(127))).toEqual([0x7f])
    expect(written((w) => w.writeSmallInt(300))).toEqual([0xac, 0x02])
  })

  it("writes strings as byte length then UTF-8", () => {
    expect(written((w) => w.writeString("hé"))).toEqual([3, 0x68, 0xc3, 0xa9])
  })

  it("writes booleans as one byte", () => {
    expect(written((w) => {
      w.writeBoolean(true)
      w.writeBoolean(false)
    })).toEqual([1, 0])
  })

  it("grows past its initial size", () => {
    const writer = new ByteWriter(16)

    for (let i = 0; i < 100; i++) writer.writeInt(i)

    expect(writer.size).toBe(400)
    expect(new ByteReader(writer.toBytes()).readInt()).toBe(0)
  })

  it("rejects values that do not fit", () => {
    const writer = new ByteWriter()

    expect(() => writer.writeByte(256)).toThrow(
      expect.objectContaining({ code: "invariant-violation" }),
    )
    expect(() => writer.writeSmallInt(-1)).toThrow(
      expect.objectContaining({ code: "invariant-violation" }),
    )
    expect(() => writer.writeInt(2 ** 31)).toThrow(
      expect.objectContaining({ code: "invariant-violation" }),
    )
  })
})

describe("ByteReader", () => {
  it("reads back what was written", () => {
    const writer = new ByteWriter()
    writer.writeByte(7)
    writer.writeBoolean(true)
    writer.writeInt(-123456)
    writer.writeSmallInt(0xffff_ffff)
    writer.writeString("state")

    const reader = new ByteReader(writer.toBytes())

    expect(reader.readByte()).toBe(7)
    expect(reader.readBoolean()).toBe(true)
    expect(reader.readInt()).toBe(-123456)
    expect(reader.readSmallInt()).toBe(0xffff_ffff)
    expect(reader.readString()).toBe("state")
    expect(reader.remaining).toBe(0)
  })

  it("fails with corrupt-state at the end of the stream", () => {
    const reader = new ByteReader(new Uint8Array([0, 0]))

    expect(() => reader.readInt()).toThrow(
      expect.objectContaining({
        code: "corrupt-state",
        context: { offset: 0, needed: 4, remaining: 2 },
      }),
    )
  })

  it("rejects a string longer than the stream", () => {
    const reader = new ByteReader(new Uint8Array([5, 0x61]))

    expect(() => reader.readString()).toThrow(expect.objectContaining({ code: "corrupt-state" }))
  })

  it("rejects invalid UTF-8", () => {
    const reader = new ByteReader(new Uint8Array([1, 0xff]))

    expect(() => reader.readString()).toThrow(
      expect.objectContaining({ code: "corrupt-state", message: "String is not valid UTF-8" }),
    )
    expect(reader.remaining).toBe(0)
  })

  it("rejects boolean bytes other than 0 and 1", () => {
    expect(() => new ByteReader(new Uint8Array([2])).readBoolean()).toThrow(
      expect.objectContaining({ code: "corrupt-state", context: { offset: 0, value: 2 } }),
    )
  })

  it("rejects small ints longer than five bytes", () => {
    const reader = new ByteReader(new Uint8Array([0x80, 0x80, 0x80, 0x80, 0x80, 0x01]))

    expect(() => reader.readSmallInt()).toThrow(
      expect.objectContaining({ code: "corrupt-state", message: "Small int is longer than 5 bytes" }),
    )
  })

  it("reads from a view into a larger buffer", () => {
    const backing = new Uint8Array([9, 0, 0, 0, 42])
    const reader = new ByteReader(backing.subarray(1))

    expect(reader.readInt()).toBe(42)
  })
})
