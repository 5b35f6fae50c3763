import { createError } from "@strata/errors"

const decoder = new TextDecoder("utf-8", { fatal: true })

const MAX_SMALL_INT_BYTES = 5

/**
 * Cursor over a state stream. Reading past the end, or reading bytes that do
 * not form a valid value, fails with `corrupt-state`.
 */
export class ByteReader {
  private readonly view: DataView
  private position = 0

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  }

  get offset(): number {
    return this.position
  }

  get remaining(): number {
    return this.bytes.length - this.position
  }

  readByte(): number {
    this.require(1)
    return this.view.getUint8(this.position++)
  }

  readBoolean(): boolean {
    const offset = this.position
    const value = this.readByte()

    if (value > 1) {
      throw createError("corrupt-state", `Invalid boolean byte ${value}`, {
        context: { offset, value },
      })
    }

    return value === 1
  }

  readInt(): number {
    this.require(4)
    const value = this.view.getInt32(this.position)
    this.position += 4
    return value
  }

  readSmallInt(): number {
    const offset = this.position
    let result = 0
    let scale = 1

    for (let i = 0; i < MAX_SMALL_INT_BYTES; i++) {
      const byte = this.readByte()
      result += (byte & 0x7f) * scale

      if ((byte & 0x80) === 0) return result
      scale *= 0x80
    }

    throw createError("corrupt-state", "Small int is longer than 5 bytes", {
      context: { offset },
    })
  }

  readString(): string {
    const length = this.readSmallInt()
    const offset = this.position
    this.require(length)

    try {
      return decoder.decode(this.bytes.subarray(offset, offset + length))
    } catch (err) {
      throw createError("corrupt-state", "String is not valid UTF-8", {
        context: { offset, length },
        cause: err,
      })
    } finally {
      this.position = offset + length
    }
  }

  private require(count: number): void {
    if (this.remaining < count) {
      throw createError("corrupt-state", "Unexpected end of state", {
        context: { offset: this.position, needed: count, remaining: this.remaining },
      })
    }
  }
}
