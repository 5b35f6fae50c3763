import { createError } from "@strata/errors"

const encoder = new TextEncoder()

const MAX_SMALL_INT = 0xffff_ffff

/**
 * Growable big-endian byte buffer.
 */
export class ByteWriter {
  private buffer: Uint8Array
  private view: DataView
  private length = 0

  constructor(initialSize: number = 1024) {
    this.buffer = new Uint8Array(Math.max(initialSize, 16))
    this.view = new DataView(this.buffer.buffer)
  }

  get size(): number {
    return this.length
  }

  writeByte(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
      throw outOfRange("byte", value)
    }

    this.ensure(1)
    this.buffer[this.length++] = value
  }

  writeBoolean(value: boolean): void {
    this.writeByte(value ? 1 : 0)
  }

  writeInt(value: number): void {
    if (!Number.isInteger(value) || value < -0x8000_0000 || value > 0x7fff_ffff) {
      throw outOfRange("int", value)
    }

    this.ensure(4)
    this.view.setInt32(this.length, value)
    this.length += 4
  }

  /** Unsigned LEB128. */
  writeSmallInt(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > MAX_SMALL_INT) {
      throw outOfRange("small int", value)
    }

    let rest = value
    while (rest >= 0x80) {
      this.writeByte((rest % 0x80) | 0x80)
      rest = Math.floor(rest / 0x80)
    }
    this.writeByte(rest)
  }

  writeString(value: string): void {
    const bytes = encoder.encode(value)

    this.writeSmallInt(bytes.length)
    this.ensure(bytes.length)
    this.buffer.set(bytes, this.length)
    this.length += bytes.length
  }

  /** A copy of the bytes written so far. */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.length)
  }

  private ensure(extra: number): void {
    const needed = this.length + extra
    if (needed <= this.buffer.length) return

    let capacity = this.buffer.length * 2
    while (capacity < needed) capacity *= 2

    const grown = new Uint8Array(capacity)
    grown.set(this.buffer.subarray(0, this.length))
    this.buffer = grown
    this.view = new DataView(grown.buffer)
  }
}

function outOfRange(kind: string, value: number) {
  return createError("invariant-violation", `Cannot write ${value} as a ${kind}`, {
    context: { kind, value },
    isOperational: false,
  })
}
