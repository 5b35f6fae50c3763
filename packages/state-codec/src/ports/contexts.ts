import type { Logger } from "@strata/logger"
import type { TypeRef } from "@strata/providers"
import type { ReadIdentities, WriteIdentities } from "../core/identity/identity-tables"
import type { ProblemReporter } from "../core/problems/problem-reporter"

/**
 * Everything one write pass shares between codecs.
 */
export interface WriteContext {
  readonly logger: Logger
  readonly sharedIdentities: WriteIdentities
  readonly problems: ProblemReporter
  /** Name of the state entry being written. */
  readonly trace: string

  writeByte(value: number): void
  writeBoolean(value: boolean): void
  /** Signed 32-bit integer. */
  writeInt(value: number): void
  /** Unsigned integer in a variable number of bytes. */
  writeSmallInt(value: number): void
  writeString(value: string): void
  /** Stores a stable identifier for the type. */
  writeClass(type: TypeRef): void
  /** Writes any value, including `null` and `undefined`, with the fallback encoder. */
  write(value: unknown): Promise<void>
}

/**
 * Everything one read pass shares between codecs.
 */
export interface ReadContext {
  readonly logger: Logger
  readonly sharedIdentities: ReadIdentities

  readByte(): number
  readBoolean(): boolean
  readInt(): number
  readSmallInt(): number
  readString(): string
  readClass(): TypeRef
  read(): Promise<unknown>
}
