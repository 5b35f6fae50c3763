import { BaseError, createError } from "@strata/errors"
import type { Logger } from "@strata/logger"
import type { TypeRef, TypeRegistry } from "@strata/providers"
import type { Codec } from "../../ports/codec"
import type { ReadContext } from "../../ports/contexts"
import { ReadIdentities } from "../identity/identity-tables"
import { ByteReader } from "../io/byte-reader"

export type ReadSessionDeps = {
  types: TypeRegistry
  fallback: Codec<unknown>
  logger: Logger
}

/**
 * Context of one read pass.
 */
export class ReadSession implements ReadContext {
  readonly sharedIdentities = new ReadIdentities()
  readonly logger: Logger

  private readonly reader: ByteReader
  private readonly types: TypeRegistry
  private readonly fallback: Codec<unknown>

  constructor(bytes: Uint8Array, deps: ReadSessionDeps) {
    this.reader = new ByteReader(bytes)
    this.types = deps.types
    this.fallback = deps.fallback
    this.logger = deps.logger
  }

  get offset(): number {
    return this.reader.offset
  }

  get remaining(): number {
    return this.reader.remaining
  }

  readByte(): number {
    return this.reader.readByte()
  }

  readBoolean(): boolean {
    return this.reader.readBoolean()
  }

  readInt(): number {
    return this.reader.readInt()
  }

  readSmallInt(): number {
    return this.reader.readSmallInt()
  }

  readString(): string {
    return this.reader.readString()
  }

  /** An id the type registry does not know means the state is corrupt. */
  readClass(): TypeRef {
    const offset = this.reader.offset
    const id = this.reader.readString()

    try {
      return this.types.resolve(id)
    } catch (err) {
      if (err instanceof BaseError && err.code === "unknown-type") {
        throw createError("corrupt-state", `Unknown type id '${id}'`, {
          context: { id, offset },
          cause: err,
        })
      }
      throw err
    }
  }

  read(): Promise<unknown> {
    return this.fallback.decode(this)
  }
}
