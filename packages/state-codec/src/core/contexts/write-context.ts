import type { Logger } from "@strata/logger"
import type { TypeRef, TypeRegistry } from "@strata/providers"
import type { Codec } from "../../ports/codec"
import type { WriteContext } from "../../ports/contexts"
import { WriteIdentities } from "../identity/identity-tables"
import { ByteWriter } from "../io/byte-writer"
import type { ProblemReporter } from "../problems/problem-reporter"

export type WriteSessionDeps = {
  types: TypeRegistry
  fallback: Codec<unknown>
  logger: Logger
  problems: ProblemReporter
  initialBufferSize?: number
}

/**
 * Context of one write pass.
 */
export class WriteSession implements WriteContext {
  readonly sharedIdentities = new WriteIdentities()
  readonly problems: ProblemReporter

  private readonly writer: ByteWriter
  private readonly types: TypeRegistry
  private readonly fallback: Codec<unknown>
  private readonly sessionLogger: Logger
  private entryLogger: Logger
  private entry = ""

  constructor(deps: WriteSessionDeps) {
    this.writer = new ByteWriter(deps.initialBufferSize)
    this.types = deps.types
    this.fallback = deps.fallback
    this.problems = deps.problems
    this.sessionLogger = deps.logger
    this.entryLogger = deps.logger
  }

  get logger(): Logger {
    return this.entryLogger
  }

  get trace(): string {
    return this.entry
  }

  get size(): number {
    return this.writer.size
  }

  /** Scope logs and reported problems to a state entry. */
  enterEntry(name: string): void {
    this.entry = name
    this.entryLogger = this.sessionLogger.child({ entry: name })
  }

  writeByte(value: number): void {
    this.writer.writeByte(value)
  }

  writeBoolean(value: boolean): void {
    this.writer.writeBoolean(value)
  }

  writeInt(value: number): void {
    this.writer.writeInt(value)
  }

  writeSmallInt(value: number): void {
    this.writer.writeSmallInt(value)
  }

  writeString(value: string): void {
    this.writer.writeString(value)
  }

  writeClass(type: TypeRef): void {
    this.writer.writeString(this.types.idOf(type))
  }

  write(value: unknown): Promise<void> {
    return this.fallback.encode(this, value)
  }

  toBytes(): Uint8Array {
    return this.writer.toBytes()
  }
}
