import { createError } from "@strata/errors"
import {
  DirectoryProperty,
  type PropertyFactory,
  RegularFileProperty,
  type TypeRef,
  Types,
} from "@strata/providers"
import type { Codec } from "../../../ports/codec"
import type { ReadContext, WriteContext } from "../../../ports/contexts"
import type { DeferredValueCodec } from "../deferred-value-codec"

export function isDirectoryProperty(value: unknown): value is DirectoryProperty {
  return value instanceof DirectoryProperty
}

export function isRegularFileProperty(value: unknown): value is RegularFileProperty {
  return value instanceof RegularFileProperty
}

function readDeclaredType(ctx: ReadContext, expected: TypeRef): void {
  const type = ctx.readClass()

  if (type !== expected) {
    throw createError("corrupt-state", `Expected type '${expected.name}', found '${type.name}'`, {
      context: { expected: expected.name, actual: type.name },
    })
  }
}

export class DirectoryPropertyCodec implements Codec<DirectoryProperty> {
  constructor(
    private readonly states: DeferredValueCodec,
    private readonly properties: PropertyFactory,
  ) {}

  async encode(ctx: WriteContext, value: DirectoryProperty): Promise<void> {
    ctx.writeClass(value.type)
    await this.states.encodeValue(ctx, await this.states.resolve(ctx, value))
  }

  async decode(ctx: ReadContext): Promise<DirectoryProperty> {
    readDeclaredType(ctx, Types.Directory)
    const state = await this.states.decodeValue(ctx)

    return this.properties.directoryProperty().fromState(state)
  }
}

export class RegularFilePropertyCodec implements Codec<RegularFileProperty> {
  constructor(
    private readonly states: DeferredValueCodec,
    private readonly properties: PropertyFactory,
  ) {}

  async encode(ctx: WriteContext, value: RegularFileProperty): Promise<void> {
    ctx.writeClass(value.type)
    await this.states.encodeValue(ctx, await this.states.resolve(ctx, value))
  }

  async decode(ctx: ReadContext): Promise<RegularFileProperty> {
    readDeclaredType(ctx, Types.RegularFile)
    const state = await this.states.decodeValue(ctx)

    return this.properties.fileProperty().fromState(state)
  }
}
