import { type PropertyFactory, SetProperty } from "@strata/providers"
import type { Codec } from "../../../ports/codec"
import type { ReadContext, WriteContext } from "../../../ports/contexts"
import type { DeferredValueCodec } from "../deferred-value-codec"

export function isSetProperty(value: unknown): value is SetProperty<unknown> {
  return value instanceof SetProperty
}

export class SetPropertyCodec implements Codec<SetProperty<unknown>> {
  constructor(
    private readonly states: DeferredValueCodec,
    private readonly properties: PropertyFactory,
  ) {}

  async encode(ctx: WriteContext, value: SetProperty<unknown>): Promise<void> {
    ctx.writeClass(value.elementType)
    await this.states.encodeValue(ctx, await this.states.resolve(ctx, value))
  }

  async decode(ctx: ReadContext): Promise<SetProperty<unknown>> {
    const elementType = ctx.readClass()
    const state = await this.states.decodeValue(ctx)

    return this.properties.setProperty(elementType).fromState(state)
  }
}
