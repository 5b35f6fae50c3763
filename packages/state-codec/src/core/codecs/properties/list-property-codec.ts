import { ListProperty, type PropertyFactory } from "@strata/providers"
import type { Codec } from "../../../ports/codec"
import type { ReadContext, WriteContext } from "../../../ports/contexts"
import type { DeferredValueCodec } from "../deferred-value-codec"

export function isListProperty(value: unknown): value is ListProperty<unknown> {
  return value instanceof ListProperty
}

export class ListPropertyCodec implements Codec<ListProperty<unknown>> {
  constructor(
    private readonly states: DeferredValueCodec,
    private readonly properties: PropertyFactory,
  ) {}

  async encode(ctx: WriteContext, value: ListProperty<unknown>): Promise<void> {
    ctx.writeClass(value.elementType)
    await this.states.encodeValue(ctx, await this.states.resolve(ctx, value))
  }

  async decode(ctx: ReadContext): Promise<ListProperty<unknown>> {
    const elementType = ctx.readClass()
    const state = await this.states.decodeValue(ctx)

    return this.properties.listProperty(elementType).fromState(state)
  }
}
