import { type PropertyFactory, ScalarProperty } from "@strata/providers"
import type { Codec } from "../../../ports/codec"
import type { ReadContext, WriteContext } from "../../../ports/contexts"
import type { DeferredValueCodec } from "../deferred-value-codec"

export function isScalarProperty(value: unknown): value is ScalarProperty<unknown> {
  return value instanceof ScalarProperty
}

/**
 * Writes the declared type, then the provider behind the property, so a
 * changing source stays a reference.
 */
export class ScalarPropertyCodec implements Codec<ScalarProperty<unknown>> {
  constructor(
    private readonly states: DeferredValueCodec,
    private readonly properties: PropertyFactory,
  ) {}

  async encode(ctx: WriteContext, value: ScalarProperty<unknown>): Promise<void> {
    ctx.writeClass(value.type)
    await this.states.encodeProvider(ctx, value.provider)
  }

  async decode(ctx: ReadContext): Promise<ScalarProperty<unknown>> {
    const type = ctx.readClass()
    const state = await this.states.decodeValue(ctx)

    return this.properties.property(type).fromState(state)
  }
}
