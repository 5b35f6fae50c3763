import { MapProperty, type PropertyFactory } from "@strata/providers"
import type { Codec } from "../../../ports/codec"
import type { ReadContext, WriteContext } from "../../../ports/contexts"
import type { DeferredValueCodec } from "../deferred-value-codec"

export function isMapProperty(value: unknown): value is MapProperty<unknown, unknown> {
  return value instanceof MapProperty
}

/** Key type, value type, then the resolved map. */
export class MapPropertyCodec implements Codec<MapProperty<unknown, unknown>> {
  constructor(
    private readonly states: DeferredValueCodec,
    private readonly properties: PropertyFactory,
  ) {}

  async encode(ctx: WriteContext, value: MapProperty<unknown, unknown>): Promise<void> {
    ctx.writeClass(value.keyType)
    ctx.writeClass(value.valueType)
    await this.states.encodeValue(ctx, await this.states.resolve(ctx, value))
  }

  async decode(ctx: ReadContext): Promise<MapProperty<unknown, unknown>> {
    const keyType = ctx.readClass()
    const valueType = ctx.readClass()
    const state = await this.states.decodeValue(ctx)

    return this.properties.mapProperty(keyType, valueType).fromState(state)
  }
}
