import type { Provider } from "@strata/providers"
import type { Codec } from "../../ports/codec"
import type { ReadContext, WriteContext } from "../../ports/contexts"
import type { DeferredValueCodec } from "./deferred-value-codec"

/**
 * A provider on its own, outside any property.
 */
export class ProviderCodec implements Codec<Provider<unknown>> {
  constructor(private readonly states: DeferredValueCodec) {}

  encode(ctx: WriteContext, value: Provider<unknown>): Promise<void> {
    return this.states.encodeProvider(ctx, value)
  }

  decode(ctx: ReadContext): Promise<Provider<unknown>> {
    return this.states.decodeProvider(ctx)
  }
}
