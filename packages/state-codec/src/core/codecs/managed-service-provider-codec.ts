import { createError } from "@strata/errors"
import { type ManagedServiceRegistry, ManagedServiceProvider } from "@strata/providers"
import type { Codec } from "../../ports/codec"
import type { ReadContext, WriteContext } from "../../ports/contexts"
import {
  decodePreservingSharedIdentity,
  encodePreservingSharedIdentityOf,
} from "../identity/shared-identity"
import { isManagedServiceType } from "./type-guards"

export function isManagedServiceProvider(
  value: unknown,
): value is ManagedServiceProvider<unknown> {
  return value instanceof ManagedServiceProvider
}

/**
 * Stores a shared service by registration, so every reference to it in one
 * pass reads back as the same provider.
 */
export class ManagedServiceProviderCodec implements Codec<ManagedServiceProvider<unknown>> {
  constructor(private readonly registry: ManagedServiceRegistry) {}

  async encode(ctx: WriteContext, value: ManagedServiceProvider<unknown>): Promise<void> {
    await encodePreservingSharedIdentityOf(ctx, value, async (provider) => {
      ctx.writeString(provider.name)
      ctx.writeClass(provider.implementationType)
      await ctx.write(provider.parameters)
      ctx.writeInt(this.registry.usageLimitOf(provider))
    })
  }

  async decode(ctx: ReadContext): Promise<ManagedServiceProvider<unknown>> {
    return decodePreservingSharedIdentity(ctx, isManagedServiceProvider, async () => {
      const name = ctx.readString()
      const implementationType = ctx.readClass()
      const parameters = await ctx.read()
      const maxUsages = ctx.readInt()

      if (!isManagedServiceType(implementationType)) {
        throw createError("corrupt-state", `Stored type of service '${name}' is not a class`, {
          context: { service: name, type: implementationType.name },
        })
      }

      ctx.logger.debug("Registering stored service", { service: name, maxUsages })

      return this.registry.register(name, implementationType, parameters, maxUsages)
    })
  }
}
