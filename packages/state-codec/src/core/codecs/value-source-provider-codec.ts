import { createError } from "@strata/errors"
import { ValueSourceProvider, type ValueSourceProviderFactory } from "@strata/providers"
import type { Codec } from "../../ports/codec"
import type { ReadContext, WriteContext } from "../../ports/contexts"
import {
  decodePreservingSharedIdentity,
  encodePreservingSharedIdentityOf,
} from "../identity/shared-identity"
import { isClassType, isValueSourceType } from "./type-guards"

export function isValueSourceProvider(
  value: unknown,
): value is ValueSourceProvider<unknown, unknown> {
  return value instanceof ValueSourceProvider
}

/**
 * Stores a value source that has not been obtained yet as a reference, so
 * the next run reads the source again.
 */
export class ValueSourceProviderCodec implements Codec<ValueSourceProvider<unknown, unknown>> {
  constructor(private readonly factory: ValueSourceProviderFactory) {}

  async encode(ctx: WriteContext, value: ValueSourceProvider<unknown, unknown>): Promise<void> {
    if (value.obtainedValueOrNull !== undefined) {
      throw createError(
        "invariant-violation",
        `Cannot store ${value.toString()} because its value was already obtained`,
        {
          context: { valueSource: value.valueSourceType.name, entry: ctx.trace },
          isOperational: false,
        },
      )
    }

    ctx.writeBoolean(true)
    await encodePreservingSharedIdentityOf(ctx, value, async (provider) => {
      ctx.writeClass(provider.valueSourceType)
      ctx.writeClass(provider.parametersType)
      await ctx.write(provider.parameters)
    })
  }

  async decode(ctx: ReadContext): Promise<ValueSourceProvider<unknown, unknown>> {
    if (!ctx.readBoolean()) {
      throw createError("corrupt-state", "Value source reference is not marked as stored", {
        context: { codec: "value-source" },
      })
    }

    return decodePreservingSharedIdentity(ctx, isValueSourceProvider, async () => {
      const valueSourceType = ctx.readClass()
      const parametersType = ctx.readClass()
      const parameters = await ctx.read()

      if (!isValueSourceType(valueSourceType) || !isClassType(parametersType)) {
        throw createError("corrupt-state", "Stored types do not describe a value source", {
          context: { valueSource: valueSourceType.name, parameters: parametersType.name },
        })
      }

      return this.factory.instantiateValueSourceProvider(
        valueSourceType,
        parametersType,
        parameters,
      )
    })
  }
}
