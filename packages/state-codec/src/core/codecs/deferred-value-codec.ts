import { createError } from "@strata/errors"
import {
  type BrokenValue,
  type DeferredValue,
  ExecutionTimeValues,
  isProvider,
  type Provider,
  toProvider,
} from "@strata/providers"
import type { Codec } from "../../ports/codec"
import type { ReadContext, WriteContext } from "../../ports/contexts"

/**
 * Leading byte of a stored provider state. Part of the stored format.
 */
export const StateTags = {
  Broken: 0,
  Missing: 1,
  Fixed: 2,
  Changing: 3,
} as const

/**
 * Stores a provider as its execution-time value: fixed values replace the
 * provider, changing values keep a reference to it, and failures are
 * captured for later.
 */
export class DeferredValueCodec {
  constructor(
    private readonly changing: Codec<unknown>,
    private readonly broken: Codec<BrokenValue>,
  ) {}

  /**
   * Classify a provider for storage. A failure is captured as a broken state
   * and reported as a problem of the entry being written.
   */
  async resolve(ctx: WriteContext, provider: Provider<unknown>): Promise<DeferredValue<unknown>> {
    try {
      return await provider.calculateExecutionTimeValue()
    } catch (err) {
      ctx.problems.report({
        trace: ctx.trace,
        message: `value ${provider.toString()} failed to unpack provider`,
        error: err,
      })
      return ExecutionTimeValues.broken(err)
    }
  }

  async encodeProvider(ctx: WriteContext, provider: Provider<unknown>): Promise<void> {
    await this.encodeValue(ctx, await this.resolve(ctx, provider))
  }

  async encodeValue(ctx: WriteContext, state: DeferredValue<unknown>): Promise<void> {
    switch (state.kind) {
      case "broken":
        ctx.writeByte(StateTags.Broken)
        await this.broken.encode(ctx, state.failure)
        return
      case "missing":
        ctx.writeByte(StateTags.Missing)
        return
      case "fixed":
        ctx.writeByte(StateTags.Fixed)
        await ctx.write(state.value)
        return
      case "changing":
        ctx.writeByte(StateTags.Changing)
        await this.changing.encode(ctx, state.provider)
        return
    }
  }

  async decodeProvider(ctx: ReadContext): Promise<Provider<unknown>> {
    return toProvider(await this.decodeValue(ctx))
  }

  async decodeValue(ctx: ReadContext): Promise<DeferredValue<unknown>> {
    const tag = ctx.readByte()

    switch (tag) {
      case StateTags.Broken:
        return { kind: "broken", failure: await this.broken.decode(ctx) }
      case StateTags.Missing:
        return ExecutionTimeValues.missing()
      case StateTags.Fixed:
        return ExecutionTimeValues.ofNullable(await ctx.read())
      case StateTags.Changing: {
        const provider = await this.changing.decode(ctx)

        if (!isProvider(provider)) {
          throw createError("corrupt-state", "Changing value does not restore to a provider", {
            context: { tag },
          })
        }

        return ExecutionTimeValues.changing(provider)
      }
      default:
        throw createError("corrupt-state", `Unknown provider state tag ${tag}`, {
          context: { tag },
        })
    }
  }
}
