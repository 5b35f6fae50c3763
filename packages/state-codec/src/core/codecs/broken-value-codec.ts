import {
  createError,
  deserializeError,
  errorChain,
  type SerializedError,
  serializeError,
} from "@strata/errors"
import { BrokenValue } from "@strata/providers"
import type { Codec } from "../../ports/codec"
import type { ReadContext, WriteContext } from "../../ports/contexts"
import { isRecord } from "./type-guards"

type StoredLink = Omit<SerializedError, "cause">

/**
 * Stores a captured failure as its cause chain, outermost first. Each link
 * keeps name, code, message, operational flag, timestamp, context and stack.
 *
 * The failure is restored as a `BaseError` carrying the original name, and is
 * only raised when the restored value is evaluated.
 */
export class BrokenValueCodec implements Codec<BrokenValue> {
  async encode(ctx: WriteContext, value: BrokenValue): Promise<void> {
    const links = errorChain(value.failure)
    // A thrown null or undefined has no chain; it is stored as one link.
    const chain = links.length > 0 ? links : [value.failure]

    ctx.writeSmallInt(chain.length)

    for (const link of chain) {
      const { name, code, message, isOperational, timestamp, context, stack } = serializeError(
        link,
        { includeStack: true },
      )

      ctx.writeString(name)
      ctx.writeString(code)
      ctx.writeString(message)
      ctx.writeBoolean(isOperational)
      ctx.writeString(timestamp)
      await ctx.write(context)
      ctx.writeBoolean(stack !== undefined)
      if (stack !== undefined) ctx.writeString(stack)
    }
  }

  async decode(ctx: ReadContext): Promise<BrokenValue> {
    const count = ctx.readSmallInt()

    const links: StoredLink[] = []
    for (let i = 0; i < count; i++) {
      links.push(await readLink(ctx))
    }

    const innermost = links.pop()
    if (innermost === undefined) {
      throw createError("corrupt-state", "Stored failure has no errors in its chain", {
        context: { codec: "broken-value" },
      })
    }

    const serialized = links.reduceRight<SerializedError>(
      (cause, link) => ({ ...link, cause }),
      innermost,
    )

    return new BrokenValue(deserializeError(serialized))
  }
}

async function readLink(ctx: ReadContext): Promise<StoredLink> {
  const name = ctx.readString()
  const code = ctx.readString()
  const message = ctx.readString()
  const isOperational = ctx.readBoolean()
  const timestamp = ctx.readString()
  const context = await ctx.read()
  const stack = ctx.readBoolean() ? ctx.readString() : undefined

  if (!isRecord(context)) {
    throw createError("corrupt-state", "Stored error context is not an object", {
      context: { error: name },
    })
  }

  return {
    name,
    code,
    message,
    isOperational,
    timestamp,
    context,
    ...(stack !== undefined && { stack }),
  }
}
