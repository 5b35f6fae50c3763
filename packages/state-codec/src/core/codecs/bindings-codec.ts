import { createError } from "@strata/errors"
import type { Codec } from "../../ports/codec"
import type { ReadContext, WriteContext } from "../../ports/contexts"

/**
 * A codec together with the check that selects it.
 */
export interface Binding {
  readonly name: string
  matches(value: unknown): boolean
  encode(ctx: WriteContext, value: unknown): Promise<void>
  decode(ctx: ReadContext): Promise<unknown>
}

export function bind<T>(
  name: string,
  accepts: (value: unknown) => value is T,
  codec: Codec<T>,
): Binding {
  return {
    name,
    matches: accepts,
    async encode(ctx, value) {
      if (!accepts(value)) {
        throw createError("invariant-violation", `Value does not match binding '${name}'`, {
          context: { binding: name },
          isOperational: false,
        })
      }

      await codec.encode(ctx, value)
    },
    decode: (ctx) => codec.decode(ctx),
  }
}

/**
 * Dispatches among bindings in a fixed order. The index of the first binding
 * that matches is written as one byte ahead of the value.
 *
 * Indices are part of the stored format: new bindings go at the end.
 */
export class BindingsCodec implements Codec<unknown> {
  constructor(private readonly bindings: readonly Binding[]) {
    if (bindings.length > 0x100) {
      throw createError("invariant-violation", "At most 256 bindings fit in an ordinal byte", {
        context: { count: bindings.length },
        isOperational: false,
      })
    }
  }

  async encode(ctx: WriteContext, value: unknown): Promise<void> {
    const ordinal = this.bindings.findIndex((binding) => binding.matches(value))
    const binding = this.bindings[ordinal]

    if (binding === undefined) {
      throw createError("unsupported-value", `No codec supports ${describe(value)}`, {
        context: { value: describe(value), bindings: this.bindings.map((b) => b.name) },
        isOperational: false,
      })
    }

    ctx.writeByte(ordinal)
    await binding.encode(ctx, value)
  }

  async decode(ctx: ReadContext): Promise<unknown> {
    const ordinal = ctx.readByte()
    const binding = this.bindings[ordinal]

    if (binding === undefined) {
      throw createError("corrupt-state", `Unknown codec ordinal ${ordinal}`, {
        context: { ordinal, bindings: this.bindings.length },
      })
    }

    return binding.decode(ctx)
  }
}

function describe(value: unknown): string {
  if (value === null) return "null"
  if (typeof value === "function") return `function ${value.name}`
  if (typeof value !== "object") return typeof value

  const hasOwnToString =
    typeof value.toString === "function" && value.toString !== Object.prototype.toString

  return hasOwnToString ? String(value) : (value.constructor?.name ?? "object")
}
