import { createError } from "@strata/errors"
import { Directory, RegularFile } from "@strata/providers"
import SuperJSON from "superjson"
import type { FallbackCodec } from "../../ports/codec"
import type { ReadContext, WriteContext } from "../../ports/contexts"

export type SerializableClass = Parameters<SuperJSON["registerClass"]>[0]

const builtInClasses: readonly unknown[] = [Object, Array, Date, RegExp, Map, Set, Error, URL]

export type SuperjsonEncoderOptions = {
  /**
   * Classes whose instances keep their prototype, keyed by a stable
   * identifier. `Directory` and `RegularFile` are always registered.
   */
  classes?: ReadonlyArray<readonly [string, SerializableClass]>
}

/**
 * Fallback encoder backed by superjson. Handles `null`, `undefined`, dates,
 * maps, sets, bigints and registered classes; each value is one string in the
 * stream.
 */
export class SuperjsonEncoder implements FallbackCodec {
  private readonly serializer = new SuperJSON()
  private readonly restorable = new Set<unknown>(builtInClasses)

  constructor(options: SuperjsonEncoderOptions = {}) {
    this.register("directory", Directory)
    this.register("regular-file", RegularFile)

    for (const [identifier, type] of options.classes ?? []) {
      this.register(identifier, type)
    }
  }

  /**
   * Primitives, plain objects, arrays and the built-ins superjson knows keep
   * their shape; other instances only when their class is registered.
   */
  canRestore(value: unknown): boolean {
    if (typeof value === "function" || typeof value === "symbol") return false
    if (typeof value !== "object" || value === null) return true
    if (Object.getPrototypeOf(value) === null) return true

    return this.restorable.has(value.constructor)
  }

  async encode(ctx: WriteContext, value: unknown): Promise<void> {
    ctx.writeString(this.serializer.stringify(value))
  }

  async decode(ctx: ReadContext): Promise<unknown> {
    const text = ctx.readString()

    try {
      return this.serializer.parse(text)
    } catch (err) {
      throw createError("corrupt-state", "Stored value is not valid superjson", {
        context: { length: text.length },
        cause: err,
      })
    }
  }

  private register(identifier: string, type: SerializableClass): void {
    this.serializer.registerClass(type, { identifier })
    this.restorable.add(type)
  }
}
