import { createError } from "@strata/errors"
import type { ReadContext, WriteContext } from "../../ports/contexts"

/**
 * Write `value` once per pass. The first encounter writes a new id followed
 * by the body; later encounters write the id only.
 */
export async function encodePreservingSharedIdentityOf<T>(
  ctx: WriteContext,
  value: T,
  writeBody: (value: T) => Promise<void>,
): Promise<void> {
  const existing = ctx.sharedIdentities.getId(value)

  if (existing !== undefined) {
    ctx.writeSmallInt(existing)
    return
  }

  ctx.writeSmallInt(ctx.sharedIdentities.putInstance(value))
  await writeBody(value)
}

/**
 * Read a value written by {@link encodePreservingSharedIdentityOf}. The body
 * runs on the first encounter of an id; later encounters return the same
 * instance, which must pass `accepts`.
 */
export async function decodePreservingSharedIdentity<T>(
  ctx: ReadContext,
  accepts: (value: unknown) => value is T,
  readBody: (id: number) => Promise<T>,
): Promise<T> {
  const id = ctx.readSmallInt()
  const table = ctx.sharedIdentities

  if (!table.isNext(id)) {
    const instance = table.getInstance(id)

    if (!accepts(instance)) {
      throw createError("shared-identity-violation", `Id ${id} refers to an instance of another kind`, {
        context: { id },
      })
    }

    return instance
  }

  table.reserve(id)
  const instance = await readBody(id)
  table.putInstance(id, instance)

  return instance
}
