import { createError } from "@strata/errors"

/**
 * Write side of the identity table: instance to id, in order of first
 * encounter. One table per write pass.
 */
export class WriteIdentities {
  private readonly ids = new Map<unknown, number>()

  get size(): number {
    return this.ids.size
  }

  getId(instance: unknown): number | undefined {
    return this.ids.get(instance)
  }

  /** Assign the next id to an instance not seen before. */
  putInstance(instance: unknown): number {
    if (this.ids.has(instance)) {
      throw createError("shared-identity-violation", "Instance already has an id", {
        context: { id: this.ids.get(instance) },
        isOperational: false,
      })
    }

    const id = this.ids.size
    this.ids.set(instance, id)
    return id
  }
}

type Slot = { readonly decoded: false } | { readonly decoded: true; readonly instance: unknown }

const PENDING: Slot = Object.freeze({ decoded: false })

/**
 * Read side of the identity table: id to instance. An id is reserved when its
 * body starts decoding, so nested instances get the ids they were written with.
 */
export class ReadIdentities {
  private readonly slots: Slot[] = []

  get size(): number {
    return this.slots.length
  }

  /** Whether `id` is the next id to be decoded. */
  isNext(id: number): boolean {
    return id === this.slots.length
  }

  reserve(id: number): void {
    if (!this.isNext(id)) throw skippedAhead(id, this.slots.length)

    this.slots.push(PENDING)
  }

  putInstance(id: number, instance: unknown): void {
    const slot = this.slots[id]

    if (slot === undefined || slot.decoded) {
      throw createError("shared-identity-violation", `Id ${id} is not awaiting an instance`, {
        context: { id },
      })
    }

    this.slots[id] = { decoded: true, instance }
  }

  getInstance(id: number): unknown {
    const slot = this.slots[id]

    if (slot === undefined) throw skippedAhead(id, this.slots.length)

    if (!slot.decoded) {
      throw createError(
        "shared-identity-violation",
        `Id ${id} refers to an instance that is still being decoded`,
        { context: { id } },
      )
    }

    return slot.instance
  }
}

function skippedAhead(id: number, expected: number) {
  return createError(
    "shared-identity-violation",
    `Id ${id} skips ahead of the next expected id ${expected}`,
    { context: { id, expected } },
  )
}
