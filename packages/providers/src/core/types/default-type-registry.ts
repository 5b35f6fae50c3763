import { createError } from "@strata/errors"
import type { TypeRef, TypeRegistry } from "../../ports/types"
import { Types } from "./types"

/**
 * In-memory registry. The built-in tokens from {@link Types} are registered
 * under their own names.
 */
export class DefaultTypeRegistry implements TypeRegistry {
  private readonly byId = new Map<string, TypeRef>()
  private readonly ids = new Map<TypeRef, string>()

  constructor() {
    for (const token of Object.values(Types)) {
      this.register(token.name, token)
    }
  }

  register(id: string, type: TypeRef): this {
    const existing = this.byId.get(id)

    if (existing === type) return this
    if (existing !== undefined || this.ids.has(type)) {
      throw createError("type-conflict", `Type id '${id}' is already registered`, {
        context: { id, type: type.name },
        isOperational: false,
      })
    }

    this.byId.set(id, type)
    this.ids.set(type, id)

    return this
  }

  idOf(type: TypeRef): string {
    const id = this.ids.get(type)

    if (id === undefined) {
      throw createError("unregistered-type", `Type '${type.name}' is not registered`, {
        context: { type: type.name },
        isOperational: false,
      })
    }

    return id
  }

  resolve(id: string): TypeRef {
    const type = this.byId.get(id)

    if (type === undefined) {
      throw createError("unknown-type", `No type is registered under '${id}'`, {
        context: { id },
      })
    }

    return type
  }
}
