import type { TypeRef } from "../../ports/types"
import { Providers } from "../providers/providers"
import { isInstanceOf } from "../types/types"
import { AbstractProperty } from "./abstract-property"

/**
 * A property holding a set. Defaults to an empty set.
 */
export class SetProperty<T> extends AbstractProperty<ReadonlySet<T>> {
  constructor(readonly elementType: TypeRef<T>) {
    super(Providers.of(new Set()))
  }

  empty(): this {
    return this.set(new Set())
  }

  protected accepts(value: unknown): value is ReadonlySet<T> {
    if (!(value instanceof Set)) return false

    for (const element of value) {
      if (!isInstanceOf(this.elementType, element)) return false
    }

    return true
  }

  protected override normalize(value: ReadonlySet<T>): ReadonlySet<T> {
    return new Set(value)
  }

  protected describeType(): string {
    return `set<${this.elementType.name}>`
  }
}
