import type { TypeRef } from "../../ports/types"
import { Providers } from "../providers/providers"
import { isInstanceOf } from "../types/types"
import { AbstractProperty } from "./abstract-property"

/**
 * A property holding an ordered list. Defaults to an empty list.
 */
export class ListProperty<T> extends AbstractProperty<readonly T[]> {
  constructor(readonly elementType: TypeRef<T>) {
    super(Providers.of([]))
  }

  empty(): this {
    return this.set([])
  }

  protected accepts(value: unknown): value is readonly T[] {
    return Array.isArray(value) && value.every((element) => isInstanceOf(this.elementType, element))
  }

  protected override normalize(value: readonly T[]): readonly T[] {
    return Object.freeze([...value])
  }

  protected describeType(): string {
    return `list<${this.elementType.name}>`
  }
}
