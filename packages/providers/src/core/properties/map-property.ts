import type { TypeRef } from "../../ports/types"
import { Providers } from "../providers/providers"
import { isInstanceOf } from "../types/types"
import { AbstractProperty } from "./abstract-property"

/**
 * A property holding a map. Defaults to an empty map.
 */
export class MapProperty<K, V> extends AbstractProperty<ReadonlyMap<K, V>> {
  constructor(
    readonly keyType: TypeRef<K>,
    readonly valueType: TypeRef<V>,
  ) {
    super(Providers.of(new Map()))
  }

  empty(): this {
    return this.set(new Map())
  }

  protected accepts(value: unknown): value is ReadonlyMap<K, V> {
    if (!(value instanceof Map)) return false

    for (const [key, entry] of value) {
      if (!isInstanceOf(this.keyType, key) || !isInstanceOf(this.valueType, entry)) return false
    }

    return true
  }

  protected override normalize(value: ReadonlyMap<K, V>): ReadonlyMap<K, V> {
    return new Map(value)
  }

  protected describeType(): string {
    return `map<${this.keyType.name}, ${this.valueType.name}>`
  }
}
