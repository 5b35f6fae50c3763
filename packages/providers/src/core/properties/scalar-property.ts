import type { TypeRef } from "../../ports/types"
import { isInstanceOf } from "../types/types"
import { AbstractProperty } from "./abstract-property"

/**
 * A property holding a single value.
 */
export class ScalarProperty<T> extends AbstractProperty<T> {
  constructor(readonly type: TypeRef<T>) {
    super()
  }

  protected accepts(value: unknown): value is T {
    return isInstanceOf(this.type, value)
  }

  protected describeType(): string {
    return this.type.name
  }
}
