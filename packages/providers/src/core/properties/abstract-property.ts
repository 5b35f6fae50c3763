import { createError } from "@strata/errors"
import type { DeferredValue, ExecutionTimeValue, Provider } from "../../ports/provider"
import { AbstractProvider } from "../providers/abstract-provider"
import { MissingProvider, Providers, toProvider } from "../providers/providers"
import { ExecutionTimeValues } from "../values/execution-time-value"

/**
 * A configurable value of a declared type.
 *
 * The property holds a provider for its value. Values coming from a provider
 * whose type is not statically known (a restored state, a changing reference)
 * are checked against the declared type when they are read.
 */
export abstract class AbstractProperty<T> extends AbstractProvider<T> {
  private source: Provider<unknown>

  protected constructor(initial: Provider<unknown> = new MissingProvider()) {
    super()
    this.source = initial
  }

  /** Whether `value` is a valid value for this property. */
  protected abstract accepts(value: unknown): value is T

  /** Hook for copying mutable values on the way in. */
  protected normalize(value: T): T {
    return value
  }

  /** The provider currently backing this property. */
  get provider(): Provider<unknown> {
    return this.source
  }

  set(value: T | null | undefined): this {
    this.source = value == null ? Providers.notDefined() : Providers.of(this.normalize(value))
    return this
  }

  from(provider: Provider<T>): this {
    this.source = provider
    return this
  }

  /**
   * Replace the value with a stored state. A fixed value that does not match
   * the declared type is kept as a failure, raised with `type-mismatch` when
   * the property is evaluated.
   */
  fromState(state: DeferredValue<unknown>): this {
    const restored =
      state.kind === "fixed" && !this.accepts(state.value)
        ? ExecutionTimeValues.broken(this.mismatch(state.value))
        : state

    this.source = toProvider(restored)
    return this
  }

  async getOrNull(): Promise<T | undefined> {
    const value = await this.source.getOrNull()

    if (value === undefined) return undefined

    return this.check(value)
  }

  async calculateExecutionTimeValue(): Promise<ExecutionTimeValue<T>> {
    const state = await this.source.calculateExecutionTimeValue()

    switch (state.kind) {
      case "fixed":
        return ExecutionTimeValues.fixed(this.check(state.value))
      case "missing":
        return ExecutionTimeValues.missing()
      case "changing":
        return state
    }
  }

  protected abstract describeType(): string

  override toString(): string {
    return `property(${this.describeType()})`
  }

  private check(value: unknown): T {
    if (this.accepts(value)) return value

    throw this.mismatch(value)
  }

  private mismatch(value: unknown) {
    return createError(
      "type-mismatch",
      `Value of ${this.toString()} does not match its declared type`,
      { context: { property: this.toString(), actual: describeValue(value) } },
    )
  }
}

function describeValue(value: unknown): string {
  if (value === null) return "null"
  if (typeof value !== "object") return typeof value

  return value.constructor?.name ?? "Object"
}
