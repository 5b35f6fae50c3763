import type { DeferredValue, ExecutionTimeValue, Provider } from "../../ports/provider"
import type { BrokenValue } from "../values/broken-value"
import { ExecutionTimeValues } from "../values/execution-time-value"
import { AbstractProvider } from "./abstract-provider"

export class FixedProvider<T> extends AbstractProvider<T> {
  constructor(readonly value: T) {
    super()
  }

  async getOrNull(): Promise<T | undefined> {
    return this.value
  }

  async calculateExecutionTimeValue(): Promise<ExecutionTimeValue<T>> {
    return ExecutionTimeValues.fixed(this.value)
  }

  override toString(): string {
    return `fixed(${String(this.value)})`
  }
}

export class MissingProvider<T> extends AbstractProvider<T> {
  async getOrNull(): Promise<T | undefined> {
    return undefined
  }

  async calculateExecutionTimeValue(): Promise<ExecutionTimeValue<T>> {
    return ExecutionTimeValues.missing()
  }

  override toString(): string {
    return "undefined"
  }
}

export type Callable<T> = () => T | null | undefined

/**
 * Provider backed by a synchronous function. The function runs on every
 * evaluation, and a `null` or `undefined` result means no value. Values that
 * need I/O to obtain are modelled as value sources instead.
 */
export class DefaultProvider<T> extends AbstractProvider<T> {
  constructor(private readonly fn: Callable<T>) {
    super()
  }

  async getOrNull(): Promise<T | undefined> {
    return this.fn() ?? undefined
  }

  async calculateExecutionTimeValue(): Promise<ExecutionTimeValue<T>> {
    return ExecutionTimeValues.ofNullable(this.fn())
  }

  override toString(): string {
    return `provider(${this.fn.name || "anonymous"})`
  }
}

/**
 * Stands in for a value whose calculation failed. Evaluating it, or
 * classifying it for storage, raises the original failure again.
 */
export class BrokenProvider<T> extends AbstractProvider<T> {
  constructor(readonly broken: BrokenValue) {
    super()
  }

  async getOrNull(): Promise<T | undefined> {
    return this.broken.rethrow()
  }

  async calculateExecutionTimeValue(): Promise<ExecutionTimeValue<T>> {
    return this.broken.rethrow()
  }

  override toString(): string {
    return "broken"
  }
}

export const Providers = {
  of<T>(value: T): Provider<T> {
    return new FixedProvider(value)
  },

  notDefined<T>(): Provider<T> {
    return new MissingProvider<T>()
  },

  provider<T>(fn: Callable<T>): Provider<T> {
    return new DefaultProvider(fn)
  },
} as const

/**
 * Turn a stored state back into something that can be evaluated.
 */
export function toProvider(state: DeferredValue<unknown>): Provider<unknown> {
  switch (state.kind) {
    case "missing":
      return new MissingProvider()
    case "fixed":
      return new FixedProvider(state.value)
    case "changing":
      return state.provider
    case "broken":
      return new BrokenProvider(state.failure)
  }
}
