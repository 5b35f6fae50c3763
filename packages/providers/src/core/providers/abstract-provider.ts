import { createError } from "@strata/errors"
import type { ExecutionTimeValue, Provider } from "../../ports/provider"

export abstract class AbstractProvider<T> implements Provider<T> {
  abstract getOrNull(): Promise<T | undefined>

  abstract calculateExecutionTimeValue(): Promise<ExecutionTimeValue<T>>

  async get(): Promise<T> {
    const value = await this.getOrNull()

    if (value === undefined) {
      throw createError("missing-value", `Cannot query the value of ${this.toString()}`, {
        context: { provider: this.toString() },
      })
    }

    return value
  }

  async isPresent(): Promise<boolean> {
    return (await this.getOrNull()) !== undefined
  }

  toString(): string {
    return `provider(${this.constructor.name})`
  }
}
