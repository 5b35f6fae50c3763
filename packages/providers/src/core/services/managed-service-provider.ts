import type { ExecutionTimeValue } from "../../ports/provider"
import type { ClassType } from "../../ports/types"
import { AbstractProvider } from "../providers/abstract-provider"
import { ExecutionTimeValues } from "../values/execution-time-value"

/**
 * Provider of a shared service. The service is created on first use and the
 * same instance is returned afterwards.
 *
 * A service is never a constant: state always stores the reference, so the
 * service is registered again when state is read.
 */
export class ManagedServiceProvider<S> extends AbstractProvider<S> {
  private instance: S | undefined

  constructor(
    readonly name: string,
    readonly implementationType: ClassType<S>,
    readonly parameters: unknown,
    private readonly create: () => S,
  ) {
    super()
  }

  /** Whether this provider creates instances of `type`. */
  provides<U>(type: ClassType<U>): this is ManagedServiceProvider<U> {
    return this.implementationType === type
  }

  /** The created service, or `undefined` when it has not been used yet. */
  get instantiated(): S | undefined {
    return this.instance
  }

  async getOrNull(): Promise<S | undefined> {
    this.instance ??= this.create()
    return this.instance
  }

  async calculateExecutionTimeValue(): Promise<ExecutionTimeValue<S>> {
    return ExecutionTimeValues.changing(this)
  }

  override toString(): string {
    return `service(${this.name})`
  }
}
