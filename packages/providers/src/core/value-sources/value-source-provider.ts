import type { ExecutionTimeValue } from "../../ports/provider"
import type { ParametersType, ValueSourceType } from "../../ports/value-source"
import { AbstractProvider } from "../providers/abstract-provider"
import { ExecutionTimeValues } from "../values/execution-time-value"

export type ObtainedValue<T> = Readonly<{ value: T | undefined }>

export type ValueSourceListener = (event: {
  valueSourceType: ValueSourceType
  parameters: unknown
  value: unknown
}) => void

/**
 * Provider of a value source.
 *
 * The source is obtained at most once. Before that the provider is a
 * recomputable reference; once obtained, its value has been used as an input
 * and is classified as a constant.
 */
export class ValueSourceProvider<T, P> extends AbstractProvider<T> {
  private obtaining: Promise<T | undefined> | undefined
  private obtained: ObtainedValue<T> | undefined

  constructor(
    readonly valueSourceType: ValueSourceType<T, P>,
    readonly parametersType: ParametersType<P>,
    readonly parameters: P,
    private readonly listener?: ValueSourceListener,
  ) {
    super()
  }

  /** The obtained value, or `undefined` while the source has not been read. */
  get obtainedValueOrNull(): ObtainedValue<T> | undefined {
    return this.obtained
  }

  getOrNull(): Promise<T | undefined> {
    this.obtaining ??= new this.valueSourceType()
      .obtain(this.parameters)
      .then((result) => {
        const value = result ?? undefined
        this.obtained = { value }
        this.listener?.({
          valueSourceType: this.valueSourceType,
          parameters: this.parameters,
          value,
        })
        return value
      })

    return this.obtaining
  }

  async calculateExecutionTimeValue(): Promise<ExecutionTimeValue<T>> {
    if (this.obtained) return ExecutionTimeValues.ofNullable(this.obtained.value)

    return ExecutionTimeValues.changing(this)
  }

  override toString(): string {
    return `valueSource(${this.valueSourceType.name})`
  }
}
