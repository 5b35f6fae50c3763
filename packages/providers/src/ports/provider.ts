import type { BrokenValue } from "../core/values/broken-value"

/**
 * A lazily computed value.
 *
 * Evaluation is asynchronous because obtaining a value may run I/O (reading
 * the environment, running an external command, starting a service).
 */
export interface Provider<T> {
  /** Resolves the value, rejecting with `missing-value` when there is none. */
  get(): Promise<T>

  getOrNull(): Promise<T | undefined>

  isPresent(): Promise<boolean>

  /**
   * Classifies the provider at the moment state is written: no value, a value
   * that can be stored as a constant, or a provider that must be stored as a
   * recomputable reference.
   */
  calculateExecutionTimeValue(): Promise<ExecutionTimeValue<T>>
}

export type MissingValue = Readonly<{ kind: "missing" }>

export type FixedValue<T> = Readonly<{ kind: "fixed"; value: T }>

/**
 * A value that cannot be flattened to a constant. The provider's own element
 * type is not tracked; whoever restores it checks values on evaluation.
 */
export type ChangingValue = Readonly<{ kind: "changing"; provider: Provider<unknown> }>

export type BrokenState = Readonly<{ kind: "broken"; failure: BrokenValue }>

export type ExecutionTimeValue<T> = MissingValue | FixedValue<T> | ChangingValue

/**
 * What a state cache stores for a provider: its execution-time value, or the
 * failure raised while calculating it.
 */
export type DeferredValue<T> = ExecutionTimeValue<T> | BrokenState
