import type { ValueSourceProvider } from "../core/value-sources/value-source-provider"
import type { ClassType } from "./types"

/**
 * An external input that is only read when its value is needed, such as an
 * environment variable or the output of a command.
 *
 * @typeParam T - The value produced.
 * @typeParam P - The parameters identifying which input to read.
 */
export interface ValueSource<T, P> {
  obtain(parameters: P): Promise<T | null | undefined>
}

export type ValueSourceType<T = unknown, P = unknown> = new () => ValueSource<T, P>

export type ParametersType<P = unknown> = ClassType<P>

export interface ValueSourceProviderFactory {
  /**
   * Create a provider for a value source that has not been obtained yet.
   */
  instantiateValueSourceProvider<T, P>(
    valueSourceType: ValueSourceType<T, P>,
    parametersType: ParametersType<P>,
    parameters: P,
  ): ValueSourceProvider<T, P>
}
