import type {
  ParametersType,
  ValueSourceProviderFactory,
  ValueSourceType,
} from "../../ports/value-source"
import { type ValueSourceListener, ValueSourceProvider } from "./value-source-provider"

export class DefaultValueSourceProviderFactory implements ValueSourceProviderFactory {
  constructor(private readonly listener?: ValueSourceListener) {}

  /**
   * Create a provider with freshly constructed parameters.
   *
   * @example
   * ```ts
   * const home = factory.createProvider(EnvVariableSource, EnvVariableParameters, (p) => {
   *   p.variableName = "HOME"
   * })
   * ```
   */
  createProvider<T, P>(
    valueSourceType: ValueSourceType<T, P>,
    parametersType: new () => P,
    configure: (parameters: P) => void,
  ): ValueSourceProvider<T, P> {
    const parameters = new parametersType()
    configure(parameters)

    return this.instantiateValueSourceProvider(valueSourceType, parametersType, parameters)
  }

  instantiateValueSourceProvider<T, P>(
    valueSourceType: ValueSourceType<T, P>,
    parametersType: ParametersType<P>,
    parameters: P,
  ): ValueSourceProvider<T, P> {
    return new ValueSourceProvider(valueSourceType, parametersType, parameters, this.listener)
  }
}
