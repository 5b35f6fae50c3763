import type { ValueSource } from "../../../ports/value-source"
import { DefaultValueSourceProviderFactory } from "../default-value-source-provider-factory"

class VariableParameters {
  variableName = ""
}

const variables: Record<string, string> = { HOME: "/home/test" }

class VariableSource implements ValueSource<string, VariableParameters> {
  static reads = 0

  async obtain(parameters: VariableParameters): Promise<string | undefined> {
    VariableSource.reads++
    return variables[parameters.variableName]
  }
}

describe("ValueSourceProvider", () => {
  beforeEach(() => {
    VariableSource.reads = 0
  })

  it("is a recomputable reference until obtained", async () => {
    const factory = new DefaultValueSourceProviderFactory()
    const provider = factory.createProvider(VariableSource, VariableParameters, (p) => {
      p.variableName = "HOME"
    })

    const state = await provider.calculateExecutionTimeValue()

    expect(state).toEqual({ kind: "changing", provider })
    expect(provider.obtainedValueOrNull).toBeUndefined()
    expect(VariableSource.reads).toBe(0)
  })

  it("obtains the value once and is fixed afterwards", async () => {
    const factory = new DefaultValueSourceProviderFactory()
    const provider = factory.createProvider(VariableSource, VariableParameters, (p) => {
      p.variableName = "HOME"
    })

    const [first, second] = await Promise.all([provider.get(), provider.get()])

    expect(first).toBe("/home/test")
    expect(second).toBe("/home/test")
    expect(VariableSource.reads).toBe(1)
    expect(provider.obtainedValueOrNull).toEqual({ value: "/home/test" })
    await expect(provider.calculateExecutionTimeValue()).resolves.toEqual({
      kind: "fixed",
      value: "/home/test",
    })
  })

  it("classifies an obtained absent value as missing", async () => {
    const provider = new DefaultValueSourceProviderFactory().createProvider(
      VariableSource,
      VariableParameters,
      (p) => {
        p.variableName = "UNSET"
      },
    )

    await expect(provider.getOrNull()).resolves.toBeUndefined()
    await expect(provider.calculateExecutionTimeValue()).resolves.toEqual({ kind: "missing" })
  })

  it("notifies the listener when the value is obtained", async () => {
    const listener = vi.fn()
    const parameters = new VariableParameters()
    parameters.variableName = "HOME"
    const provider = new DefaultValueSourceProviderFactory(
      listener,
    ).instantiateValueSourceProvider(VariableSource, VariableParameters, parameters)

    await provider.get()

    expect(listener).toHaveBeenCalledTimes(1)
    expect(listener).toHaveBeenCalledWith({
      valueSourceType: VariableSource,
      parameters,
      value: "/home/test",
    })
  })

  it("names the source type", () => {
    const provider = new DefaultValueSourceProviderFactory().instantiateValueSourceProvider(
      VariableSource,
      VariableParameters,
      new VariableParameters(),
    )

    expect(provider.toString()).toBe("valueSource(VariableSource)")
  })
})
