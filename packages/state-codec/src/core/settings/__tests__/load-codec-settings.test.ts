import { EnvSource } from "../../../adapters/env/env-source"
import { ObjectSource } from "../../../adapters/object/object-source"
import type { ConfigSource } from "../../../ports/config-source"
import { defaultCodecSettings } from "../codec-settings"
import { loadCodecSettings } from "../load-codec-settings"

describe("loadCodecSettings", () => {
  it("uses defaults when no source provides a value", async () => {
    const settings = await loadCodecSettings({ sources: [new ObjectSource({})] })

    expect(settings.value).toEqual({
      logLevel: "info",
      prettyLogs: false,
      maxProblems: 100,
      initialBufferSize: 1024,
    })
    expect(settings.explain("maxProblems")).toBe("default")
    expect(defaultCodecSettings).toEqual(settings.value)
  })

  it("coerces string values from the environment", async () => {
    const settings = await loadCodecSettings({
      sources: [
        new EnvSource({
          env: { STRATA_MAX_PROBLEMS: "5", STRATA_PRETTY_LOGS: "true", STRATA_LOG_LEVEL: "debug" },
        }),
      ],
    })

    expect(settings.value).toMatchObject({ maxProblems: 5, prettyLogs: true, logLevel: "debug" })
    expect(settings.explain("prettyLogs")).toBe("env")
  })

  it("lets later sources override earlier ones and records provenance", async () => {
    const settings = await loadCodecSettings({
      sources: [
        new EnvSource({ env: { STRATA_MAX_PROBLEMS: "5", STRATA_LOG_LEVEL: "warn" } }),
        new ObjectSource({ maxProblems: 10 }, "cli"),
      ],
    })

    expect(settings.value.maxProblems).toBe(10)
    expect(settings.explain("maxProblems")).toBe("object:cli")
    expect(settings.explain("logLevel")).toBe("env")
    expect(settings.sourcesUsed()).toEqual(["object:cli", "env", "default"])
  })

  it("reports keys no setting uses", async () => {
    const settings = await loadCodecSettings({
      sources: [new ObjectSource({ maxProblem: 3, logLevel: "info" })],
    })

    expect(settings.unknownKeys()).toEqual(["maxProblem"])
  })

  it("skips undefined values", async () => {
    const settings = await loadCodecSettings({
      sources: [new ObjectSource({ maxProblems: 3 }), new ObjectSource({ maxProblems: undefined })],
    })

    expect(settings.value.maxProblems).toBe(3)
  })

  it("fails with invalid-settings naming the offending source", async () => {
    const source: ConfigSource = {
      name: "test",
      load: async () => ({ logLevel: "verbose" }),
    }

    await expect(loadCodecSettings({ sources: [source] })).rejects.toMatchObject({
      code: "invalid-settings",
      context: { issues: [expect.objectContaining({ path: "logLevel", source: "test" })] },
    })
  })

  it("freezes the settings", async () => {
    const settings = await loadCodecSettings({ sources: [] })

    expect(Object.isFrozen(settings.value)).toBe(true)
  })
})
