import { createError } from "@strata/errors"
import { z } from "zod"
import { EnvSource } from "../../adapters/env/env-source"
import type { ConfigSource } from "../../ports/config-source"
import { codecSettingsSchema } from "./codec-settings"
import { Settings } from "./settings"

export type LoadCodecSettingsOptions = {
  /** Applied in order, later ones override. Default: the `STRATA_` environment */
  sources?: ConfigSource[]
}

export async function loadCodecSettings({
  sources,
}: LoadCodecSettingsOptions = {}): Promise<Settings> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const result = codecSettingsSchema.safeParse(merged)

  if (!result.success) {
    throw createError(
      "invalid-settings",
      `Codec settings are invalid:\n${z.prettifyError(result.error)}`,
      {
        context: {
          issues: result.error.issues.map((issue) => ({
            path: issue.path.map(String).join("."),
            message: issue.message,
            source: provenance[String(issue.path[0])] ?? "default",
          })),
        },
        isOperational: false,
      },
    )
  }

  for (const key of Object.keys(result.data)) {
    if (!(key in provenance)) provenance[key] = "default"
  }

  for (const key of Object.keys(provenance)) {
    if (!(key in result.data)) delete provenance[key]
  }

  return new Settings(result.data, provenance, new Set(Object.keys(merged)))
}
