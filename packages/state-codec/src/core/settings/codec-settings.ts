import { logLevelNames } from "@strata/logger"
import { z } from "zod"

const flag = z.union([z.boolean(), z.stringbool()])

export const codecSettingsSchema = z.object({
  logLevel: z.enum(logLevelNames).default("info"),
  prettyLogs: flag.default(false),
  /** Problems kept and logged per write pass; further ones are only counted. */
  maxProblems: z.coerce.number().int().min(0).default(100),
  initialBufferSize: z.coerce.number().int().positive().default(1024),
})

export type CodecSettings = z.output<typeof codecSettingsSchema>

export const defaultCodecSettings: CodecSettings = Object.freeze(codecSettingsSchema.parse({}))
