import { createPinoLogger, type Logger, type PinoLoggerDeps } from "@strata/logger"
import type { CodecSettings } from "./codec-settings"

/**
 * Logger for codec sessions, configured from settings.
 */
export function createCodecLogger(
  settings: Pick<CodecSettings, "logLevel" | "prettyLogs">,
  deps: PinoLoggerDeps = {},
): Logger {
  return createPinoLogger(
    deps,
    { level: settings.logLevel, prettify: settings.prettyLogs },
    { module: "state-codec" },
  )
}
