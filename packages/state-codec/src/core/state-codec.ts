import { createError } from "@strata/errors"
import { createNullLogger, type Logger } from "@strata/logger"
import {
  DefaultManagedServiceRegistry,
  DefaultPropertyFactory,
  DefaultTypeRegistry,
  DefaultValueSourceProviderFactory,
  type ManagedServiceRegistry,
  type PropertyFactory,
  type TypeRegistry,
  type ValueSourceProviderFactory,
} from "@strata/providers"
import { SuperjsonEncoder } from "../adapters/superjson/superjson-encoder"
import type { FallbackCodec } from "../ports/codec"
import type { ConfigSource } from "../ports/config-source"
import type { BindingsCodec } from "./codecs/bindings-codec"
import { createStateBindings } from "./codecs/state-bindings"
import { ReadSession } from "./contexts/read-context"
import { WriteSession } from "./contexts/write-context"
import { type PropertyProblem, ProblemReporter } from "./problems/problem-reporter"
import { type CodecSettings, defaultCodecSettings } from "./settings/codec-settings"
import { createCodecLogger } from "./settings/create-codec-logger"
import { loadCodecSettings } from "./settings/load-codec-settings"

export type StateCodecOptions = {
  types?: TypeRegistry
  valueSources?: ValueSourceProviderFactory
  services?: ManagedServiceRegistry
  properties?: PropertyFactory
  /** Encoder for fixed values and anything no other codec supports. */
  fallback?: FallbackCodec
  logger?: Logger
  settings?: CodecSettings
}

export type SerializedState = Readonly<{
  bytes: Uint8Array
  /** Problems kept during the pass, at most `maxProblems`. */
  problems: readonly PropertyProblem[]
  /** All problems found, including those past the limit. */
  problemCount: number
}>

export type StateEntries = Iterable<readonly [name: string, value: unknown]>

/**
 * Writes named state entries (properties and providers) to bytes and reads
 * them back. Each call is one pass with its own identity table.
 *
 * @example
 * ```ts
 * const codec = new StateCodec({ types })
 * const { bytes } = await codec.serializeState([["greeting", greeting]])
 * const restored = await codec.deserializeState(bytes)
 * ```
 */
export class StateCodec {
  readonly types: TypeRegistry
  readonly services: ManagedServiceRegistry

  private readonly fallback: FallbackCodec
  private readonly entries: BindingsCodec
  private readonly logger: Logger
  private readonly settings: CodecSettings

  constructor(options: StateCodecOptions = {}) {
    this.types = options.types ?? new DefaultTypeRegistry()
    this.services = options.services ?? new DefaultManagedServiceRegistry()
    this.fallback = options.fallback ?? new SuperjsonEncoder()
    this.logger = (options.logger ?? createNullLogger()).child({ codec: "state" })
    this.settings = options.settings ?? defaultCodecSettings

    this.entries = createStateBindings({
      valueSources: options.valueSources ?? new DefaultValueSourceProviderFactory(),
      services: this.services,
      properties: options.properties ?? new DefaultPropertyFactory(),
      fallback: this.fallback,
    }).entries
  }

  async serializeState(entries: StateEntries): Promise<SerializedState> {
    const startedAt = performance.now()
    const logger = this.logger.child({ direction: "write" })
    const problems = new ProblemReporter(logger, this.settings.maxProblems)
    const ctx = new WriteSession({
      types: this.types,
      fallback: this.fallback,
      logger,
      problems,
      initialBufferSize: this.settings.initialBufferSize,
    })

    const list = [...entries]
    logger.debug("Writing state", { entries: list.length })

    ctx.writeSmallInt(list.length)
    for (const [name, value] of list) {
      ctx.enterEntry(name)
      ctx.writeString(name)
      await this.entries.encode(ctx, value)
    }

    const bytes = ctx.toBytes()
    logger.debug("State written", {
      bytes: bytes.length,
      entries: list.length,
      identities: ctx.sharedIdentities.size,
      problems: problems.total,
      durationMs: performance.now() - startedAt,
    })

    return { bytes, problems: [...problems.problems], problemCount: problems.total }
  }

  async deserializeState(bytes: Uint8Array): Promise<Map<string, unknown>> {
    const startedAt = performance.now()
    const logger = this.logger.child({ direction: "read" })
    const ctx = new ReadSession(bytes, { types: this.types, fallback: this.fallback, logger })

    const count = ctx.readSmallInt()
    const state = new Map<string, unknown>()

    for (let i = 0; i < count; i++) {
      const name = ctx.readString()
      state.set(name, await this.entries.decode(ctx))
    }

    if (ctx.remaining > 0) {
      throw createError("corrupt-state", `Unexpected ${ctx.remaining} bytes after the last entry`, {
        context: { offset: ctx.offset, remaining: ctx.remaining },
      })
    }

    logger.debug("State read", {
      bytes: bytes.length,
      entries: state.size,
      identities: ctx.sharedIdentities.size,
      durationMs: performance.now() - startedAt,
    })

    return state
  }
}

export type CreateStateCodecOptions = Omit<StateCodecOptions, "settings"> & {
  /** Settings sources, applied in order. Default: the `STRATA_` environment */
  sources?: ConfigSource[]
}

/**
 * Create a codec whose settings come from config sources. Without an explicit
 * logger, a pino logger is configured from the settings.
 */
export async function createStateCodec(
  options: CreateStateCodecOptions = {},
): Promise<StateCodec> {
  const { sources, ...rest } = options
  const settings = await loadCodecSettings(sources === undefined ? {} : { sources })
  const logger = rest.logger ?? createCodecLogger(settings.value)

  logger.debug("Codec settings loaded", {
    logLevel: settings.explain("logLevel"),
    maxProblems: settings.explain("maxProblems"),
    unknownKeys: settings.unknownKeys(),
  })

  return new StateCodec({ ...rest, logger, settings: settings.value })
}
