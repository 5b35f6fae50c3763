import type { ReadContext, WriteContext } from "./contexts"

export interface Encoder<T> {
  encode(ctx: WriteContext, value: T): Promise<void>
}

export interface Decoder<T> {
  decode(ctx: ReadContext): Promise<T>
}

/**
 * Writes values of one shape to a state stream and reads them back.
 *
 * Codecs are stateless; everything that belongs to one pass (the stream, the
 * identity table, the logger) lives on the context.
 */
export interface Codec<T> extends Encoder<T>, Decoder<T> {}

/**
 * Codec for values no dedicated codec handles. `canRestore` reports whether
 * a value reads back as an instance of its own class.
 */
export interface FallbackCodec extends Codec<unknown> {
  canRestore(value: unknown): boolean
}
