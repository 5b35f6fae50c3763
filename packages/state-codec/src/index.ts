export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { ObjectSource } from "./adapters/object/object-source"
export {
  type SerializableClass,
  SuperjsonEncoder,
  type SuperjsonEncoderOptions,
} from "./adapters/superjson/superjson-encoder"
export { type Binding, BindingsCodec, bind } from "./core/codecs/bindings-codec"
export { BrokenValueCodec } from "./core/codecs/broken-value-codec"
export { DeferredValueCodec, StateTags } from "./core/codecs/deferred-value-codec"
export {
  isManagedServiceProvider,
  ManagedServiceProviderCodec,
} from "./core/codecs/managed-service-provider-codec"
export {
  DirectoryPropertyCodec,
  RegularFilePropertyCodec,
} from "./core/codecs/properties/file-property-codecs"
export { ListPropertyCodec } from "./core/codecs/properties/list-property-codec"
export { MapPropertyCodec } from "./core/codecs/properties/map-property-codec"
export { ScalarPropertyCodec } from "./core/codecs/properties/scalar-property-codec"
export { SetPropertyCodec } from "./core/codecs/properties/set-property-codec"
export { ProviderCodec } from "./core/codecs/provider-codec"
export {
  createStateBindings,
  type StateBindings,
  type StateBindingsDeps,
} from "./core/codecs/state-bindings"
export {
  isValueSourceProvider,
  ValueSourceProviderCodec,
} from "./core/codecs/value-source-provider-codec"
export { ReadSession, type ReadSessionDeps } from "./core/contexts/read-context"
export { WriteSession, type WriteSessionDeps } from "./core/contexts/write-context"
export { ReadIdentities, WriteIdentities } from "./core/identity/identity-tables"
export {
  decodePreservingSharedIdentity,
  encodePreservingSharedIdentityOf,
} from "./core/identity/shared-identity"
export { ByteReader } from "./core/io/byte-reader"
export { ByteWriter } from "./core/io/byte-writer"
export { type PropertyProblem, ProblemReporter } from "./core/problems/problem-reporter"
export {
  type CodecSettings,
  codecSettingsSchema,
  defaultCodecSettings,
} from "./core/settings/codec-settings"
export { createCodecLogger } from "./core/settings/create-codec-logger"
export {
  type LoadCodecSettingsOptions,
  loadCodecSettings,
} from "./core/settings/load-codec-settings"
export { Settings } from "./core/settings/settings"
export {
  type CreateStateCodecOptions,
  createStateCodec,
  type SerializedState,
  type StateCodecOptions,
  type StateEntries,
  StateCodec,
} from "./core/state-codec"
export type { Codec, Decoder, Encoder, FallbackCodec } from "./ports/codec"
export type { ConfigSource } from "./ports/config-source"
export type { ReadContext, WriteContext } from "./ports/contexts"
