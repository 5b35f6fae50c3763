export { DefaultPropertyFactory } from "./core/properties/default-property-factory"
export { DirectoryProperty, RegularFileProperty } from "./core/properties/file-properties"
export { Directory, RegularFile } from "./core/properties/file-system"
export { AbstractProperty } from "./core/properties/abstract-property"
export { ListProperty } from "./core/properties/list-property"
export { MapProperty } from "./core/properties/map-property"
export { ScalarProperty } from "./core/properties/scalar-property"
export { SetProperty } from "./core/properties/set-property"
export { AbstractProvider } from "./core/providers/abstract-provider"
export { isProvider } from "./core/providers/is-provider"
export {
  BrokenProvider,
  type Callable,
  DefaultProvider,
  FixedProvider,
  MissingProvider,
  Providers,
  toProvider,
} from "./core/providers/providers"
export { DefaultManagedServiceRegistry } from "./core/services/default-managed-service-registry"
export { ManagedServiceProvider } from "./core/services/managed-service-provider"
export { DefaultTypeRegistry } from "./core/types/default-type-registry"
export { defineType, isInstanceOf, Types } from "./core/types/types"
export { DefaultValueSourceProviderFactory } from "./core/value-sources/default-value-source-provider-factory"
export {
  type ObtainedValue,
  type ValueSourceListener,
  ValueSourceProvider,
} from "./core/value-sources/value-source-provider"
export { BrokenValue } from "./core/values/broken-value"
export { ExecutionTimeValues } from "./core/values/execution-time-value"
export {
  type ManagedServiceRegistry,
  type ManagedServiceType,
  type ServiceLease,
  UNLIMITED_USAGES,
} from "./ports/managed-service"
export type { PropertyFactory } from "./ports/property-factory"
export type {
  BrokenState,
  ChangingValue,
  DeferredValue,
  ExecutionTimeValue,
  FixedValue,
  MissingValue,
  Provider,
} from "./ports/provider"
export type { ClassType, TypeRef, TypeRegistry, TypeToken } from "./ports/types"
export type {
  ParametersType,
  ValueSource,
  ValueSourceProviderFactory,
  ValueSourceType,
} from "./ports/value-source"
