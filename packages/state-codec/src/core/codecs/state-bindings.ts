import type {
  BrokenValue,
  ManagedServiceRegistry,
  PropertyFactory,
  ValueSourceProviderFactory,
} from "@strata/providers"
import { isProvider } from "@strata/providers"
import type { Codec, FallbackCodec } from "../../ports/codec"
import { type Binding, BindingsCodec, bind } from "./bindings-codec"
import { BrokenValueCodec } from "./broken-value-codec"
import { DeferredValueCodec } from "./deferred-value-codec"
import {
  isManagedServiceProvider,
  ManagedServiceProviderCodec,
} from "./managed-service-provider-codec"
import {
  DirectoryPropertyCodec,
  isDirectoryProperty,
  isRegularFileProperty,
  RegularFilePropertyCodec,
} from "./properties/file-property-codecs"
import { isListProperty, ListPropertyCodec } from "./properties/list-property-codec"
import { isMapProperty, MapPropertyCodec } from "./properties/map-property-codec"
import { isScalarProperty, ScalarPropertyCodec } from "./properties/scalar-property-codec"
import { isSetProperty, SetPropertyCodec } from "./properties/set-property-codec"
import { ProviderCodec } from "./provider-codec"
import { isValueSourceProvider, ValueSourceProviderCodec } from "./value-source-provider-codec"

export type StateBindingsDeps = {
  valueSources: ValueSourceProviderFactory
  services: ManagedServiceRegistry
  properties: PropertyFactory
  /** Writes changing values no other binding supports, when it can restore them. */
  fallback: FallbackCodec
  broken?: Codec<BrokenValue>
}

export type StateBindings = {
  /** Codec for the value inside a changing provider state. */
  changing: BindingsCodec
  states: DeferredValueCodec
  /** Codec for a top-level state entry. */
  entries: BindingsCodec
}

/**
 * Wire up the codecs. The order of each bindings list fixes the ordinals in
 * the stored format.
 */
export function createStateBindings(deps: StateBindingsDeps): StateBindings {
  const restorable = (value: unknown): value is unknown => deps.fallback.canRestore(value)
  const changing = new BindingsCodec([
    bind("value-source", isValueSourceProvider, new ValueSourceProviderCodec(deps.valueSources)),
    bind("managed-service", isManagedServiceProvider, new ManagedServiceProviderCodec(deps.services)),
    bind("fallback", restorable, deps.fallback),
  ])

  const states = new DeferredValueCodec(changing, deps.broken ?? new BrokenValueCodec())
  const { properties } = deps

  const entryBindings: Binding[] = [
    bind("property", isScalarProperty, new ScalarPropertyCodec(states, properties)),
    bind("list-property", isListProperty, new ListPropertyCodec(states, properties)),
    bind("set-property", isSetProperty, new SetPropertyCodec(states, properties)),
    bind("map-property", isMapProperty, new MapPropertyCodec(states, properties)),
    bind("directory-property", isDirectoryProperty, new DirectoryPropertyCodec(states, properties)),
    bind("file-property", isRegularFileProperty, new RegularFilePropertyCodec(states, properties)),
    bind("provider", isProvider, new ProviderCodec(states)),
  ]

  return { changing, states, entries: new BindingsCodec(entryBindings) }
}
