import type { DirectoryProperty, RegularFileProperty } from "../core/properties/file-properties"
import type { ListProperty } from "../core/properties/list-property"
import type { MapProperty } from "../core/properties/map-property"
import type { ScalarProperty } from "../core/properties/scalar-property"
import type { SetProperty } from "../core/properties/set-property"
import type { TypeRef } from "./types"

/**
 * Creates empty property wrappers. State decoding rebuilds every property
 * through this port.
 */
export interface PropertyFactory {
  property<T>(type: TypeRef<T>): ScalarProperty<T>
  listProperty<T>(elementType: TypeRef<T>): ListProperty<T>
  setProperty<T>(elementType: TypeRef<T>): SetProperty<T>
  mapProperty<K, V>(keyType: TypeRef<K>, valueType: TypeRef<V>): MapProperty<K, V>
  directoryProperty(): DirectoryProperty
  fileProperty(): RegularFileProperty
}
