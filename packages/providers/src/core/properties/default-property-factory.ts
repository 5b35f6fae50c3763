import type { PropertyFactory } from "../../ports/property-factory"
import type { TypeRef } from "../../ports/types"
import { DirectoryProperty, RegularFileProperty } from "./file-properties"
import { ListProperty } from "./list-property"
import { MapProperty } from "./map-property"
import { ScalarProperty } from "./scalar-property"
import { SetProperty } from "./set-property"

export class DefaultPropertyFactory implements PropertyFactory {
  property<T>(type: TypeRef<T>): ScalarProperty<T> {
    return new ScalarProperty(type)
  }

  listProperty<T>(elementType: TypeRef<T>): ListProperty<T> {
    return new ListProperty(elementType)
  }

  setProperty<T>(elementType: TypeRef<T>): SetProperty<T> {
    return new SetProperty(elementType)
  }

  mapProperty<K, V>(keyType: TypeRef<K>, valueType: TypeRef<V>): MapProperty<K, V> {
    return new MapProperty(keyType, valueType)
  }

  directoryProperty(): DirectoryProperty {
    return new DirectoryProperty()
  }

  fileProperty(): RegularFileProperty {
    return new RegularFileProperty()
  }
}
