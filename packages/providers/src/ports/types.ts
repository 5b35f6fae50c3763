/**
 * Any class, concrete or abstract, whose instances are `T`.
 */
export type ClassType<T = unknown> = abstract new (...args: never[]) => T

/**
 * A named type that is not a class, such as `string`, with a runtime check
 * for its values.
 */
export interface TypeToken<T = unknown> {
  readonly name: string
  isInstance(value: unknown): value is T
}

/**
 * Declared type of a property value or element.
 */
export type TypeRef<T = unknown> = TypeToken<T> | ClassType<T>

/**
 * Resolves type references to stable identifiers and back.
 *
 * Identifiers are what a state cache stores in place of a class reference, so
 * they must not change between the run that writes state and the run that
 * reads it.
 */
export interface TypeRegistry {
  /** Rejects with `unregistered-type` when the type is not known. */
  idOf(type: TypeRef): string

  /** Rejects with `unknown-type` when no type is registered under the id. */
  resolve(id: string): TypeRef
}
