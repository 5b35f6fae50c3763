import type {
  ClassType,
  ManagedServiceType,
  TypeRef,
  ValueSourceType,
} from "@strata/providers"

function prototypeOf(type: TypeRef): unknown {
  return typeof type === "function" ? type.prototype : undefined
}

export function isClassType(type: TypeRef): type is ClassType {
  return typeof type === "function"
}

export function isValueSourceType(type: TypeRef): type is ValueSourceType {
  const proto = prototypeOf(type)

  return (
    typeof proto === "object" &&
    proto !== null &&
    "obtain" in proto &&
    typeof proto.obtain === "function"
  )
}

export function isManagedServiceType(type: TypeRef): type is ManagedServiceType {
  return typeof prototypeOf(type) === "object"
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}
