import type { TypeRef, TypeToken } from "../../ports/types"
import { Directory, RegularFile } from "../properties/file-system"

export function defineType<T>(
  name: string,
  isInstance: (value: unknown) => value is T,
): TypeToken<T> {
  return Object.freeze({ name, isInstance })
}

export function isInstanceOf<T>(type: TypeRef<T>, value: unknown): value is T {
  return typeof type === "function" ? value instanceof type : type.isInstance(value)
}

export const Types = {
  String: defineType("string", (v): v is string => typeof v === "string"),
  Number: defineType("number", (v): v is number => typeof v === "number"),
  Boolean: defineType("boolean", (v): v is boolean => typeof v === "boolean"),
  BigInt: defineType("bigint", (v): v is bigint => typeof v === "bigint"),
  Object: defineType("object", (v): v is object => typeof v === "object" && v !== null),
  Unknown: defineType("unknown", (_v): _v is unknown => true),
  Directory: defineType("directory", (v): v is Directory => v instanceof Directory),
  RegularFile: defineType("regular-file", (v): v is RegularFile => v instanceof RegularFile),
} as const
