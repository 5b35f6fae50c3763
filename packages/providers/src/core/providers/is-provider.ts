import type { Provider } from "../../ports/provider"

export function isProvider(value: unknown): value is Provider<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "getOrNull" in value &&
    typeof value.getOrNull === "function" &&
    "calculateExecutionTimeValue" in value &&
    typeof value.calculateExecutionTimeValue === "function"
  )
}
