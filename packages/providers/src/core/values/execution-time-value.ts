import type {
  BrokenState,
  ChangingValue,
  FixedValue,
  MissingValue,
  Provider,
} from "../../ports/provider"
import { BrokenValue } from "./broken-value"

const MISSING: MissingValue = Object.freeze({ kind: "missing" })

export const ExecutionTimeValues = {
  missing(): MissingValue {
    return MISSING
  },

  fixed<T>(value: T): FixedValue<T> {
    return { kind: "fixed", value }
  },

  /** `null` and `undefined` mean no value. */
  ofNullable<T>(value: T | null | undefined): FixedValue<T> | MissingValue {
    return value == null ? MISSING : { kind: "fixed", value }
  },

  changing(provider: Provider<unknown>): ChangingValue {
    return { kind: "changing", provider }
  },

  broken(failure: unknown): BrokenState {
    return {
      kind: "broken",
      failure: failure instanceof BrokenValue ? failure : new BrokenValue(failure),
    }
  },
} as const
