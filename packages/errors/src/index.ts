export {
  BaseError,
  type BaseErrorOptions,
  deserializeError,
  type SerializeOptions,
  serializeError,
} from "./core/base-error"
export { createError } from "./core/utils/create-error"
export { errorChain } from "./core/utils/error-chain"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
