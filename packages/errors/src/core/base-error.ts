import type { AppError, ErrorContext, SerializedError } from "../ports/error"

export type BaseErrorOptions<C extends string = string> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
  /** Defaults to now. Set when restoring an error that was raised earlier. */
  timestamp?: Date
}>

export class BaseError<C extends string = string> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = options.timestamp ?? new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

/**
 * Options for error serialization.
 */
export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize any error (or thrown value) to a consistent shape.
 *
 * Handles:
 * - BaseError instances (preserves code, context, etc.)
 * - Standard Error instances (code defaults to "unknown")
 * - Non-Error thrown values (wrapped with context)
 */
export function serializeError(
  err: unknown,
  options?: SerializeOptions,
): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof BaseError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    const cause: unknown = err.cause
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...(cause !== undefined && { cause: serializeError(cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}

/**
 * Rebuild an error from its serialized shape.
 *
 * The result is always a BaseError; the original `name`, `code`, `context`,
 * `timestamp` and (when present) `stack` are carried over, and the cause chain
 * is restored recursively.
 */
export function deserializeError(serialized: SerializedError): BaseError {
  const timestamp = new Date(serialized.timestamp)
  const err = new BaseError(serialized.message, {
    code: serialized.code,
    context: serialized.context,
    isOperational: serialized.isOperational,
    ...(Number.isFinite(timestamp.valueOf()) && { timestamp }),
    ...(serialized.cause !== undefined && { cause: deserializeError(serialized.cause) }),
  })

  err.name = serialized.name
  if (serialized.stack) err.stack = serialized.stack

  return err
}
