export type FoldingErrorCode = Lowercase<string>

/**
 * Contextual metadata attached to errors.
 */
export type FoldingErrorContext = Readonly<Record<string, unknown>>

export type FoldingMapErrorOptions<C extends FoldingErrorCode = FoldingErrorCode> = Readonly<{
  code: C
  context?: FoldingErrorContext
  cause?: unknown
  isOperational?: boolean
}>

/**
 * Serialized error shape for logging.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedFoldingError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedFoldingError
}>

export class FoldingMapError<C extends FoldingErrorCode = FoldingErrorCode> extends Error {
  /** Error code for programmatic handling */
  readonly code: C

  /** Structured metadata for debugging */
  readonly context: FoldingErrorContext

  /**
   * `true` for expected runtime failures (a missing key, bad configuration),
   * `false` for invariant violations.
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  constructor(message: string, options: FoldingMapErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedFoldingError {
    return serializeFoldingError(this)
  }
}

/**
 * Serialize a thrown value to a consistent shape, following `cause` chains.
 */
export function serializeFoldingError(err: unknown): SerializedFoldingError {
  if (err instanceof FoldingMapError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeFoldingError(err.cause) }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeFoldingError(err.cause) }),
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
