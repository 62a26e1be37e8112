/**
 * Address Errors
 *
 * Structured errors raised at the construction and parsing boundary.
 * The metric functions themselves never throw.
 */

export const AddressErrorCode = {
  INVALID_LENGTH: 'INVALID_LENGTH',
  INVALID_ENCODING: 'INVALID_ENCODING',
} as const

export type AddressErrorCode =
  (typeof AddressErrorCode)[keyof typeof AddressErrorCode]

export type AddressErrorMetadata = Record<string, string | number>

/**
 * Base error class for address errors
 */
export class AddressError extends Error {
  public readonly code: AddressErrorCode
  public readonly metadata?: AddressErrorMetadata
  public readonly timestamp: number

  constructor(
    message: string,
    options: {
      code: AddressErrorCode
      metadata?: AddressErrorMetadata
      cause?: unknown
    },
  ) {
    super(message, { cause: options.cause })
    this.name = this.constructor.name
    this.code = options.code
    this.metadata = options.metadata
    this.timestamp = Date.now()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Serialize error for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      metadata: this.metadata,
      timestamp: this.timestamp,
    }
  }
}

/**
 * Byte input of the wrong size
 */
export class InvalidLengthError extends AddressError {
  constructor(expected: number, actual: number) {
    super(`Invalid length: expected ${expected} bytes, got ${actual}`, {
      code: AddressErrorCode.INVALID_LENGTH,
      metadata: { expected, actual },
    })
  }
}

/**
 * Text that does not decode to an address
 */
export class InvalidEncodingError extends AddressError {
  constructor(message: string, options: { input?: string; cause?: unknown } = {}) {
    super(`Invalid encoding: ${message}`, {
      code: AddressErrorCode.INVALID_ENCODING,
      metadata: options.input === undefined ? undefined : { input: options.input },
      cause: options.cause,
    })
  }
}

export function isAddressError(err: unknown): err is AddressError {
  return err instanceof AddressError
}
