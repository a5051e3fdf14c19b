/**
 * Result Type for Functional Error Handling
 *
 * Every operation in this library that can fail in an expected way returns a
 * Result instead of throwing. Validators, fee math and the wallet engine
 * boundary all speak this type.
 *
 * @module domain/result
 *
 * @example
 * ```typescript
 * const quote = calculateFeeBump(request)
 * if (quote.ok) {
 *   render(quote.value.additionalCostSats)
 * } else {
 *   showFieldError(quote.error.code)
 * }
 * ```
 */

// ============================================
// Result Type Definition
// ============================================

/**
 * Success result containing a value
 */
export interface Ok<T> {
  readonly ok: true
  readonly value: T
}

/**
 * Failure result containing an error
 */
export interface Err<E> {
  readonly ok: false
  readonly error: E
}

/**
 * Result type that can be either Ok or Err
 */
export type Result<T, E = AppError> = Ok<T> | Err<E>

// ============================================
// Error Types
// ============================================

/**
 * Address validation failures
 */
export type AddressErrorCode =
  | 'ADDRESS_INVALID_CHARACTER'
  | 'ADDRESS_INVALID_LENGTH'
  | 'ADDRESS_INVALID_CHECKSUM'
  | 'ADDRESS_MIXED_CASE'
  | 'ADDRESS_UNKNOWN_FORMAT'

/**
 * Failures reported by the wallet engine's dry-run. Surfaced verbatim.
 */
export type DryRunErrorCode =
  | 'DRY_RUN_INSUFFICIENT_FUNDS'
  | 'DRY_RUN_BELOW_DUST_LIMIT'
  | 'DRY_RUN_NETWORK_UNAVAILABLE'

/**
 * Error codes used across the library
 */
export type ErrorCode =
  | AddressErrorCode
  | DryRunErrorCode

  // Fee bumping
  | 'FEE_BUMP_NOT_HIGHER_THAN_CURRENT'
  | 'FEE_BUMP_INSUFFICIENT_FUNDS'
  | 'FEE_RATE_BELOW_MINIMUM'

  // Draft editing
  | 'INVALID_AMOUNT'
  | 'AMOUNT_BELOW_DUST'
  | 'INVALID_PAYMENT_URI'
  | 'INVALID_STATE'
  | 'UTXO_NOT_SPENDABLE'

  // Commit
  | 'COMMIT_IN_PROGRESS'
  | 'DRAFT_NOT_COMMITTABLE'
  | 'COMMIT_FAILED'

  // PSBT handshake
  | 'PSBT_UNPARSEABLE_SIGNED_PAYLOAD'
  | 'PSBT_BROADCAST_FAILED'
  | 'PSBT_CANCEL_NOT_ALLOWED'

  // Storage
  | 'STORAGE_ERROR'

  | 'UNKNOWN'

/**
 * Standardized library error
 */
export class AppError extends Error {
  readonly code: ErrorCode
  readonly details?: Record<string, unknown>
  override readonly cause?: Error

  constructor(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.name = 'AppError'
    this.code = code
    this.details = details
    this.cause = cause
  }

  /** Create a JSON-serializable representation */
  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      cause: this.cause?.message
    }
  }

  /**
   * Wrap an unknown caught value, keeping AppErrors as they are
   */
  static fromUnknown(error: unknown, fallbackCode: ErrorCode = 'UNKNOWN'): AppError {
    if (error instanceof AppError) {
      return error
    }
    if (error instanceof Error) {
      return new AppError(fallbackCode, error.message, { originalError: error.name }, error)
    }
    if (typeof error === 'string') {
      return new AppError(fallbackCode, error)
    }
    return new AppError(fallbackCode, 'An unknown error occurred')
  }
}

// ============================================
// Constructors
// ============================================

/**
 * Create a success result
 */
export function ok<T>(value: T): Ok<T> {
  return { ok: true, value }
}

/**
 * Create a failure result
 */
export function err<E>(error: E): Err<E> {
  return { ok: false, error }
}

/**
 * Create an AppError failure result
 */
export function appErr(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): Err<AppError> {
  return err(new AppError(code, message, details))
}
