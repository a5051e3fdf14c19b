/**
 * Structured Error Handling
 *
 * Typed error classes for the failure modes callers branch on, plus the
 * user-facing wording for every error code. All classes extend the domain
 * AppError so they travel inside Result values unchanged.
 */

import { AppError, type ErrorCode } from '../domain/result'

// Specific error classes for common scenarios

export class InvalidStateError extends AppError {
  constructor(action: string, state: string) {
    super('INVALID_STATE', `Cannot ${action} while ${state}`, { action, state })
    this.name = 'InvalidStateError'
  }
}

export class FeeRateBelowMinimumError extends AppError {
  constructor(feeRate: number, minimum: number) {
    super(
      'FEE_RATE_BELOW_MINIMUM',
      `Fee rate ${feeRate} sat/vB is below the network minimum of ${minimum} sat/vB`,
      { feeRate, minimum }
    )
    this.name = 'FeeRateBelowMinimumError'
  }
}

export class BroadcastError extends AppError {
  constructor(message: string, cause?: Error) {
    super('PSBT_BROADCAST_FAILED', message, undefined, cause)
    this.name = 'BroadcastError'
  }
}

export class SignedPayloadError extends AppError {
  constructor(reason: string) {
    super('PSBT_UNPARSEABLE_SIGNED_PAYLOAD', `Signed transaction could not be parsed: ${reason}`, { reason })
    this.name = 'SignedPayloadError'
  }
}

export class StorageError extends AppError {
  constructor(message: string, operation: string, cause?: Error) {
    super('STORAGE_ERROR', message, { operation }, cause)
    this.name = 'StorageError'
  }
}

/**
 * Type guard to check if a value is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}

const USER_MESSAGES: Record<ErrorCode, string> = {
  ADDRESS_INVALID_CHARACTER: 'Address contains an invalid character',
  ADDRESS_INVALID_LENGTH: 'Address has an invalid length',
  ADDRESS_INVALID_CHECKSUM: 'Invalid checksum',
  ADDRESS_MIXED_CASE: 'Mixed case not allowed',
  ADDRESS_UNKNOWN_FORMAT: 'Invalid address format',
  DRY_RUN_INSUFFICIENT_FUNDS: 'Insufficient funds for this transaction',
  DRY_RUN_BELOW_DUST_LIMIT: 'Amount is below the dust limit',
  DRY_RUN_NETWORK_UNAVAILABLE: 'Not connected to a server',
  FEE_BUMP_NOT_HIGHER_THAN_CURRENT: 'New fee rate must be higher than the current fee rate',
  FEE_BUMP_INSUFFICIENT_FUNDS: 'Insufficient funds to bump the fee',
  FEE_RATE_BELOW_MINIMUM: 'Fee rate is below the network minimum',
  INVALID_AMOUNT: 'Invalid amount',
  AMOUNT_BELOW_DUST: 'Amount must be more than 546 sats',
  INVALID_PAYMENT_URI: 'Payment request could not be read',
  INVALID_STATE: 'This action is not available right now',
  UTXO_NOT_SPENDABLE: 'Selected coin is not spendable',
  COMMIT_IN_PROGRESS: 'A transaction is already being sent',
  DRAFT_NOT_COMMITTABLE: 'Transaction is not ready to send',
  COMMIT_FAILED: 'Transaction could not be created',
  PSBT_UNPARSEABLE_SIGNED_PAYLOAD: 'Not a signed PSBT or raw transaction',
  PSBT_BROADCAST_FAILED: 'Broadcast failed. Start a new transaction to try again.',
  PSBT_CANCEL_NOT_ALLOWED: 'Broadcast has already started',
  STORAGE_ERROR: 'Saved draft could not be accessed',
  UNKNOWN: 'An unexpected error occurred'
}

/**
 * User-facing wording for an error code
 */
export function describeErrorCode(code: ErrorCode): string {
  return USER_MESSAGES[code]
}

/**
 * Get user-friendly error message
 */
export function getUserMessage(error: unknown): string {
  if (error instanceof AppError) {
    return describeErrorCode(error.code)
  }

  if (error instanceof Error) {
    if (error.message.includes('timeout')) {
      return 'The operation timed out. Please try again.'
    }
    return error.message
  }

  return USER_MESSAGES.UNKNOWN
}
