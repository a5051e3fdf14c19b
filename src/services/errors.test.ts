import { describe, it, expect } from 'vitest'
import { AppError } from '../domain/result'
import {
  InvalidStateError,
  FeeRateBelowMinimumError,
  BroadcastError,
  SignedPayloadError,
  StorageError,
  isAppError,
  describeErrorCode,
  getUserMessage
} from './errors'

describe('Error Handling', () => {
  describe('AppError', () => {
    it('should create error with code, message and details', () => {
      const error = new AppError('INVALID_AMOUNT', 'Not a number', { input: 'abc' })

      expect(error.message).toBe('Not a number')
      expect(error.code).toBe('INVALID_AMOUNT')
      expect(error.name).toBe('AppError')
      expect(error.details).toEqual({ input: 'abc' })
    })

    it('should convert to JSON', () => {
      const cause = new Error('disk full')
      const error = new AppError('STORAGE_ERROR', 'Save failed', { operation: 'save' }, cause)

      expect(error.toJSON()).toEqual({
        code: 'STORAGE_ERROR',
        message: 'Save failed',
        details: { operation: 'save' },
        cause: 'disk full'
      })
    })

    it('should create from unknown error with the fallback code', () => {
      const originalError = new Error('Original message')
      const appError = AppError.fromUnknown(originalError, 'COMMIT_FAILED')

      expect(appError.message).toBe('Original message')
      expect(appError.code).toBe('COMMIT_FAILED')
      expect(appError.cause).toBe(originalError)
    })

    it('should create from string', () => {
      const appError = AppError.fromUnknown('String error')

      expect(appError.message).toBe('String error')
      expect(appError.code).toBe('UNKNOWN')
    })

    it('should return same instance for AppError input', () => {
      const original = new AppError('INVALID_STATE', 'Original')
      const result = AppError.fromUnknown(original, 'COMMIT_FAILED')

      expect(result).toBe(original)
    })
  })

  describe('Specific Error Types', () => {
    describe('InvalidStateError', () => {
      it('should describe the refused action', () => {
        const error = new InvalidStateError('broadcast', 'awaitingSigned')
        expect(error.code).toBe('INVALID_STATE')
        expect(error.message).toBe('Cannot broadcast while awaitingSigned')
        expect(error.details).toEqual({ action: 'broadcast', state: 'awaitingSigned' })
      })
    })

    describe('FeeRateBelowMinimumError', () => {
      it('should carry the rate and minimum', () => {
        const error = new FeeRateBelowMinimumError(0.5, 1)
        expect(error.code).toBe('FEE_RATE_BELOW_MINIMUM')
        expect(error.details).toEqual({ feeRate: 0.5, minimum: 1 })
      })
    })

    describe('BroadcastError', () => {
      it('should keep the cause', () => {
        const cause = new AppError('COMMIT_FAILED', 'mempool conflict')
        const error = new BroadcastError('mempool conflict', cause)
        expect(error.code).toBe('PSBT_BROADCAST_FAILED')
        expect(error.cause).toBe(cause)
      })
    })

    describe('SignedPayloadError', () => {
      it('should include the reason', () => {
        const error = new SignedPayloadError('payload is empty')
        expect(error.code).toBe('PSBT_UNPARSEABLE_SIGNED_PAYLOAD')
        expect(error.message).toBe('Signed transaction could not be parsed: payload is empty')
      })
    })

    describe('StorageError', () => {
      it('should record the operation', () => {
        const error = new StorageError('Failed to save draft', 'save')
        expect(error.code).toBe('STORAGE_ERROR')
        expect(error.details).toEqual({ operation: 'save' })
      })
    })
  })

  describe('isAppError', () => {
    it('should return true for AppError and subclasses', () => {
      expect(isAppError(new AppError('UNKNOWN', 'test'))).toBe(true)
      expect(isAppError(new SignedPayloadError('bad'))).toBe(true)
    })

    it('should return false for regular Error', () => {
      expect(isAppError(new Error('test'))).toBe(false)
    })

    it('should return false for non-errors', () => {
      expect(isAppError('string')).toBe(false)
      expect(isAppError(null)).toBe(false)
      expect(isAppError(undefined)).toBe(false)
    })
  })

  describe('getUserMessage', () => {
    it('should use the wording for an AppError code', () => {
      const error = new AppError('ADDRESS_MIXED_CASE', 'internal detail')
      expect(getUserMessage(error)).toBe('Mixed case not allowed')
    })

    it('should return Error message', () => {
      expect(getUserMessage(new Error('Error message'))).toBe('Error message')
    })

    it('should return a friendly message for timeouts', () => {
      expect(getUserMessage(new Error('request timeout'))).toBe('The operation timed out. Please try again.')
    })

    it('should return generic message for unknown types', () => {
      expect(getUserMessage('string error')).toBe('An unexpected error occurred')
      expect(getUserMessage(null)).toBe('An unexpected error occurred')
    })
  })

  describe('describeErrorCode', () => {
    it('should word the dust floor', () => {
      expect(describeErrorCode('AMOUNT_BELOW_DUST')).toBe('Amount must be more than 546 sats')
    })
  })
})
