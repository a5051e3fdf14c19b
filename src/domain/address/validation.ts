/**
 * Pure Address Validation
 *
 * Checks the checksum of user-typed Bitcoin addresses. Validation is
 * format-only: nothing here knows whether an address has ever been used.
 *
 * @module domain/address/validation
 */

import type { AddressErrorCode } from '../result'
import { validateBase58Check } from './base58check'
import { validateBech32 } from './bech32'

export type AddressFamily = 'base58' | 'bech32' | 'bech32m'

/**
 * Pick the checksum family from the address prefix.
 *
 * @example
 * ```typescript
 * addressFamily('1A1zP1eP5QGefi2DMPTfTL5SLmv7DivfNa') // 'base58'
 * addressFamily('BC1Q...')                            // 'bech32'
 * addressFamily('bc1p...')                            // 'bech32m'
 * addressFamily('0x1234')                             // null
 * ```
 */
export function addressFamily(address: string): AddressFamily | null {
  const lower = address.toLowerCase()

  if (lower.startsWith('bc1q')) return 'bech32'
  if (lower.startsWith('bc1p')) return 'bech32m'
  if (lower.startsWith('tb1')) return lower.startsWith('tb1p') ? 'bech32m' : 'bech32'
  if (/^[13mn2]/.test(address)) return 'base58'

  return null
}

/**
 * Validate a Bitcoin address checksum.
 *
 * @returns null when valid, otherwise the error kind
 */
export function validateAddress(address: string): AddressErrorCode | null {
  const trimmed = address.trim()

  switch (addressFamily(trimmed)) {
    case 'base58':
      return validateBase58Check(trimmed)
    case 'bech32':
      return validateBech32(trimmed, 'bech32')
    case 'bech32m':
      return validateBech32(trimmed, 'bech32m')
    case null:
      return 'ADDRESS_UNKNOWN_FORMAT'
  }
}

export function isValidAddress(address: string): boolean {
  return validateAddress(address) === null
}

/**
 * Error to show under an address input. An empty field is not an error yet.
 */
export function addressFieldError(input: string): AddressErrorCode | null {
  if (input.trim() === '') return null
  return validateAddress(input)
}
