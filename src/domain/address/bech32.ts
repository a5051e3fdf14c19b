/**
 * Bech32 (BIP-173) and Bech32m (BIP-350) checksum verification for
 * SegWit and Taproot addresses.
 *
 * @module domain/address/bech32
 */

import { ADDRESS } from '../../config'
import type { AddressErrorCode } from '../result'

export type Bech32Encoding = 'bech32' | 'bech32m'

const GENERATOR = [0x3b6a57b2, 0x26508e6d, 0x1ea119fa, 0x3d4233dd, 0x2a1462b3]

/**
 * BCH checksum over 5-bit values. The result is a 30-bit residue.
 */
export function polymod(values: readonly number[]): number {
  let chk = 1
  for (const value of values) {
    const top = chk >>> 25
    chk = ((chk & 0x1ffffff) << 5) ^ value
    for (let i = 0; i < 5; i++) {
      if ((top >>> i) & 1) {
        chk ^= GENERATOR[i]
      }
    }
  }
  return chk
}

/**
 * Expand the human-readable prefix: high bits of each char, a zero, then low bits.
 */
export function expandPrefix(prefix: string): number[] {
  const codes = Array.from(prefix, char => char.charCodeAt(0))
  return [...codes.map(code => code >> 5), 0, ...codes.map(code => code & 31)]
}

export function checksumConstant(encoding: Bech32Encoding): number {
  return encoding === 'bech32m' ? ADDRESS.BECH32M_CONST : ADDRESS.BECH32_CONST
}

/**
 * Validate a Bech32 or Bech32m string against the constant of the given encoding.
 * The caller picks the encoding from the address prefix; it is never inferred
 * from the checksum.
 *
 * @returns null when valid, otherwise the first failure found
 */
export function validateBech32(address: string, encoding: Bech32Encoding): AddressErrorCode | null {
  const lower = address.toLowerCase()
  if (address !== lower && address !== address.toUpperCase()) {
    return 'ADDRESS_MIXED_CASE'
  }

  const separator = lower.lastIndexOf('1')
  if (
    separator < 1 ||
    separator + 1 + ADDRESS.BECH32_MIN_DATA_LENGTH > lower.length ||
    lower.length > ADDRESS.BECH32_MAX_LENGTH
  ) {
    return 'ADDRESS_INVALID_LENGTH'
  }

  const prefix = lower.slice(0, separator)
  const values: number[] = []
  for (const char of lower.slice(separator + 1)) {
    const value = ADDRESS.BECH32_CHARSET.indexOf(char)
    if (value === -1) {
      return 'ADDRESS_INVALID_CHARACTER'
    }
    values.push(value)
  }

  const residue = polymod([...expandPrefix(prefix), ...values])
  return residue === checksumConstant(encoding) ? null : 'ADDRESS_INVALID_CHECKSUM'
}
