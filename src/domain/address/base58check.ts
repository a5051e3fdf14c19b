/**
 * Base58Check decoding for legacy addresses (P2PKH, P2SH and their testnet forms).
 *
 * @module domain/address/base58check
 */

import { Hash } from '@bsv/sdk'
import { ADDRESS } from '../../config'
import { err, ok, type AddressErrorCode, type Result } from '../result'

/**
 * Decode a Base58 string into bytes. Each leading '1' becomes one leading zero byte.
 */
export function decodeBase58(input: string): Result<number[], AddressErrorCode> {
  let value = 0n
  for (const char of input) {
    const digit = ADDRESS.BASE58_ALPHABET.indexOf(char)
    if (digit === -1) {
      return err('ADDRESS_INVALID_CHARACTER')
    }
    value = value * 58n + BigInt(digit)
  }

  const bytes: number[] = []
  while (value > 0n) {
    bytes.unshift(Number(value & 0xffn))
    value >>= 8n
  }

  let leadingZeros = 0
  while (leadingZeros < input.length && input[leadingZeros] === '1') {
    leadingZeros++
  }

  return ok([...new Array<number>(leadingZeros).fill(0), ...bytes])
}

/**
 * First four bytes of SHA-256(SHA-256(payload))
 */
export function base58Checksum(payload: number[]): number[] {
  const first = Array.from(Hash.sha256(payload))
  return Array.from(Hash.sha256(first)).slice(0, ADDRESS.BASE58_CHECKSUM_LENGTH)
}

/**
 * Validate a Base58Check address string.
 *
 * @returns null when valid, otherwise the first failure found
 */
export function validateBase58Check(address: string): AddressErrorCode | null {
  const decoded = decodeBase58(address)
  if (!decoded.ok) {
    return decoded.error
  }

  const bytes = decoded.value
  if (bytes.length !== ADDRESS.BASE58_DECODED_LENGTH) {
    return 'ADDRESS_INVALID_LENGTH'
  }

  const payloadLength = ADDRESS.BASE58_DECODED_LENGTH - ADDRESS.BASE58_CHECKSUM_LENGTH
  const payload = bytes.slice(0, payloadLength)
  const checksum = bytes.slice(payloadLength)
  const expected = base58Checksum(payload)

  return checksum.every((byte, i) => byte === expected[i]) ? null : 'ADDRESS_INVALID_CHECKSUM'
}
