/**
 * Address Domain - checksum validation for Base58Check, Bech32 and Bech32m
 */

export { validateAddress, isValidAddress, addressFieldError, addressFamily } from './validation'
export type { AddressFamily } from './validation'
export { decodeBase58, validateBase58Check } from './base58check'
export { validateBech32, polymod } from './bech32'
export type { Bech32Encoding } from './bech32'
