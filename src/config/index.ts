/**
 * Send Core Configuration
 *
 * Centralized policy constants for address validation, fee math and the
 * send flow. Values mirror Bitcoin Core relay policy where one exists.
 *
 * @module config
 */

// ============================================
// Transaction Policy
// ============================================

export const TRANSACTION = {
  /** Dust threshold in satoshis (Bitcoin Core default, covers all output types) */
  DUST_THRESHOLD: 546,

  /** Minimum relay fee rate in sat/vB */
  MIN_FEE_RATE_SAT_PER_VB: 1,

  /** Fee rate a fresh draft starts with, in sat/vB */
  DEFAULT_FEE_RATE_SAT_PER_VB: 1,

  /** Sanity ceiling for manually entered fee rates, in sat/vB */
  MAX_FEE_RATE_SAT_PER_VB: 10000,

  /** Satoshis per bitcoin */
  SATS_PER_BTC: 100_000_000,
} as const

// ============================================
// Fee Bumping
// ============================================

export const FEE_BUMP = {
  /**
   * Conservative vsize of a CPFP child: 1 input + 1 output.
   * P2WPKH is ~110 vB and P2TR ~111 vB, rounded up.
   */
  CPFP_CHILD_VSIZE_VB: 150,

  /** Change reserved when a CPFP child is built */
  CPFP_DUST_RESERVE_SATS: 546,
} as const

// ============================================
// Send Flow
// ============================================

export const SEND = {
  /** Quiescence window before a dry-run is issued */
  ESTIMATE_DEBOUNCE_MS: 150,

  /** vsize assumed for the instant max-send preview */
  MAX_SEND_HEURISTIC_VSIZE_VB: 150,

  /** Minimum number of rows a multi-recipient draft commits with */
  MIN_MULTI_RECIPIENTS: 2,
} as const

// ============================================
// Address Formats
// ============================================

export const ADDRESS = {
  BASE58_ALPHABET: '123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz',

  /** version byte (1) + hash160 (20) + checksum (4) */
  BASE58_DECODED_LENGTH: 25,

  BASE58_CHECKSUM_LENGTH: 4,

  BECH32_CHARSET: 'qpzry9x8gf2tvdw0s3jn54khce6mua7l',

  BECH32_MAX_LENGTH: 90,

  /** Data part must at least hold the 6-character checksum */
  BECH32_MIN_DATA_LENGTH: 6,

  BECH32_CONST: 1,

  BECH32M_CONST: 0x2bc830a3,
} as const

export type TransactionConfig = typeof TRANSACTION
export type FeeBumpConfig = typeof FEE_BUMP
export type SendConfig = typeof SEND
export type AddressConfig = typeof ADDRESS
