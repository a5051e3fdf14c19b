/**
 * Pure Fee Rate Functions
 *
 * Fee rates are in satoshis per virtual byte (sat/vB). Everything here is
 * deterministic with no side effects; the wallet engine owns real size
 * estimation.
 *
 * @module domain/transaction/fees
 */

import { FEE_BUMP, SEND, TRANSACTION } from '../../config'
import type { FeeEstimates, FeeTarget } from '../types'

// Products of decimal rates carry binary noise (1.1 * 100 = 110.00000000000001)
const ROUNDING_SCALE = 1e8

/**
 * Round up to a whole sat after dropping floating-point noise.
 */
export function ceilSats(value: number): number {
  return Math.ceil(Math.round(value * ROUNDING_SCALE) / ROUNDING_SCALE)
}

/**
 * Fee for a transaction of the given virtual size, rounded up.
 *
 * @example
 * ```typescript
 * feeFromVBytes(141, 1.5)  // 212 (211.5 rounded up)
 * feeFromVBytes(200, 10)   // 2000
 * feeFromVBytes(100, 1.1)  // 110
 * ```
 */
export function feeFromVBytes(vBytes: number, feeRateSatPerVb: number): number {
  return ceilSats(vBytes * feeRateSatPerVb)
}

/**
 * Clamp a fee rate to [MIN_FEE_RATE_SAT_PER_VB, MAX_FEE_RATE_SAT_PER_VB].
 */
export function clampFeeRate(rate: number): number {
  return Math.max(
    TRANSACTION.MIN_FEE_RATE_SAT_PER_VB,
    Math.min(TRANSACTION.MAX_FEE_RATE_SAT_PER_VB, rate)
  )
}

export function isBelowMinimumFeeRate(rate: number): boolean {
  return !Number.isFinite(rate) || rate < TRANSACTION.MIN_FEE_RATE_SAT_PER_VB
}

/**
 * Placeholder amount shown while max-send waits for the engine's exact figure.
 * Assumes a one-input one-output transaction of MAX_SEND_HEURISTIC_VSIZE_VB.
 *
 * @example
 * ```typescript
 * maxSendHeuristic(100_000, 2)   // 99_700
 * maxSendHeuristic(200, 2)       // 0
 * ```
 */
export function maxSendHeuristic(availableSats: number, feeRateSatPerVb: number): number {
  const reserve = feeFromVBytes(SEND.MAX_SEND_HEURISTIC_VSIZE_VB, feeRateSatPerVb)
  return Math.max(0, availableSats - reserve)
}

/**
 * Cost of a CPFP child at the given rate. The rate is rounded up to a whole
 * sat/vB before multiplying.
 */
export function cpfpChildFee(targetFeeRateSatPerVb: number): number {
  return ceilSats(targetFeeRateSatPerVb) * FEE_BUMP.CPFP_CHILD_VSIZE_VB
}

// ============================================
// Fee presets
// ============================================

const PRIORITY_TARGETS: readonly FeeTarget[] = ['fastestFee', 'halfHourFee', 'hourFee']

/**
 * Rate for a named target, never below the estimate's own minimum or the
 * network minimum.
 */
export function pickFeeRate(estimates: FeeEstimates, target: FeeTarget): number {
  return Math.max(estimates[target], estimates.minimumFee, TRANSACTION.MIN_FEE_RATE_SAT_PER_VB)
}

/**
 * True when every priority level quotes the same rate, so offering a choice
 * would be meaningless.
 */
export function isUniform(estimates: FeeEstimates): boolean {
  const first = estimates[PRIORITY_TARGETS[0]]
  return PRIORITY_TARGETS.every(target => estimates[target] === first)
}

/**
 * Validate an estimates payload from an external source.
 */
export function parseFeeEstimates(value: unknown): FeeEstimates | null {
  if (typeof value !== 'object' || value === null) return null

  const record: Record<string, unknown> = { ...value }
  const fields: FeeTarget[] = ['fastestFee', 'halfHourFee', 'hourFee', 'minimumFee']
  for (const field of fields) {
    const rate = record[field]
    if (typeof rate !== 'number' || !Number.isFinite(rate) || rate < 0) return null
  }

  return {
    fastestFee: Number(record.fastestFee),
    halfHourFee: Number(record.halfHourFee),
    hourFee: Number(record.hourFee),
    minimumFee: Number(record.minimumFee)
  }
}
