/**
 * Fee Bump Economics
 *
 * Pure cost and affordability math for speeding up an unconfirmed
 * transaction, either by replacing it (RBF) or by spending one of its
 * outputs in a high-fee child (CPFP). Nothing here builds a transaction;
 * the wallet engine does that once the user accepts a quote.
 *
 * @module domain/transaction/feeBump
 *
 * @example
 * ```typescript
 * const quote = calculateFeeBump({
 *   method: 'RBF',
 *   currentFeeSats: 1000,
 *   vsizeVb: 200,
 *   availableWalletBalanceSats: 50_000,
 *   cpfpParentOutputSats: 0,
 *   targetFeeRateSatPerVb: 10
 * })
 * // quote.value.newTotalFeeSats === 2000
 * // quote.value.additionalCostSats === 1000
 * ```
 */

import { FEE_BUMP } from '../../config'
import { appErr, ok, type Result } from '../result'
import type { BumpMethod, BumpRequest, FeeBumpQuote, PendingTransaction } from '../types'
import { cpfpChildFee, feeFromVBytes, isBelowMinimumFeeRate } from './fees'

/**
 * The rate the transaction currently pays: the reported rate when known,
 * otherwise fee / vsize, otherwise undefined.
 */
export function effectiveCurrentFeeRate(request: BumpRequest): number | undefined {
  if (request.currentFeeRateSatPerVb !== undefined) {
    return request.currentFeeRateSatPerVb
  }
  if (request.currentFeeSats !== undefined && request.vsizeVb !== undefined && request.vsizeVb > 0) {
    return request.currentFeeSats / request.vsizeVb
  }
  return undefined
}

function quoteRbf(request: BumpRequest, currentRate: number | undefined): FeeBumpQuote {
  const base = {
    method: 'RBF' as const,
    availableFundsSats: request.availableWalletBalanceSats,
    willConsolidate: false,
    effectiveCurrentFeeRate: currentRate
  }

  // Without size or fee the cost is unknowable here; the engine decides
  if (request.vsizeVb === undefined || request.currentFeeSats === undefined) {
    return { ...base, affordable: true }
  }

  const newTotalFeeSats = feeFromVBytes(request.vsizeVb, request.targetFeeRateSatPerVb)
  const additionalCostSats = Math.max(0, newTotalFeeSats - request.currentFeeSats)

  return {
    ...base,
    newTotalFeeSats,
    additionalCostSats,
    affordable: additionalCostSats <= request.availableWalletBalanceSats
  }
}

function quoteCpfp(request: BumpRequest, currentRate: number | undefined): FeeBumpQuote {
  const additionalCostSats = cpfpChildFee(request.targetFeeRateSatPerVb)
  const availableFundsSats = request.cpfpParentOutputSats + request.availableWalletBalanceSats
  const required = additionalCostSats + FEE_BUMP.CPFP_DUST_RESERVE_SATS
  const parentCoversAlone = request.cpfpParentOutputSats > required

  return {
    method: 'CPFP',
    additionalCostSats,
    availableFundsSats,
    affordable: availableFundsSats >= required,
    willConsolidate: !parentCoversAlone,
    effectiveCurrentFeeRate: currentRate
  }
}

/**
 * Quote the cost of bumping a transaction to the target fee rate.
 *
 * Fails with FEE_RATE_BELOW_MINIMUM when the target is under the relay
 * minimum, and FEE_BUMP_NOT_HIGHER_THAN_CURRENT when it does not exceed
 * the current effective rate. An unaffordable quote is still a quote; use
 * {@link requireAffordable} before acting on it.
 */
export function calculateFeeBump(request: BumpRequest): Result<FeeBumpQuote> {
  const target = request.targetFeeRateSatPerVb
  if (isBelowMinimumFeeRate(target)) {
    return appErr('FEE_RATE_BELOW_MINIMUM', `Fee rate ${target} sat/vB is below the network minimum`, {
      feeRate: target
    })
  }

  const currentRate = effectiveCurrentFeeRate(request)
  if (currentRate !== undefined && target <= currentRate) {
    return appErr(
      'FEE_BUMP_NOT_HIGHER_THAN_CURRENT',
      `Fee rate ${target} sat/vB is not higher than the current ${currentRate} sat/vB`,
      { feeRate: target, currentFeeRate: currentRate }
    )
  }

  return ok(request.method === 'RBF' ? quoteRbf(request, currentRate) : quoteCpfp(request, currentRate))
}

export function requireAffordable(quote: FeeBumpQuote): Result<FeeBumpQuote> {
  if (quote.affordable) {
    return ok(quote)
  }
  const required = quote.method === 'CPFP'
    ? (quote.additionalCostSats ?? 0) + FEE_BUMP.CPFP_DUST_RESERVE_SATS
    : (quote.additionalCostSats ?? 0)
  return appErr(
    'FEE_BUMP_INSUFFICIENT_FUNDS',
    `Insufficient funds: need ${required} sats, have ${quote.availableFundsSats} sats`,
    { required, available: quote.availableFundsSats }
  )
}

// ============================================
// Method selection
// ============================================

/**
 * The output a CPFP child would spend: the received amount for incoming
 * transactions, the change for outgoing ones.
 */
export function cpfpSpendableOutput(tx: PendingTransaction): number {
  if (tx.netAmountSats > 0) {
    return tx.netAmountSats
  }
  return tx.changeAmountSats ?? 0
}

/**
 * RBF for our own unconfirmed replaceable sends, CPFP when there is an
 * output to spend, otherwise null.
 */
export function selectBumpMethod(tx: PendingTransaction): BumpMethod | null {
  if (tx.confirmed) return null

  const isReceived = tx.netAmountSats > 0
  if (!isReceived && tx.signalsRbf) return 'RBF'
  if (cpfpSpendableOutput(tx) > 0) return 'CPFP'

  return null
}
