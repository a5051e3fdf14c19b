/**
 * Core domain types for the send core
 * These are pure data types with no dependencies on infrastructure
 */

import type { DryRunErrorCode } from './result'

// ============================================
// Recipients & Coins
// ============================================

/** A single output the user wants to pay. Amounts are integer satoshis. */
export interface Recipient {
  address: string
  amountSats: number
}

/** Outpoint in `txid:vout` form */
export type Outpoint = string

export interface Utxo {
  outpoint: Outpoint
  txid: string
  vout: number
  address: string
  amountSats: number
  confirmed: boolean
  frozen: boolean
  label?: string
}

export function toOutpoint(txid: string, vout: number): Outpoint {
  return `${txid}:${vout}`
}

// ============================================
// Draft
// ============================================

export type SendMode = 'single' | 'multi'

export type AmountDenomination = 'sats' | 'btc'

/**
 * The committed projection of a draft: only rows that passed validation.
 */
export interface SendDraft {
  recipients: readonly Recipient[]
  feeRateSatPerVb: number
  /** Empty means the engine selects coins itself */
  coinSelection: readonly Outpoint[]
  isMaxSend: boolean
  label?: string
}

// ============================================
// Dry Run
// ============================================

export interface DryRunError {
  code: DryRunErrorCode
  message: string
}

/**
 * Cost estimate from the wallet engine. Built but never signed or broadcast.
 */
export interface DryRunResult {
  feeSats: number
  /** weight / 4, fractional */
  txVBytes: number
  changeSats: number
  hasChange: boolean
  numInputs: number
  effectiveFeeRate: number
  /** Exact amount the recipient receives; authoritative under max-send */
  recipientAmountSats: number
  error?: DryRunError
}

export function dryRunError(code: DryRunErrorCode, message: string): DryRunResult {
  return {
    feeSats: 0,
    txVBytes: 0,
    changeSats: 0,
    hasChange: false,
    numInputs: 0,
    effectiveFeeRate: 0,
    recipientAmountSats: 0,
    error: { code, message }
  }
}

export function isDryRunOk(result: DryRunResult | null): result is DryRunResult {
  return result !== null && result.error === undefined
}

// ============================================
// Fee Estimates
// ============================================

/**
 * Fee rate estimates in sat/vB from a mempool or Electrum source
 */
export interface FeeEstimates {
  fastestFee: number
  halfHourFee: number
  hourFee: number
  minimumFee: number
}

export type FeeTarget = keyof FeeEstimates

// ============================================
// Fee Bumping
// ============================================

export type BumpMethod = 'RBF' | 'CPFP'

export interface BumpRequest {
  method: BumpMethod
  currentFeeSats?: number
  currentFeeRateSatPerVb?: number
  vsizeVb?: number
  availableWalletBalanceSats: number
  cpfpParentOutputSats: number
  targetFeeRateSatPerVb: number
}

export interface FeeBumpQuote {
  method: BumpMethod
  /** Undefined when the transaction size or current fee is unknown */
  additionalCostSats?: number
  newTotalFeeSats?: number
  availableFundsSats: number
  affordable: boolean
  willConsolidate: boolean
  effectiveCurrentFeeRate?: number
}

/**
 * The parts of a wallet transaction the speed-up flow looks at
 */
export interface PendingTransaction {
  txid: string
  confirmed: boolean
  /** Positive when received, negative when sent */
  netAmountSats: number
  changeAmountSats?: number
  feeSats?: number
  feeRateSatPerVb?: number
  vsizeVb?: number
  signalsRbf: boolean
}

// ============================================
// PSBT
// ============================================

export type PsbtPhase =
  | 'exporting'
  | 'awaitingSigned'
  | 'confirmingBroadcast'
  | 'broadcasting'
  | 'done'
  | 'failed'
  | 'cancelled'

export type SignedPayloadFormat = 'psbt' | 'rawTransaction'

export interface ReconciledOutput {
  /** Null for scripts that have no address form */
  address: string | null
  amountSats: number
  isRecipient: boolean
}

/**
 * Totals recomputed from the signed payload the external signer returned
 */
export interface ReconciledTotals {
  format: SignedPayloadFormat
  outputs: readonly ReconciledOutput[]
  inputCount: number
  /** Null when an input's value is not known */
  totalInputSats: number | null
  totalOutputSats: number
  feeSats: number | null
  recipientSats: number
  changeSats: number
  isFinalized: boolean
  signedInputCount: number
  inputsMatchExport: boolean
  differsFromDraft: {
    fee: boolean
    recipients: boolean
  }
}

export interface PsbtSession {
  id: string
  unsignedPayload: string
  phase: PsbtPhase
  signedPayload?: string
  reconciledTotals?: ReconciledTotals
  errorCode?: 'PSBT_UNPARSEABLE_SIGNED_PAYLOAD' | 'PSBT_BROADCAST_FAILED'
  errorMessage?: string
  txid?: string
}
