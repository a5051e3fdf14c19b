/**
 * Amount parsing and recipient aggregation
 *
 * Turns the free-text rows of a send form into the committed recipient list.
 * A row only counts once its address passes checksum validation and its
 * amount is a whole number of satoshis above the dust floor.
 *
 * @module domain/transaction/recipients
 */

import { TRANSACTION } from '../../config'
import { addressFieldError } from '../address'
import { appErr, ok, type AddressErrorCode, type Result } from '../result'
import type { AmountDenomination, Recipient } from '../types'

const SATS_PATTERN = /^\d+$/
const BTC_PATTERN = /^(\d+\.?\d{0,8}|\.\d{1,8})$/
const MAX_SATS = 21_000_000 * TRANSACTION.SATS_PER_BTC

// ============================================
// Amounts
// ============================================

/** Convert a BTC amount to satoshis with safe rounding */
export function btcToSatoshis(btc: number): number {
  if (!Number.isFinite(btc) || btc < 0) return 0
  return Math.round(btc * TRANSACTION.SATS_PER_BTC)
}

/** Convert satoshis to BTC for display */
export function satoshisToBtc(sats: number): number {
  return sats / TRANSACTION.SATS_PER_BTC
}

/**
 * Parse a user-typed amount into integer satoshis.
 *
 * Sats accept digits only; BTC accepts up to 8 decimal places. Commas,
 * signs and exponents are rejected with INVALID_AMOUNT.
 *
 * @example
 * ```typescript
 * parseAmount('150000', 'sats')   // ok(150000)
 * parseAmount('0.0015', 'btc')    // ok(150000)
 * parseAmount('0.000000001', 'btc') // INVALID_AMOUNT (9 decimals)
 * ```
 */
export function parseAmount(input: string, denomination: AmountDenomination): Result<number> {
  const trimmed = input.trim()
  const pattern = denomination === 'sats' ? SATS_PATTERN : BTC_PATTERN

  if (!pattern.test(trimmed)) {
    return appErr('INVALID_AMOUNT', `Not a valid ${denomination} amount: "${trimmed}"`, { input: trimmed, denomination })
  }

  const sats = denomination === 'sats' ? Number(trimmed) : btcToSatoshis(Number(trimmed))
  if (!Number.isSafeInteger(sats) || sats > MAX_SATS) {
    return appErr('INVALID_AMOUNT', 'Amount exceeds the total bitcoin supply', { input: trimmed, denomination })
  }

  return ok(sats)
}

/**
 * Format satoshis for an amount field. BTC drops trailing zeros.
 *
 * @example
 * ```typescript
 * formatAmount(150000, 'btc')    // '0.0015'
 * formatAmount(100000000, 'btc') // '1'
 * ```
 */
export function formatAmount(sats: number, denomination: AmountDenomination): string {
  if (denomination === 'sats') {
    return String(sats)
  }
  return satoshisToBtc(sats).toFixed(8).replace(/\.?0+$/, '')
}

/**
 * Re-express an amount field in another denomination. Text that does not
 * parse is left as typed.
 */
export function convertAmountInput(
  input: string,
  from: AmountDenomination,
  to: AmountDenomination
): string {
  if (from === to || input.trim() === '') return input
  const parsed = parseAmount(input, from)
  return parsed.ok ? formatAmount(parsed.value, to) : input
}

export function isAboveDust(sats: number): boolean {
  return sats > TRANSACTION.DUST_THRESHOLD
}

// ============================================
// Rows
// ============================================

/**
 * One editable recipient row as typed by the user
 */
export interface RecipientRow {
  id: string
  address: string
  amountInput: string
}

export type AmountErrorCode = 'INVALID_AMOUNT' | 'AMOUNT_BELOW_DUST'

export interface EvaluatedRow extends RecipientRow {
  /** Null while the amount is blank or unparseable */
  amountSats: number | null
  addressError: AddressErrorCode | null
  amountError: AmountErrorCode | null
  included: boolean
}

export interface RecipientSummary {
  rows: readonly EvaluatedRow[]
  recipients: readonly Recipient[]
  validRecipientCount: number
  totalSendingSats: number
}

/**
 * Check one row. Blank fields carry no error but keep the row excluded.
 */
export function evaluateRow(row: RecipientRow, denomination: AmountDenomination): EvaluatedRow {
  const address = row.address.trim()
  const addressError = addressFieldError(address)

  let amountSats: number | null = null
  let amountError: AmountErrorCode | null = null

  if (row.amountInput.trim() !== '') {
    const parsed = parseAmount(row.amountInput, denomination)
    if (parsed.ok) {
      amountSats = parsed.value
      if (!isAboveDust(parsed.value)) {
        amountError = 'AMOUNT_BELOW_DUST'
      }
    } else {
      amountError = 'INVALID_AMOUNT'
    }
  }

  const included = address !== '' && addressError === null && amountSats !== null && amountError === null

  return { ...row, amountSats, addressError, amountError, included }
}

/**
 * Evaluate every row and project the included ones into the recipient list.
 */
export function aggregateRecipients(
  rows: readonly RecipientRow[],
  denomination: AmountDenomination
): RecipientSummary {
  const evaluated = rows.map(row => evaluateRow(row, denomination))
  const recipients: Recipient[] = []

  for (const row of evaluated) {
    if (row.included && row.amountSats !== null) {
      recipients.push({ address: row.address.trim(), amountSats: row.amountSats })
    }
  }

  return {
    rows: evaluated,
    recipients,
    validRecipientCount: recipients.length,
    totalSendingSats: recipients.reduce((sum, r) => sum + r.amountSats, 0)
  }
}
