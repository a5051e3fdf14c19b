import type { AppError } from '../../domain/result'
import type { EvaluatedRow, RecipientRow } from '../../domain/transaction/recipients'
import type {
  AmountDenomination,
  DryRunResult,
  Outpoint,
  Recipient,
  SendMode
} from '../../domain/types'
import type { PsbtHandshake } from '../psbt'

export type DraftPhase =
  | 'empty'
  | 'editing'
  | 'estimating'
  | 'estimated'
  | 'committing'
  | 'done'
  | 'failed'

/**
 * Frozen view of the draft handed to subscribers
 */
export interface SendDraftState {
  phase: DraftPhase
  mode: SendMode
  denomination: AmountDenomination
  rows: readonly EvaluatedRow[]
  /** Rows that passed validation, in row order */
  recipients: readonly Recipient[]
  validRecipientCount: number
  totalSendingSats: number
  feeRateSatPerVb: number
  isMaxSend: boolean
  coinSelection: readonly Outpoint[]
  spendUnconfirmed: boolean
  label: string
  /** Selected coins under coin control, otherwise the spendable balance */
  availableSats: number
  connected: boolean
  generation: number
  /** Latest dry-run result; may belong to an older generation */
  estimate: DryRunResult | null
  estimateGeneration: number | null
  canCommit: boolean
  /** Display only */
  remainingAfterSendSats: number
  committing: boolean
  commitError: AppError | null
  lastTxid: string | null
}

export type SendDraftListener = (state: SendDraftState) => void

export type RowPatch = Partial<Pick<RecipientRow, 'address' | 'amountInput'>>

export type CommitOutcome =
  | { kind: 'sent'; txid: string }
  | { kind: 'psbt'; handshake: PsbtHandshake }
