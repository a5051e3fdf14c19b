/**
 * Collaborator Interfaces
 *
 * Abstract boundaries to the wallet engine and draft storage, enabling:
 * - Testability through in-process fakes
 * - Swapping the engine (BDK, Core RPC, hardware bridge) without touching flows
 *
 * @module domain/repositories
 */

import type { Result } from '../result'
import type {
  AmountDenomination,
  DryRunResult,
  Outpoint,
  SendDraft,
  SendMode
} from '../types'
import type { RecipientRow } from '../transaction/recipients'

// ============================================
// Wallet Engine
// ============================================

/**
 * What the engine needs to estimate a send: the committed projection of
 * the draft, less the label
 */
export interface DryRunRequest extends Omit<SendDraft, 'label'> {
  spendUnconfirmed: boolean
}

export type CommitRequest = DryRunRequest & Pick<SendDraft, 'label'>

export interface PsbtCreated {
  /** Base64 PSBT ready for an external signer */
  psbtBase64: string
  feeSats: number
  /** Recipient addresses as committed, used to split outputs after signing */
  recipientAddresses: readonly string[]
}

export interface IWalletEngine {
  /** True when the wallet holds no private keys and must sign externally */
  readonly isWatchOnly: boolean

  /**
   * Build (never sign or broadcast) a transaction and report its cost.
   * Engine failures come back in `result.error`; rejections mean transport trouble.
   */
  dryRun(request: DryRunRequest, signal?: AbortSignal): Promise<DryRunResult>

  /** Sign and broadcast; resolves to the txid */
  commitSend(request: CommitRequest): Promise<Result<string>>

  /** Create an unsigned PSBT for a watch-only wallet */
  commitPsbtCreate(request: CommitRequest): Promise<Result<PsbtCreated>>

  /** Broadcast an externally signed PSBT (base64) or raw transaction (hex) */
  broadcastSigned(payload: string): Promise<Result<string>>

  /** Replace an unconfirmed transaction at a higher fee rate */
  bumpFee(txid: string, feeRateSatPerVb: number): Promise<Result<string>>

  /** Spend an output of an unconfirmed transaction in a high-fee child */
  cpfp(txid: string, feeRateSatPerVb: number): Promise<Result<string>>
}

// ============================================
// Draft Store
// ============================================

/**
 * The editable draft as it survives a restart
 */
export interface PersistedDraft {
  version: 1
  mode: SendMode
  denomination: AmountDenomination
  rows: RecipientRow[]
  feeRateSatPerVb: number
  isMaxSend: boolean
  coinSelection: Outpoint[]
  spendUnconfirmed: boolean
  label: string
}

export interface IDraftStore {
  /** Null when nothing is stored or the stored data is unreadable */
  load(): Promise<PersistedDraft | null>

  save(draft: PersistedDraft): Promise<void>

  clear(): Promise<void>
}
