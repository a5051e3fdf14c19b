/**
 * PSBT Handshake
 *
 * Session for a watch-only wallet that signs on an external device:
 * export the unsigned PSBT, take back the signed payload, let the user
 * confirm totals recomputed from it, then broadcast once.
 *
 * Phases move forward only:
 * exporting → awaitingSigned → confirmingBroadcast → broadcasting → done | failed.
 * cancel() is allowed until broadcasting starts and ends in `cancelled`.
 */

import { randomUUID } from 'node:crypto'
import type { Transaction } from '@scure/btc-signer'
import type { IWalletEngine, PsbtCreated } from '../../domain/repositories'
import { AppError, appErr, err, ok, type Result } from '../../domain/result'
import type { PsbtPhase, PsbtSession, ReconciledTotals } from '../../domain/types'
import type { NetworkType } from '../config'
import { BroadcastError, InvalidStateError } from '../errors'
import { psbtLogger } from '../logger'
import { parseSignedPayload, parseUnsignedPsbt, reconcileTotals } from './payload'

export interface PsbtHandshakeOptions {
  created: PsbtCreated
  /** Total the draft sent to recipients, for comparison only */
  draftRecipientSats: number
  engine: Pick<IWalletEngine, 'broadcastSigned'>
  network: NetworkType
  id?: string
}

export type PsbtSessionListener = (session: Readonly<PsbtSession>) => void

const ACCEPTS_PAYLOAD: readonly PsbtPhase[] = ['exporting', 'awaitingSigned']
const CANCELLABLE: readonly PsbtPhase[] = ['exporting', 'awaitingSigned', 'confirmingBroadcast']

export class PsbtHandshake {
  private session: PsbtSession
  private readonly exported: Transaction | null
  private readonly options: PsbtHandshakeOptions
  private listeners = new Set<PsbtSessionListener>()

  constructor(options: PsbtHandshakeOptions) {
    this.options = options
    this.session = {
      id: options.id ?? randomUUID(),
      unsignedPayload: options.created.psbtBase64,
      phase: 'exporting'
    }
    this.exported = parseUnsignedPsbt(options.created.psbtBase64)
    if (!this.exported) {
      psbtLogger.warn('Exported PSBT could not be decoded; input checks are disabled', { sessionId: this.session.id })
    }
  }

  get phase(): PsbtPhase {
    return this.session.phase
  }

  get id(): string {
    return this.session.id
  }

  /**
   * Snapshot of the session. Later transitions do not change it.
   */
  getSession(): Readonly<PsbtSession> {
    return Object.freeze({ ...this.session })
  }

  subscribe(listener: PsbtSessionListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  private update(patch: Partial<PsbtSession>): void {
    const from = this.session.phase
    this.session = { ...this.session, ...patch }
    if (patch.phase && patch.phase !== from) {
      psbtLogger.info('PSBT session phase changed', { sessionId: this.session.id, from, to: patch.phase })
    }
    const snapshot = this.getSession()
    for (const listener of this.listeners) {
      listener(snapshot)
    }
  }

  /**
   * The unsigned payload has been handed to a transport (QR, file, clipboard).
   */
  markExported(): Result<void> {
    if (this.session.phase === 'awaitingSigned') {
      return ok(undefined)
    }
    if (this.session.phase !== 'exporting') {
      return err(new InvalidStateError('mark exported', this.session.phase))
    }
    this.update({ phase: 'awaitingSigned' })
    return ok(undefined)
  }

  /**
   * Take the signer's output. On failure the session waits for another try.
   */
  acceptSignedPayload(blob: string | Uint8Array): Result<ReconciledTotals> {
    if (!ACCEPTS_PAYLOAD.includes(this.session.phase)) {
      return err(new InvalidStateError('accept a signed payload', this.session.phase))
    }

    const parsed = parseSignedPayload(blob)
    if (!parsed.ok) {
      psbtLogger.warn('Rejected signed payload', { sessionId: this.session.id, reason: parsed.error.message })
      this.update({
        phase: 'awaitingSigned',
        errorCode: 'PSBT_UNPARSEABLE_SIGNED_PAYLOAD',
        errorMessage: parsed.error.message
      })
      return parsed
    }

    const totals = reconcileTotals(parsed.value, {
      exported: this.exported,
      recipientAddresses: this.options.created.recipientAddresses,
      draftFeeSats: this.options.created.feeSats,
      draftRecipientSats: this.options.draftRecipientSats,
      network: this.options.network
    })

    if (!totals.inputsMatchExport) {
      psbtLogger.warn('Signed payload spends different inputs than the export', { sessionId: this.session.id })
    }

    this.update({
      phase: 'confirmingBroadcast',
      signedPayload: parsed.value.canonical,
      reconciledTotals: totals,
      errorCode: undefined,
      errorMessage: undefined
    })
    return ok(totals)
  }

  /**
   * Broadcast the accepted payload. A failure is final for this session.
   */
  async confirmBroadcast(): Promise<Result<string>> {
    const payload = this.session.signedPayload
    if (this.session.phase !== 'confirmingBroadcast' || payload === undefined) {
      return err(new InvalidStateError('broadcast', this.session.phase))
    }

    this.update({ phase: 'broadcasting' })

    let result: Result<string>
    try {
      result = await this.options.engine.broadcastSigned(payload)
    } catch (error) {
      result = err(AppError.fromUnknown(error, 'PSBT_BROADCAST_FAILED'))
    }

    if (result.ok) {
      this.update({ phase: 'done', txid: result.value })
      return result
    }

    psbtLogger.error('Broadcast of signed payload failed', result.error, { sessionId: this.session.id })
    const failure = new BroadcastError(result.error.message, result.error)
    this.update({ phase: 'failed', errorCode: 'PSBT_BROADCAST_FAILED', errorMessage: failure.message })
    return err(failure)
  }

  cancel(): Result<void> {
    if (!CANCELLABLE.includes(this.session.phase)) {
      return appErr('PSBT_CANCEL_NOT_ALLOWED', `Cannot cancel while ${this.session.phase}`, {
        phase: this.session.phase
      })
    }
    this.update({ phase: 'cancelled' })
    return ok(undefined)
  }
}
