/**
 * Send Draft Orchestrator
 *
 * Owns the one editable send draft of a wallet and keeps a cost estimate
 * for it from the wallet engine's dry-run.
 *
 * Estimation:
 * - Edits that change what the engine would build bump `generation` and
 *   restart a short debounce timer. When the timer fires one dry-run is
 *   issued with the draft as it is at that moment.
 * - Each request carries the generation it was built from and its own
 *   AbortSignal. A newer edit aborts it; a result that arrives for an older
 *   generation is dropped.
 *
 * Max-send fills the amount with a local heuristic at once and replaces it
 * with the engine's exact figure when the matching estimate arrives.
 */

import { randomUUID } from 'node:crypto'
import { SEND, TRANSACTION } from '../../config'
import type {
  CommitRequest,
  DryRunRequest,
  IDraftStore,
  IWalletEngine,
  PersistedDraft
} from '../../domain/repositories'
import { AppError, appErr, err, ok, type DryRunErrorCode, type Result } from '../../domain/result'
import {
  availableForSend,
  isSpendable,
  pruneSelection,
  toggleSelection
} from '../../domain/transaction/coinControl'
import { clampFeeRate, isBelowMinimumFeeRate, maxSendHeuristic } from '../../domain/transaction/fees'
import {
  aggregateRecipients,
  convertAmountInput,
  formatAmount,
  type RecipientRow,
  type RecipientSummary
} from '../../domain/transaction/recipients'
import {
  dryRunError,
  isDryRunOk,
  type AmountDenomination,
  type DryRunResult,
  type Outpoint,
  type Recipient,
  type SendMode,
  type Utxo
} from '../../domain/types'
import { parsePaymentUri, type PaymentRequest } from '../../domain/wallet/bip21'
import { CancellationController, isCancellationError, type CancelReason } from '../cancellation'
import { getNetwork, type NetworkType } from '../config'
import { FeeRateBelowMinimumError, InvalidStateError } from '../errors'
import { draftLogger } from '../logger'
import { PsbtHandshake } from '../psbt'
import type {
  CommitOutcome,
  DraftPhase,
  RowPatch,
  SendDraftListener,
  SendDraftState
} from './types'

export interface SendDraftOrchestratorOptions {
  engine: IWalletEngine
  /** Without a store the draft lives in memory only */
  store?: IDraftStore
  network?: NetworkType
  /** Defaults to true */
  connected?: boolean
  debounceMs?: number
}

type DraftFields = Omit<PersistedDraft, 'version'>

const DRY_RUN_CODES: readonly DryRunErrorCode[] = [
  'DRY_RUN_INSUFFICIENT_FUNDS',
  'DRY_RUN_BELOW_DUST_LIMIT',
  'DRY_RUN_NETWORK_UNAVAILABLE'
]

function blankRow(): RecipientRow {
  return { id: randomUUID(), address: '', amountInput: '' }
}

function isBlankRow(row: RecipientRow): boolean {
  return row.address.trim() === '' && row.amountInput.trim() === ''
}

function freshDraft(denomination: AmountDenomination, feeRateSatPerVb: number): DraftFields {
  return {
    mode: 'single',
    denomination,
    rows: [blankRow()],
    feeRateSatPerVb,
    isMaxSend: false,
    coinSelection: [],
    spendUnconfirmed: false,
    label: ''
  }
}

function replaceFirstRow(rows: readonly RecipientRow[], patch: RowPatch): RecipientRow[] {
  const [first = blankRow(), ...rest] = rows
  return [{ ...first, ...patch }, ...rest]
}

function toDryRunCode(error: AppError): DryRunErrorCode {
  return DRY_RUN_CODES.find(code => code === error.code) ?? 'DRY_RUN_NETWORK_UNAVAILABLE'
}

/**
 * Private copy of an engine result, so neither the engine nor a subscriber
 * can change what canCommit reads.
 */
function frozenResult(result: DryRunResult): DryRunResult {
  const { error } = result
  return Object.freeze({ ...result, ...(error && { error: Object.freeze({ ...error }) }) })
}

export class SendDraftOrchestrator {
  private readonly engine: IWalletEngine
  private readonly store: IDraftStore | null
  private readonly network: NetworkType
  private readonly debounceMs: number

  private draft: DraftFields
  private utxos: Utxo[] = []
  private connected: boolean

  private generation = 0
  private requestKey: string
  private timer: ReturnType<typeof setTimeout> | null = null
  private inFlight: CancellationController | null = null
  private estimate: DryRunResult | null = null
  private estimateGeneration: number | null = null

  private committing = false
  private commitError: AppError | null = null
  private outcome: 'done' | 'failed' | null = null
  private lastTxid: string | null = null

  private estimateTasks = new Set<Promise<void>>()
  private persistChain: Promise<void> = Promise.resolve()
  /** Serialized form of the last write; null for a cleared draft */
  private persistedKey: string | null = null
  private listeners = new Set<SendDraftListener>()
  private state: SendDraftState
  private disposed = false

  constructor(options: SendDraftOrchestratorOptions) {
    this.engine = options.engine
    this.store = options.store ?? null
    this.network = options.network ?? getNetwork()
    this.connected = options.connected ?? true
    this.debounceMs = options.debounceMs ?? SEND.ESTIMATE_DEBOUNCE_MS
    this.draft = freshDraft('sats', TRANSACTION.DEFAULT_FEE_RATE_SAT_PER_VB)

    const summary = this.summarize()
    this.requestKey = this.keyFor(summary)
    this.state = this.snapshot(summary)
  }

  // ============================================
  // Observation
  // ============================================

  getState(): SendDraftState {
    return this.state
  }

  subscribe(listener: SendDraftListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /**
   * Resolves once no dry-run is in flight and every queued write has
   * reached the store. A pending debounce timer is not waited for.
   */
  async settled(): Promise<void> {
    let persist: Promise<void>
    do {
      persist = this.persistChain
      await Promise.all([...this.estimateTasks, persist])
    } while (this.estimateTasks.size > 0 || persist !== this.persistChain)
  }

  // ============================================
  // Recipient editing
  // ============================================

  /** Address of the first row */
  setAddress(address: string): void {
    this.edit(draft => ({ ...draft, rows: replaceFirstRow(draft.rows, { address }) }))
  }

  /**
   * Amount of the first row, in the current denomination. Typing an amount
   * turns max-send off.
   */
  setAmount(amountInput: string): void {
    this.edit(draft => ({
      ...draft,
      isMaxSend: false,
      rows: replaceFirstRow(draft.rows, { amountInput })
    }))
  }

  setDenomination(denomination: AmountDenomination): void {
    if (denomination === this.draft.denomination) return
    this.edit(draft => ({
      ...draft,
      denomination,
      rows: draft.rows.map(row => ({
        ...row,
        amountInput: convertAmountInput(row.amountInput, draft.denomination, denomination)
      }))
    }))
  }

  /**
   * Fill the first row from a scanned or pasted `bitcoin:` URI or bare address.
   */
  applyPaymentUri(uri: string): Result<PaymentRequest> {
    const parsed = parsePaymentUri(uri)
    if (!parsed.ok) return parsed

    const { address, amountSats, label } = parsed.value
    this.edit(draft => {
      const patch: RowPatch = amountSats === undefined
        ? { address }
        : { address, amountInput: formatAmount(amountSats, draft.denomination) }
      return {
        ...draft,
        isMaxSend: amountSats === undefined ? draft.isMaxSend : false,
        label: label ?? draft.label,
        rows: replaceFirstRow(draft.rows, patch)
      }
    })
    return parsed
  }

  /**
   * Switching seeds the new mode from the old one: single to multi keeps the
   * row and adds an empty one, multi to single keeps the first row.
   */
  setMode(mode: SendMode): void {
    if (mode === this.draft.mode) return
    this.edit(draft => {
      const [first = blankRow()] = draft.rows
      return mode === 'multi'
        ? { ...draft, mode, isMaxSend: false, rows: [first, blankRow()] }
        : { ...draft, mode, rows: [first] }
    })
  }

  addRow(): Result<string> {
    if (this.draft.mode !== 'multi') {
      return err(new InvalidStateError('add a recipient row', 'in single mode'))
    }
    const row = blankRow()
    this.edit(draft => ({ ...draft, rows: [...draft.rows, row] }))
    return ok(row.id)
  }

  updateRow(id: string, patch: RowPatch): Result<void> {
    if (!this.draft.rows.some(row => row.id === id)) {
      return appErr('INVALID_STATE', `No recipient row ${id}`, { id })
    }
    this.edit(draft => ({
      ...draft,
      isMaxSend: patch.amountInput === undefined ? draft.isMaxSend : false,
      rows: draft.rows.map(row => (row.id === id ? { ...row, ...patch } : row))
    }))
    return ok(undefined)
  }

  removeRow(id: string): Result<void> {
    if (this.draft.mode !== 'multi') {
      return err(new InvalidStateError('remove a recipient row', 'in single mode'))
    }
    if (!this.draft.rows.some(row => row.id === id)) {
      return appErr('INVALID_STATE', `No recipient row ${id}`, { id })
    }
    if (this.draft.rows.length === 1) {
      return err(new InvalidStateError('remove the last recipient row', 'in multi mode'))
    }
    this.edit(draft => ({ ...draft, rows: draft.rows.filter(row => row.id !== id) }))
    return ok(undefined)
  }

  setLabel(label: string): void {
    this.edit(draft => ({ ...draft, label }))
  }

  // ============================================
  // Fee rate & coins
  // ============================================

  setFeeRate(feeRateSatPerVb: number): Result<void> {
    if (isBelowMinimumFeeRate(feeRateSatPerVb)) {
      return err(new FeeRateBelowMinimumError(feeRateSatPerVb, TRANSACTION.MIN_FEE_RATE_SAT_PER_VB))
    }
    this.edit(draft => this.withMaxSendHeuristic({ ...draft, feeRateSatPerVb: clampFeeRate(feeRateSatPerVb) }))
    return ok(undefined)
  }

  /**
   * Replace the manual coin selection. An empty list hands coin choice back
   * to the engine.
   */
  setCoinSelection(outpoints: readonly Outpoint[]): Result<void> {
    const unspendable = outpoints.find(outpoint => !this.isSpendableOutpoint(outpoint))
    if (unspendable !== undefined) {
      return appErr('UTXO_NOT_SPENDABLE', `Coin ${unspendable} cannot be spent`, { outpoint: unspendable })
    }
    const coinSelection = [...new Set(outpoints)]
    this.edit(draft => this.withMaxSendHeuristic({ ...draft, coinSelection }))
    return ok(undefined)
  }

  toggleUtxo(outpoint: Outpoint): Result<void> {
    const selected = this.draft.coinSelection.includes(outpoint)
    if (!selected && !this.isSpendableOutpoint(outpoint)) {
      return appErr('UTXO_NOT_SPENDABLE', `Coin ${outpoint} cannot be spent`, { outpoint })
    }
    this.edit(draft => this.withMaxSendHeuristic({
      ...draft,
      coinSelection: toggleSelection(draft.coinSelection, outpoint)
    }))
    return ok(undefined)
  }

  /**
   * Current unspent set. Selected coins that left it are dropped.
   */
  setUtxos(utxos: readonly Utxo[]): void {
    this.utxos = [...utxos]
    this.edit(draft => this.withMaxSendHeuristic(this.withPrunedSelection(draft)))
  }

  setSpendUnconfirmed(spendUnconfirmed: boolean): void {
    if (spendUnconfirmed === this.draft.spendUnconfirmed) return
    this.edit(draft => this.withMaxSendHeuristic(this.withPrunedSelection({ ...draft, spendUnconfirmed })))
  }

  /**
   * Send everything available to the single recipient.
   */
  setMaxSend(enabled: boolean): Result<void> {
    if (enabled && this.draft.mode !== 'single') {
      return err(new InvalidStateError('send max', 'in multi mode'))
    }
    if (enabled === this.draft.isMaxSend) return ok(undefined)
    this.edit(draft => this.withMaxSendHeuristic({ ...draft, isMaxSend: enabled }))
    return ok(undefined)
  }

  // ============================================
  // Connectivity
  // ============================================

  setConnected(connected: boolean): void {
    if (connected === this.connected) return
    this.connected = connected
    if (connected) {
      this.scheduleEstimate()
    } else {
      this.stopEstimation('disconnected')
    }
    this.emit()
  }

  /**
   * Drop the pending timer, any in-flight dry-run and the current estimate.
   */
  cancelEstimation(): void {
    this.stopEstimation('cancelled')
    this.emit()
  }

  // ============================================
  // Lifecycle
  // ============================================

  discard(): void {
    draftLogger.info('Draft discarded', { generation: this.generation })
    this.stopEstimation('cancelled')
    this.edit(draft => freshDraft(draft.denomination, draft.feeRateSatPerVb))
  }

  /**
   * Load the stored draft. Call after `setUtxos` so stale coins are pruned.
   * Resolves to false when nothing usable was stored.
   */
  async restore(): Promise<Result<boolean>> {
    if (!this.store) return ok(false)

    let stored: PersistedDraft | null
    try {
      stored = await this.store.load()
    } catch (error) {
      const appError = AppError.fromUnknown(error, 'STORAGE_ERROR')
      draftLogger.error('Failed to restore draft', appError)
      return err(appError)
    }
    if (!stored) return ok(false)

    const coinSelection = pruneSelection(stored.coinSelection, this.utxos, stored.spendUnconfirmed)
    if (coinSelection.length !== stored.coinSelection.length) {
      draftLogger.info('Dropped restored coins that are no longer spendable', {
        stored: stored.coinSelection.length,
        kept: coinSelection.length
      })
    }

    const rows = stored.rows.length > 0 ? stored.rows.map(row => ({ ...row })) : [blankRow()]
    const [first = blankRow()] = rows
    const restoredRows = stored.mode === 'single'
      ? [first]
      : rows.length >= SEND.MIN_MULTI_RECIPIENTS ? rows : [...rows, blankRow()]

    const restored: DraftFields = {
      mode: stored.mode,
      denomination: stored.denomination,
      rows: restoredRows,
      feeRateSatPerVb: isBelowMinimumFeeRate(stored.feeRateSatPerVb)
        ? TRANSACTION.DEFAULT_FEE_RATE_SAT_PER_VB
        : clampFeeRate(stored.feeRateSatPerVb),
      isMaxSend: stored.isMaxSend && stored.mode === 'single',
      coinSelection,
      spendUnconfirmed: stored.spendUnconfirmed,
      label: stored.label
    }
    this.edit(() => restored)
    draftLogger.info('Draft restored', { mode: restored.mode, rows: restored.rows.length })
    return ok(true)
  }

  /**
   * Send the draft. A full wallet signs and broadcasts through the engine;
   * a watch-only wallet gets a PSBT handshake to complete externally.
   */
  async commit(): Promise<Result<CommitOutcome>> {
    if (this.committing) {
      return appErr('COMMIT_IN_PROGRESS', 'A commit is already in progress')
    }
    const summary = this.summarize()
    if (!this.canCommit(summary)) {
      return appErr('DRAFT_NOT_COMMITTABLE', 'Draft is not ready to commit', {
        phase: this.state.phase,
        validRecipientCount: summary.validRecipientCount
      })
    }

    const label = this.draft.label.trim()
    const request: CommitRequest = {
      ...this.buildRequest(summary),
      label: label === '' ? undefined : label
    }

    this.committing = true
    this.commitError = null
    this.outcome = null
    this.emit(summary)
    draftLogger.info('Committing draft', {
      generation: this.generation,
      recipients: request.recipients.length,
      watchOnly: this.engine.isWatchOnly
    })

    let result: Result<CommitOutcome>
    try {
      result = this.engine.isWatchOnly
        ? await this.commitWatchOnly(request)
        : await this.commitSend(request)
    } catch (error) {
      result = err(AppError.fromUnknown(error, 'COMMIT_FAILED'))
    }
    this.committing = false

    if (!result.ok) {
      draftLogger.error('Commit failed', result.error, { code: result.error.code })
      this.commitError = result.error
      this.outcome = 'failed'
      this.emit()
      return result
    }

    this.lastTxid = result.value.kind === 'sent' ? result.value.txid : null
    this.stopEstimation('committed')
    this.draft = freshDraft(this.draft.denomination, this.draft.feeRateSatPerVb)
    this.applyChange()
    this.outcome = 'done'
    this.emit()
    return result
  }

  /**
   * Stop timers and in-flight work. The instance takes no further estimates.
   */
  dispose(): void {
    this.disposed = true
    this.stopEstimation('disposed')
    this.listeners.clear()
  }

  // ============================================
  // Commit helpers
  // ============================================

  private async commitSend(request: CommitRequest): Promise<Result<CommitOutcome>> {
    const sent = await this.engine.commitSend(request)
    if (!sent.ok) return sent
    draftLogger.info('Transaction broadcast', { txid: sent.value })
    return ok({ kind: 'sent', txid: sent.value })
  }

  private async commitWatchOnly(request: CommitRequest): Promise<Result<CommitOutcome>> {
    const created = await this.engine.commitPsbtCreate(request)
    if (!created.ok) return created
    const handshake = new PsbtHandshake({
      created: created.value,
      draftRecipientSats: request.recipients.reduce((sum, r) => sum + r.amountSats, 0),
      engine: this.engine,
      network: this.network
    })
    draftLogger.info('PSBT created for external signing', { sessionId: handshake.id })
    return ok({ kind: 'psbt', handshake })
  }

  // ============================================
  // Change tracking
  // ============================================

  private edit(update: (draft: DraftFields) => DraftFields): void {
    this.draft = update(this.draft)
    this.outcome = null
    this.commitError = null
    this.applyChange()
    this.emit()
  }

  /**
   * Bump the generation when the engine would now build something
   * different, and persist.
   */
  private applyChange(): void {
    const key = this.keyFor(this.summarize())
    if (key !== this.requestKey) {
      this.requestKey = key
      this.generation++
      this.abortInFlight('superseded')
      this.scheduleEstimate()
    }
    this.persist()
  }

  /**
   * Identity of the dry-run the draft calls for. Under max-send the engine
   * decides the amount, so only the address and the funds count.
   */
  private keyFor(summary: RecipientSummary): string {
    const { draft } = this
    const recipients = this.estimationRecipients(summary)
    return JSON.stringify({
      recipients: draft.isMaxSend ? recipients.map(r => r.address) : recipients,
      available: draft.isMaxSend ? this.availableSats() : null,
      feeRateSatPerVb: draft.feeRateSatPerVb,
      coinSelection: draft.coinSelection,
      isMaxSend: draft.isMaxSend,
      spendUnconfirmed: draft.spendUnconfirmed
    })
  }

  // ============================================
  // Estimation
  // ============================================

  private scheduleEstimate(): void {
    this.clearTimer()
    if (this.disposed || !this.connected) return
    if (this.estimationRecipients(this.summarize()).length === 0) return
    this.timer = setTimeout(() => {
      this.timer = null
      const task: Promise<void> = this.runEstimate().finally(() => {
        this.estimateTasks.delete(task)
      })
      this.estimateTasks.add(task)
    }, this.debounceMs)
  }

  private async runEstimate(): Promise<void> {
    const generation = this.generation
    const request = this.buildRequest(this.summarize())
    if (request.recipients.length === 0) {
      draftLogger.debug('No valid recipients to estimate', { generation })
      return
    }

    this.abortInFlight('superseded')
    const controller = new CancellationController(generation)
    this.inFlight = controller
    this.emit()
    draftLogger.debug('Dry-run issued', {
      generation,
      recipients: request.recipients.length,
      feeRateSatPerVb: request.feeRateSatPerVb,
      isMaxSend: request.isMaxSend
    })

    const result = await this.requestDryRun(request, controller)

    if (!controller.isCurrent(this.generation)) {
      draftLogger.debug('Discarded stale dry-run', {
        generation,
        current: this.generation,
        reason: controller.reason ?? 'superseded'
      })
      return
    }

    this.inFlight = null
    this.estimate = frozenResult(result)
    this.estimateGeneration = generation
    if (result.error) {
      draftLogger.info('Dry-run reported an error', { generation, code: result.error.code })
    } else if (this.draft.isMaxSend) {
      this.applyExactMaxAmount(result.recipientAmountSats)
    }
    this.emit()
  }

  private async requestDryRun(request: DryRunRequest, controller: CancellationController): Promise<DryRunResult> {
    try {
      return await this.engine.dryRun(request, controller.signal)
    } catch (error) {
      const appError = AppError.fromUnknown(error, 'DRY_RUN_NETWORK_UNAVAILABLE')
      if (controller.isCancelled || isCancellationError(error)) {
        draftLogger.debug('Dry-run aborted', { generation: controller.generation, reason: controller.reason })
      } else {
        draftLogger.warn('Dry-run rejected', { code: appError.code }, appError)
      }
      return dryRunError(toDryRunCode(appError), appError.message)
    }
  }

  /**
   * Put the engine's exact max-send amount in the amount field. An amount
   * that already matches is left alone.
   */
  private applyExactMaxAmount(sats: number): void {
    const [first] = this.draft.rows
    if (!first) return
    const amountInput = formatAmount(sats, this.draft.denomination)
    if (first.amountInput === amountInput) return
    this.draft = { ...this.draft, rows: replaceFirstRow(this.draft.rows, { amountInput }) }
    this.persist()
  }

  private withMaxSendHeuristic(draft: DraftFields): DraftFields {
    if (!draft.isMaxSend) return draft
    const available = availableForSend(draft.coinSelection, this.utxos, draft.spendUnconfirmed)
    const amountInput = formatAmount(maxSendHeuristic(available, draft.feeRateSatPerVb), draft.denomination)
    return { ...draft, rows: replaceFirstRow(draft.rows, { amountInput }) }
  }

  private withPrunedSelection(draft: DraftFields): DraftFields {
    const coinSelection = pruneSelection(draft.coinSelection, this.utxos, draft.spendUnconfirmed)
    if (coinSelection.length !== draft.coinSelection.length) {
      draftLogger.debug('Pruned coin selection', { before: draft.coinSelection.length, after: coinSelection.length })
    }
    return { ...draft, coinSelection }
  }

  private stopEstimation(reason: CancelReason): void {
    this.clearTimer()
    this.abortInFlight(reason)
    this.estimate = null
    this.estimateGeneration = null
  }

  private abortInFlight(reason: CancelReason): void {
    if (this.inFlight) {
      this.inFlight.cancel(reason)
      this.inFlight = null
    }
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer)
      this.timer = null
    }
  }

  // ============================================
  // Projections
  // ============================================

  private summarize(): RecipientSummary {
    return aggregateRecipients(this.draft.rows, this.draft.denomination)
  }

  /**
   * Recipients sent to the engine. Under max-send the first row goes out
   * as soon as its address is valid, whatever the placeholder amount.
   */
  private estimationRecipients(summary: RecipientSummary): Recipient[] {
    if (!this.draft.isMaxSend) return [...summary.recipients]
    const [first] = summary.rows
    if (!first || first.address.trim() === '' || first.addressError !== null) return []
    return [{ address: first.address.trim(), amountSats: first.amountSats ?? 0 }]
  }

  private buildRequest(summary: RecipientSummary): DryRunRequest {
    return {
      recipients: this.estimationRecipients(summary),
      feeRateSatPerVb: this.draft.feeRateSatPerVb,
      coinSelection: [...this.draft.coinSelection],
      isMaxSend: this.draft.isMaxSend,
      spendUnconfirmed: this.draft.spendUnconfirmed
    }
  }

  private availableSats(): number {
    return availableForSend(this.draft.coinSelection, this.utxos, this.draft.spendUnconfirmed)
  }

  private isSpendableOutpoint(outpoint: Outpoint): boolean {
    return this.utxos.some(utxo => utxo.outpoint === outpoint && isSpendable(utxo, this.draft.spendUnconfirmed))
  }

  private hasCurrentEstimate(): boolean {
    return this.estimateGeneration === this.generation && isDryRunOk(this.estimate)
  }

  private canCommit(summary: RecipientSummary): boolean {
    const countFits = this.draft.mode === 'single'
      ? summary.validRecipientCount === 1
      : summary.validRecipientCount >= SEND.MIN_MULTI_RECIPIENTS
    return this.connected && !this.committing && countFits && this.hasCurrentEstimate()
  }

  private phase(): DraftPhase {
    if (this.committing) return 'committing'
    if (this.outcome) return this.outcome
    if (this.draft.rows.every(isBlankRow)) return 'empty'
    if (this.inFlight || this.timer !== null) return 'estimating'
    return this.estimate !== null && this.estimateGeneration === this.generation ? 'estimated' : 'editing'
  }

  private snapshot(summary: RecipientSummary): SendDraftState {
    const estimate = this.estimate
    const availableSats = this.availableSats()
    const feeSats = estimate && this.hasCurrentEstimate() ? estimate.feeSats : 0

    return Object.freeze({
      phase: this.phase(),
      mode: this.draft.mode,
      denomination: this.draft.denomination,
      rows: Object.freeze([...summary.rows]),
      recipients: Object.freeze([...summary.recipients]),
      validRecipientCount: summary.validRecipientCount,
      totalSendingSats: summary.totalSendingSats,
      feeRateSatPerVb: this.draft.feeRateSatPerVb,
      isMaxSend: this.draft.isMaxSend,
      coinSelection: Object.freeze([...this.draft.coinSelection]),
      spendUnconfirmed: this.draft.spendUnconfirmed,
      label: this.draft.label,
      availableSats,
      connected: this.connected,
      generation: this.generation,
      estimate,
      estimateGeneration: this.estimateGeneration,
      canCommit: this.canCommit(summary),
      remainingAfterSendSats: availableSats - summary.totalSendingSats - feeSats,
      committing: this.committing,
      commitError: this.commitError,
      lastTxid: this.lastTxid
    })
  }

  private emit(summary: RecipientSummary = this.summarize()): void {
    this.state = this.snapshot(summary)
    for (const listener of this.listeners) {
      listener(this.state)
    }
  }

  // ============================================
  // Persistence
  // ============================================

  private persist(): void {
    const store = this.store
    if (!store) return
    const draft: PersistedDraft | null = this.draft.rows.every(isBlankRow)
      ? null
      : {
          version: 1,
          ...this.draft,
          rows: this.draft.rows.map(row => ({ ...row })),
          coinSelection: [...this.draft.coinSelection]
        }
    const key = draft ? JSON.stringify(draft) : null
    if (key === this.persistedKey) return
    this.persistedKey = key

    this.persistChain = this.persistChain
      .then(() => (draft ? store.save(draft) : store.clear()))
      .catch((error: unknown) => {
        draftLogger.error('Failed to persist draft', error)
      })
  }
}
