/**
 * Signed payload parsing and reconciliation
 *
 * Accepts whatever an external signer hands back (a PSBT in base64, hex or
 * binary, or a finished raw transaction in hex or binary) and recomputes
 * the totals the user confirms before broadcast.
 */

import { Utils } from '@bsv/sdk'
import { Address, NETWORK, OutScript, TEST_NETWORK, Transaction } from '@scure/btc-signer'
import { err, ok, type Result } from '../../domain/result'
import type { ReconciledOutput, ReconciledTotals, SignedPayloadFormat } from '../../domain/types'
import { SignedPayloadError } from '../errors'
import type { NetworkType } from '../config'

const PSBT_MAGIC = [0x70, 0x73, 0x62, 0x74, 0xff]

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})+$/
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/

const TX_OPTIONS = {
  allowUnknownOutputs: true,
  allowUnknownInputs: true,
  allowLegacyWitnessUtxo: true
}

export interface NormalizedPayload {
  format: SignedPayloadFormat
  bytes: Uint8Array
}

export interface ParsedPayload extends NormalizedPayload {
  tx: Transaction
  /** Canonical text form handed to the engine: base64 PSBT or hex transaction */
  canonical: string
}

// ============================================
// Normalisation
// ============================================

function hasPsbtMagic(bytes: ArrayLike<number>): boolean {
  return PSBT_MAGIC.every((byte, i) => bytes[i] === byte)
}

function isPrintableText(bytes: Uint8Array): boolean {
  return bytes.length > 0 && bytes.every(b => (b >= 0x20 && b <= 0x7e) || b === 0x09 || b === 0x0a || b === 0x0d)
}

function classify(bytes: Uint8Array): NormalizedPayload {
  return { format: hasPsbtMagic(bytes) ? 'psbt' : 'rawTransaction', bytes }
}

function normalizeText(text: string): Result<NormalizedPayload, SignedPayloadError> {
  const trimmed = text.trim()
  if (trimmed === '') {
    return err(new SignedPayloadError('payload is empty'))
  }
  if (HEX_PATTERN.test(trimmed)) {
    return ok(classify(Uint8Array.from(Utils.toArray(trimmed, 'hex'))))
  }
  if (BASE64_PATTERN.test(trimmed)) {
    return ok(classify(Uint8Array.from(Utils.toArray(trimmed, 'base64'))))
  }
  return err(new SignedPayloadError('text is neither hex nor base64'))
}

/**
 * Work out what a signer returned. Binary starting with `psbt\xff` is a PSBT,
 * printable binary is decoded as text, other binary is a raw transaction.
 */
export function normalizeSignedPayload(blob: string | Uint8Array): Result<NormalizedPayload, SignedPayloadError> {
  if (typeof blob === 'string') {
    return normalizeText(blob)
  }
  if (blob.length === 0) {
    return err(new SignedPayloadError('payload is empty'))
  }
  if (hasPsbtMagic(blob)) {
    return ok({ format: 'psbt', bytes: blob })
  }
  if (isPrintableText(blob)) {
    return normalizeText(new TextDecoder().decode(blob))
  }
  return ok({ format: 'rawTransaction', bytes: blob })
}

/**
 * Normalise and decode a signed payload.
 */
export function parseSignedPayload(blob: string | Uint8Array): Result<ParsedPayload, SignedPayloadError> {
  const normalized = normalizeSignedPayload(blob)
  if (!normalized.ok) return normalized

  const { format, bytes } = normalized.value
  try {
    const tx = format === 'psbt'
      ? Transaction.fromPSBT(bytes, TX_OPTIONS)
      : Transaction.fromRaw(bytes, TX_OPTIONS)
    if (tx.inputsLength === 0 || tx.outputsLength === 0) {
      return err(new SignedPayloadError('transaction has no inputs or no outputs'))
    }
    if (!hasAnySignature(tx)) {
      return err(new SignedPayloadError('no input carries a signature'))
    }
    const canonical = format === 'psbt'
      ? Utils.toBase64(Array.from(bytes))
      : Utils.toHex(Array.from(bytes))
    return ok({ format, bytes, tx, canonical })
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    return err(new SignedPayloadError(reason))
  }
}

/**
 * Decode the unsigned PSBT the engine produced
 */
export function parseUnsignedPsbt(psbtBase64: string): Transaction | null {
  try {
    return Transaction.fromPSBT(Uint8Array.from(Utils.toArray(psbtBase64, 'base64')), TX_OPTIONS)
  } catch {
    return null
  }
}

// ============================================
// Reconciliation
// ============================================

export interface ReconcileContext {
  /** The unsigned PSBT as exported, if it could be decoded */
  exported: Transaction | null
  recipientAddresses: readonly string[]
  draftFeeSats: number
  draftRecipientSats: number
  network: NetworkType
}

/**
 * Bech32 addresses compare case-insensitively; Base58 does not.
 */
export function normalizeAddress(address: string): string {
  const trimmed = address.trim()
  const lower = trimmed.toLowerCase()
  return lower.startsWith('bc1') || lower.startsWith('tb1') ? lower : trimmed
}

export function outpointKey(txid: Uint8Array | undefined, index: number | undefined): string | null {
  if (txid === undefined || index === undefined) return null
  return `${Utils.toHex(Array.from(txid))}:${index}`
}

function outputAddress(script: Uint8Array | undefined, network: NetworkType): string | null {
  if (script === undefined) return null
  try {
    return Address(network === 'testnet' ? TEST_NETWORK : NETWORK).encode(OutScript.decode(script))
  } catch {
    return null
  }
}

function inputValue(tx: Transaction, i: number): number | null {
  const input = tx.getInput(i)
  if (input.witnessUtxo) {
    return Number(input.witnessUtxo.amount)
  }
  if (input.nonWitnessUtxo && input.index !== undefined) {
    const prevOut = input.nonWitnessUtxo.outputs[input.index]
    return prevOut ? Number(prevOut.amount) : null
  }
  return null
}

interface ExportedInputs {
  keys: Set<string>
  /** Known input values by outpoint */
  values: Map<string, number>
}

function indexExportedInputs(exported: Transaction | null): ExportedInputs {
  const keys = new Set<string>()
  const values = new Map<string, number>()
  if (!exported) return { keys, values }
  for (let i = 0; i < exported.inputsLength; i++) {
    const input = exported.getInput(i)
    const key = outpointKey(input.txid, input.index)
    if (key === null) continue
    keys.add(key)
    const value = inputValue(exported, i)
    if (value !== null) values.set(key, value)
  }
  return { keys, values }
}

function isInputSigned(tx: Transaction, i: number): boolean {
  const input = tx.getInput(i)
  return (
    (input.finalScriptSig !== undefined && input.finalScriptSig.length > 0) ||
    (input.finalScriptWitness !== undefined && input.finalScriptWitness.length > 0) ||
    (input.partialSig !== undefined && input.partialSig.length > 0) ||
    input.tapKeySig !== undefined ||
    (input.tapScriptSig !== undefined && input.tapScriptSig.length > 0)
  )
}

function hasAnySignature(tx: Transaction): boolean {
  for (let i = 0; i < tx.inputsLength; i++) {
    if (isInputSigned(tx, i)) return true
  }
  return false
}

function isInputFinal(tx: Transaction, i: number): boolean {
  const input = tx.getInput(i)
  return (
    (input.finalScriptSig !== undefined && input.finalScriptSig.length > 0) ||
    (input.finalScriptWitness !== undefined && input.finalScriptWitness.length > 0)
  )
}

/**
 * Recompute totals from the signed transaction. The draft's numbers are
 * only compared against, never substituted.
 */
export function reconcileTotals(payload: ParsedPayload, context: ReconcileContext): ReconciledTotals {
  const { tx, format } = payload
  const recipients = new Set(context.recipientAddresses.map(normalizeAddress))

  const outputs: ReconciledOutput[] = []
  for (let i = 0; i < tx.outputsLength; i++) {
    const output = tx.getOutput(i)
    const address = outputAddress(output.script, context.network)
    outputs.push({
      address,
      amountSats: Number(output.amount ?? 0n),
      isRecipient: address !== null && recipients.has(normalizeAddress(address))
    })
  }

  const fromExport = indexExportedInputs(context.exported)
  const inputKeys: string[] = []
  let totalInputSats: number | null = 0
  let signedInputCount = 0
  let finalInputCount = 0

  for (let i = 0; i < tx.inputsLength; i++) {
    const input = tx.getInput(i)
    const key = outpointKey(input.txid, input.index)
    if (key !== null) inputKeys.push(key)

    const value = inputValue(tx, i) ?? (key !== null ? fromExport.values.get(key) ?? null : null)
    totalInputSats = totalInputSats === null || value === null ? null : totalInputSats + value

    if (isInputSigned(tx, i)) signedInputCount++
    if (isInputFinal(tx, i)) finalInputCount++
  }

  const totalOutputSats = outputs.reduce((sum, o) => sum + o.amountSats, 0)
  const recipientSats = outputs.filter(o => o.isRecipient).reduce((sum, o) => sum + o.amountSats, 0)
  const feeSats = totalInputSats === null ? null : totalInputSats - totalOutputSats

  const inputsMatchExport = context.exported !== null &&
    inputKeys.length === fromExport.keys.size &&
    inputKeys.every(key => fromExport.keys.has(key))

  return {
    format,
    outputs,
    inputCount: tx.inputsLength,
    totalInputSats,
    totalOutputSats,
    feeSats,
    recipientSats,
    changeSats: totalOutputSats - recipientSats,
    isFinalized: finalInputCount === tx.inputsLength,
    signedInputCount,
    inputsMatchExport,
    differsFromDraft: {
      fee: feeSats !== null && feeSats !== context.draftFeeSats,
      recipients: recipientSats !== context.draftRecipientSats
    }
  }
}

