/**
 * Draft Store
 *
 * Validation for stored drafts plus the in-memory store. Stored data is
 * untrusted: anything that does not match the current shape is dropped
 * rather than half-restored.
 */

import type { IDraftStore, PersistedDraft } from '../../domain/repositories'
import type { RecipientRow } from '../../domain/transaction/recipients'

// ============================================
// Validation
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string')
}

function parseRow(value: unknown): RecipientRow | null {
  if (!isRecord(value)) return null
  const { id, address, amountInput } = value
  if (typeof id !== 'string' || typeof address !== 'string' || typeof amountInput !== 'string') {
    return null
  }
  return { id, address, amountInput }
}

/**
 * Check an unknown value against the stored draft shape.
 */
export function parsePersistedDraft(value: unknown): PersistedDraft | null {
  if (!isRecord(value) || value.version !== 1) return null

  const { mode, denomination, rows, feeRateSatPerVb, isMaxSend, coinSelection, spendUnconfirmed, label } = value

  if (mode !== 'single' && mode !== 'multi') return null
  if (denomination !== 'sats' && denomination !== 'btc') return null
  if (typeof feeRateSatPerVb !== 'number' || !Number.isFinite(feeRateSatPerVb)) return null
  if (typeof isMaxSend !== 'boolean' || typeof spendUnconfirmed !== 'boolean') return null
  if (typeof label !== 'string' || !isStringArray(coinSelection) || !Array.isArray(rows)) return null

  const parsedRows: RecipientRow[] = []
  for (const row of rows) {
    const parsed = parseRow(row)
    if (!parsed) return null
    parsedRows.push(parsed)
  }

  return {
    version: 1,
    mode,
    denomination,
    rows: parsedRows,
    feeRateSatPerVb,
    isMaxSend,
    coinSelection,
    spendUnconfirmed,
    label
  }
}

/**
 * Safely parse a stored draft from JSON text
 */
export function parseDraftJSON(text: string | null): PersistedDraft | null {
  if (text === null) return null
  try {
    return parsePersistedDraft(JSON.parse(text))
  } catch {
    return null
  }
}

// ============================================
// Memory Store
// ============================================

/**
 * Keeps the draft for the life of the process. Saved drafts are copied so
 * callers cannot mutate what is stored.
 */
export class MemoryDraftStore implements IDraftStore {
  private text: string | null = null

  async load(): Promise<PersistedDraft | null> {
    return parseDraftJSON(this.text)
  }

  async save(draft: PersistedDraft): Promise<void> {
    this.text = JSON.stringify(draft)
  }

  async clear(): Promise<void> {
    this.text = null
  }
}
