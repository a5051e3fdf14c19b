/**
 * Coin Control
 *
 * Pure helpers for the manual UTXO picker. Selection is a list of outpoints;
 * an empty list means the wallet engine chooses coins itself.
 *
 * @module domain/transaction/coinControl
 */

import type { Outpoint, Utxo } from '../types'

/**
 * A coin can be spent when it is not frozen and is either confirmed or the
 * user allows spending unconfirmed coins.
 */
export function isSpendable(utxo: Utxo, spendUnconfirmed: boolean): boolean {
  return !utxo.frozen && (utxo.confirmed || spendUnconfirmed)
}

export function spendableUtxos(utxos: readonly Utxo[], spendUnconfirmed: boolean): Utxo[] {
  return utxos.filter(utxo => isSpendable(utxo, spendUnconfirmed))
}

export function spendableBalance(utxos: readonly Utxo[], spendUnconfirmed: boolean): number {
  return spendableUtxos(utxos, spendUnconfirmed).reduce((sum, u) => sum + u.amountSats, 0)
}

/**
 * Sort coins largest first, the order the picker shows them in.
 */
export function sortUtxosByValue(utxos: readonly Utxo[]): Utxo[] {
  return [...utxos].sort((a, b) => b.amountSats - a.amountSats)
}

/**
 * Drop outpoints that are no longer in the unspent set or are not spendable.
 * Order is kept and duplicates removed.
 */
export function pruneSelection(
  selection: readonly Outpoint[],
  utxos: readonly Utxo[],
  spendUnconfirmed: boolean
): Outpoint[] {
  const spendable = new Set(spendableUtxos(utxos, spendUnconfirmed).map(u => u.outpoint))
  const kept: Outpoint[] = []
  for (const outpoint of selection) {
    if (spendable.has(outpoint) && !kept.includes(outpoint)) {
      kept.push(outpoint)
    }
  }
  return kept
}

export function toggleSelection(selection: readonly Outpoint[], outpoint: Outpoint): Outpoint[] {
  return selection.includes(outpoint)
    ? selection.filter(o => o !== outpoint)
    : [...selection, outpoint]
}

/**
 * Sum of the selected coins
 */
export function selectedTotal(selection: readonly Outpoint[], utxos: readonly Utxo[]): number {
  const chosen = new Set(selection)
  return utxos.reduce((sum, u) => (chosen.has(u.outpoint) ? sum + u.amountSats : sum), 0)
}

/**
 * Funds a send can draw on: the selected coins under coin control, otherwise
 * the whole spendable balance.
 */
export function availableForSend(
  selection: readonly Outpoint[],
  utxos: readonly Utxo[],
  spendUnconfirmed: boolean
): number {
  return selection.length > 0
    ? selectedTotal(selection, utxos)
    : spendableBalance(utxos, spendUnconfirmed)
}
