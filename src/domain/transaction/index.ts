/**
 * Transaction Domain - fee math, fee bumping, recipients and coin control
 */

export {
  ceilSats,
  feeFromVBytes,
  clampFeeRate,
  isBelowMinimumFeeRate,
  maxSendHeuristic,
  cpfpChildFee,
  pickFeeRate,
  isUniform,
  parseFeeEstimates
} from './fees'

export {
  effectiveCurrentFeeRate,
  calculateFeeBump,
  requireAffordable,
  cpfpSpendableOutput,
  selectBumpMethod
} from './feeBump'

export {
  btcToSatoshis,
  satoshisToBtc,
  parseAmount,
  formatAmount,
  convertAmountInput,
  isAboveDust,
  evaluateRow,
  aggregateRecipients
} from './recipients'

export type {
  RecipientRow,
  AmountErrorCode,
  EvaluatedRow,
  RecipientSummary
} from './recipients'

export {
  isSpendable,
  spendableUtxos,
  spendableBalance,
  sortUtxosByValue,
  pruneSelection,
  toggleSelection,
  selectedTotal,
  availableForSend
} from './coinControl'
