export { PsbtHandshake } from './PsbtHandshake'
export type { PsbtHandshakeOptions, PsbtSessionListener } from './PsbtHandshake'
export {
  normalizeSignedPayload,
  parseSignedPayload,
  parseUnsignedPsbt,
  reconcileTotals,
  normalizeAddress
} from './payload'
export type { NormalizedPayload, ParsedPayload, ReconcileContext } from './payload'
