export { SendDraftOrchestrator } from './SendDraftOrchestrator'
export type { SendDraftOrchestratorOptions } from './SendDraftOrchestrator'
export type {
  CommitOutcome,
  DraftPhase,
  RowPatch,
  SendDraftListener,
  SendDraftState
} from './types'
