/**
 * Domain Layer - Pure Business Logic
 *
 * This layer contains all business logic with no side effects.
 * Functions here are pure, easily testable, and have no dependencies
 * on infrastructure (file storage, wallet engines, clocks).
 */

export * from './result'
export * from './types'
export * from './address'
export * from './transaction'
export * from './wallet'
export type {
  DryRunRequest,
  CommitRequest,
  PsbtCreated,
  IWalletEngine,
  PersistedDraft,
  IDraftStore
} from './repositories'
