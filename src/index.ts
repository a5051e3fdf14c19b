/**
 * Bitcoin send core
 *
 * Draft orchestration, address and amount validation, fee math and the
 * watch-only PSBT handshake. The host supplies an IWalletEngine.
 */

export * from './domain'
export * from './infrastructure'
export { TRANSACTION, FEE_BUMP, SEND, ADDRESS } from './config'
export type { TransactionConfig, FeeBumpConfig, SendConfig, AddressConfig } from './config'

export * from './services/send'
export * from './services/psbt'
export { FeeBumpService } from './services/feeBump'
export type { SpeedUpRequest } from './services/feeBump'
export {
  CancellationController,
  CancellationError,
  isCancellationError
} from './services/cancellation'
export type { CancelReason } from './services/cancellation'
export {
  InvalidStateError,
  FeeRateBelowMinimumError,
  BroadcastError,
  SignedPayloadError,
  StorageError,
  isAppError,
  describeErrorCode,
  getUserMessage
} from './services/errors'
export {
  logger,
  Logger,
  ChildLogger,
  MemorySink,
  consoleSink,
  formatEntry,
  levelFromEnv,
  formatFromEnv
} from './services/logger'
export type { LogLevel, LogFormat, LogEntry, LogSink, LoggerConfig } from './services/logger'
export {
  getNetwork,
  getDraftFilePath,
  getLogLevel,
  loadRuntimeConfig,
  ENV_KEYS
} from './services/config'
export type { NetworkType, RuntimeConfig } from './services/config'
