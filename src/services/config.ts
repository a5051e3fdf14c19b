/**
 * Runtime Configuration
 *
 * Settings that vary per deployment, read from environment variables.
 * Policy constants that never vary live in `src/config`.
 */

import { homedir } from 'node:os'
import { join } from 'node:path'
import { formatFromEnv, levelFromEnv, type LogFormat, type LogLevel } from './logger'

// Network type for environment switching
export type NetworkType = 'mainnet' | 'testnet'

export interface RuntimeConfig {
  network: NetworkType
  logLevel: LogLevel
  logFormat: LogFormat
  draftFilePath: string
}

export const ENV_KEYS = {
  NETWORK: 'BTC_SEND_NETWORK',
  DRAFT_PATH: 'BTC_SEND_DRAFT_PATH',
  LOG_LEVEL: 'LOG_LEVEL',
  LOG_FORMAT: 'LOG_FORMAT'
} as const

type Env = Record<string, string | undefined>

/**
 * Get current network, defaulting to mainnet
 */
export function getNetwork(env: Env = process.env): NetworkType {
  return env[ENV_KEYS.NETWORK]?.trim().toLowerCase() === 'testnet' ? 'testnet' : 'mainnet'
}

export function getDraftFilePath(env: Env = process.env): string {
  const fromEnv = env[ENV_KEYS.DRAFT_PATH]?.trim()
  return fromEnv ? fromEnv : join(homedir(), '.btc-send', 'draft.json')
}

export function getLogLevel(env: Env = process.env): LogLevel {
  return levelFromEnv(env)
}

export function loadRuntimeConfig(env: Env = process.env): RuntimeConfig {
  return {
    network: getNetwork(env),
    logLevel: getLogLevel(env),
    logFormat: formatFromEnv(env),
    draftFilePath: getDraftFilePath(env)
  }
}
