/**
 * Fee Bump Service
 *
 * Speeds up a stuck transaction: quotes the bump with the pure fee math,
 * refuses what the wallet cannot afford and only then asks the engine to
 * build the replacement (RBF) or child (CPFP).
 */

import type { IWalletEngine } from '../domain/repositories'
import { AppError, appErr, err, type Result } from '../domain/result'
import {
  calculateFeeBump,
  cpfpSpendableOutput,
  requireAffordable,
  selectBumpMethod
} from '../domain/transaction/feeBump'
import type { BumpMethod, BumpRequest, FeeBumpQuote, PendingTransaction } from '../domain/types'
import { feeLogger } from './logger'

export interface SpeedUpRequest {
  tx: PendingTransaction
  targetFeeRateSatPerVb: number
  availableWalletBalanceSats: number
  /** Defaults to the method the transaction allows */
  method?: BumpMethod
}

function methodAllowed(tx: PendingTransaction, method: BumpMethod): boolean {
  if (tx.confirmed) return false
  if (method === 'RBF') return tx.signalsRbf && tx.netAmountSats <= 0
  return cpfpSpendableOutput(tx) > 0
}

export class FeeBumpService {
  private readonly engine: Pick<IWalletEngine, 'bumpFee' | 'cpfp'>

  constructor(engine: Pick<IWalletEngine, 'bumpFee' | 'cpfp'>) {
    this.engine = engine
  }

  /**
   * Price a speed-up without touching the wallet.
   */
  quote(request: SpeedUpRequest): Result<FeeBumpQuote> {
    const { tx } = request
    const method = request.method ?? selectBumpMethod(tx)
    if (method === null || !methodAllowed(tx, method)) {
      return appErr('INVALID_STATE', 'Transaction cannot be sped up', {
        txid: tx.txid,
        method: method ?? undefined,
        confirmed: tx.confirmed
      })
    }

    const bump: BumpRequest = {
      method,
      currentFeeSats: tx.feeSats,
      currentFeeRateSatPerVb: tx.feeRateSatPerVb,
      vsizeVb: tx.vsizeVb,
      availableWalletBalanceSats: request.availableWalletBalanceSats,
      cpfpParentOutputSats: cpfpSpendableOutput(tx),
      targetFeeRateSatPerVb: request.targetFeeRateSatPerVb
    }
    return calculateFeeBump(bump)
  }

  /**
   * Quote, check affordability, then hand the bump to the engine.
   * Resolves to the txid of the replacement or child.
   */
  async bump(request: SpeedUpRequest): Promise<Result<string>> {
    const quoted = this.quote(request)
    if (!quoted.ok) return quoted

    const affordable = requireAffordable(quoted.value)
    if (!affordable.ok) {
      feeLogger.warn('Fee bump refused', {
        txid: request.tx.txid,
        method: quoted.value.method,
        ...affordable.error.details
      })
      return affordable
    }

    const { method } = affordable.value
    const { txid } = request.tx
    feeLogger.info('Bumping fee', {
      txid,
      method,
      targetFeeRateSatPerVb: request.targetFeeRateSatPerVb,
      additionalCostSats: affordable.value.additionalCostSats
    })

    try {
      const result = method === 'RBF'
        ? await this.engine.bumpFee(txid, request.targetFeeRateSatPerVb)
        : await this.engine.cpfp(txid, request.targetFeeRateSatPerVb)
      if (result.ok) {
        feeLogger.info('Fee bump broadcast', { txid, method, newTxid: result.value })
      } else {
        feeLogger.error('Engine rejected fee bump', result.error, { txid, method })
      }
      return result
    } catch (error) {
      const appError = AppError.fromUnknown(error, 'COMMIT_FAILED')
      feeLogger.error('Fee bump failed', appError, { txid, method })
      return err(appError)
    }
  }
}
