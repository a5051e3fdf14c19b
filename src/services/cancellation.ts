/**
 * Cancellation primitives
 *
 * Each dry-run gets its own controller tagged with the draft generation it
 * was built from. The orchestrator aborts it when the draft moves on, the
 * wallet disconnects or the caller gives up.
 */

export type CancelReason = 'superseded' | 'disconnected' | 'cancelled' | 'disposed' | 'committed'

export class CancellationController {
  readonly generation: number
  private readonly controller = new AbortController()
  private cancelReason: CancelReason | null = null

  constructor(generation: number) {
    this.generation = generation
  }

  /** Handed to the engine; aborts with a CancellationError */
  get signal(): AbortSignal {
    return this.controller.signal
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted
  }

  get reason(): CancelReason | null {
    return this.cancelReason
  }

  /**
   * Abort once. Later calls keep the first reason.
   */
  cancel(reason: CancelReason): void {
    if (this.cancelReason !== null) return
    this.cancelReason = reason
    this.controller.abort(new CancellationError(reason))
  }

  /**
   * True while the draft is still at the generation this work was built from
   * and nobody has cancelled it.
   */
  isCurrent(generation: number): boolean {
    return !this.isCancelled && this.generation === generation
  }
}

export class CancellationError extends Error {
  readonly isCancellation = true
  readonly reason: CancelReason

  constructor(reason: CancelReason) {
    super(`Dry-run ${reason}`)
    this.name = 'CancellationError'
    this.reason = reason
  }
}

/**
 * Our own CancellationError, or the AbortError fetch-style engines throw
 */
export function isCancellationError(error: unknown): boolean {
  return (
    error instanceof CancellationError ||
    (error instanceof Error && error.name === 'AbortError')
  )
}
