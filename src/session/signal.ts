/**
 * One-shot cancellation notice for a single session. Firing never blocks
 * and only the first call has an effect; the worker polls `fired` at its
 * checkpoints and hands `signal` to the engine.
 */
export class CancellationSignal {
  private controller = new AbortController()
  private firedReason: string | null = null

  get signal(): AbortSignal {
    return this.controller.signal
  }

  get fired(): boolean {
    return this.firedReason !== null
  }

  get reason(): string | null {
    return this.firedReason
  }

  fire(reason = 'cancelled'): boolean {
    if (this.firedReason !== null) return false
    this.firedReason = reason
    this.controller.abort(reason)
    return true
  }
}
