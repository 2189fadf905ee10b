import { ProgressAccumulator } from './progress.js'
import { CancellationSignal } from './signal.js'
import { canTransition, isTerminal } from './types.js'
import type { SessionHandle, SessionSnapshot, SessionState, TerminalState } from './types.js'

interface SessionRecord {
  id: string
  generation: number
  locator: string
  state: SessionState
  progress: ProgressAccumulator
  filePath: string | null
  cancel: CancellationSignal
  error: string | null
  createdAt: number
  updatedAt: number
}

export interface SessionRegistryOptions {
  maxOutcomes?: number
}

export const DEFAULT_MAX_OUTCOMES = 1000

/**
 * Authoritative map of session id to session state. Progress counters and
 * cancellation signals live inside the records, so the whole aggregate is
 * guarded by the same critical section: every method is synchronous and
 * runs to completion before any other caller can observe the state.
 *
 * Records of live sessions sit in `active`. On a terminal transition the
 * record moves to `outcomes`, where its frozen snapshot stays readable
 * until the id is reused or removed, or until `maxOutcomes` newer
 * sessions have finished after it.
 */
export class SessionRegistry {
  private active: Map<string, SessionRecord> = new Map()
  private outcomes: Map<string, SessionSnapshot> = new Map()   // oldest first
  private maxOutcomes: number
  private nextGeneration = 1

  constructor(options: SessionRegistryOptions = {}) {
    const max = options.maxOutcomes ?? DEFAULT_MAX_OUTCOMES
    if (!Number.isInteger(max) || max < 0) {
      throw new RangeError(`maxOutcomes must be a non-negative integer, got ${max}`)
    }
    this.maxOutcomes = max
  }

  /**
   * Allocates a fresh idle record. An existing record for `id` is
   * discarded first and its signal fired with reason `superseded`, so the
   * worker still driving it stops at its next checkpoint.
   */
  create(id: string, locator: string): SessionHandle {
    this.discard(id, 'superseded')

    const now = Date.now()
    const record: SessionRecord = {
      id,
      generation: this.nextGeneration++,
      locator,
      state: 'idle',
      progress: new ProgressAccumulator(),
      filePath: null,
      cancel: new CancellationSignal(),
      error: null,
      createdAt: now,
      updatedAt: now
    }
    this.active.set(id, record)

    return { id, generation: record.generation, signal: record.cancel.signal }
  }

  get(id: string): SessionSnapshot | null {
    const record = this.active.get(id)
    if (record) return snapshot(record)
    const outcome = this.outcomes.get(id)
    return outcome ? { ...outcome } : null
  }

  has(id: string): boolean {
    return this.active.has(id) || this.outcomes.has(id)
  }

  /** Drops every trace of `id`, firing the signal of a live record. */
  remove(id: string): boolean {
    return this.discard(id, 'removed')
  }

  /** Snapshots of every non-terminal session. */
  listActive(): SessionSnapshot[] {
    return Array.from(this.active.values()).map(snapshot)
  }

  /** Number of finished sessions whose final snapshot is still kept. */
  outcomeCount(): number {
    return this.outcomes.size
  }

  // --- Worker side ---

  isCurrent(handle: SessionHandle): boolean {
    return this.own(handle) !== null
  }

  begin(handle: SessionHandle): boolean {
    const record = this.own(handle)
    if (!record) return false
    return this.transition(record, 'active')
  }

  setTotal(handle: SessionHandle, total: number): boolean {
    const record = this.own(handle)
    if (!record || isTerminal(record.state)) return false
    record.progress.setTotal(total)
    record.updatedAt = Date.now()
    return true
  }

  fits(handle: SessionHandle, n: number): boolean {
    const record = this.own(handle)
    if (!record) return false
    return record.progress.fits(n)
  }

  advance(handle: SessionHandle, n: number): boolean {
    const record = this.own(handle)
    if (!record || isTerminal(record.state)) return false
    record.progress.advance(n)
    record.updatedAt = Date.now()
    return true
  }

  setFilePath(handle: SessionHandle, filePath: string): boolean {
    const record = this.own(handle)
    if (!record || isTerminal(record.state)) return false
    record.filePath = filePath
    record.updatedAt = Date.now()
    return true
  }

  /**
   * Moves the session to a terminal state and out of the active table.
   * Returns the frozen snapshot, or null for a stale handle or a refused
   * transition.
   */
  finish(handle: SessionHandle, state: TerminalState, error: string | null = null): SessionSnapshot | null {
    const record = this.own(handle)
    if (!record) return null
    if (!this.transition(record, state)) return null

    record.error = error
    const final = snapshot(record)
    this.active.delete(record.id)
    this.outcomes.set(record.id, final)
    this.evictOutcomes()
    return { ...final }
  }

  // --- Canceller side ---

  /**
   * Delivers the cancellation signal to a live session. Unknown ids,
   * terminal sessions and already-signalled sessions are no-ops that
   * return false.
   */
  signal(id: string, reason = 'cancelled'): boolean {
    const record = this.active.get(id)
    if (!record) return false
    return record.cancel.fire(reason)
  }

  observe(id: string): boolean {
    return this.active.get(id)?.cancel.fired ?? false
  }

  /** Fires every live signal; used on shutdown. Returns how many fired. */
  signalAll(reason: string): number {
    let count = 0
    for (const record of this.active.values()) {
      if (record.cancel.fire(reason)) count++
    }
    return count
  }

  private evictOutcomes(): void {
    for (const id of this.outcomes.keys()) {
      if (this.outcomes.size <= this.maxOutcomes) return
      this.outcomes.delete(id)
    }
  }

  private own(handle: SessionHandle): SessionRecord | null {
    const record = this.active.get(handle.id)
    if (!record || record.generation !== handle.generation) return null
    return record
  }

  private transition(record: SessionRecord, to: SessionState): boolean {
    if (!canTransition(record.state, to)) return false
    record.state = to
    record.updatedAt = Date.now()
    return true
  }

  private discard(id: string, reason: string): boolean {
    const record = this.active.get(id)
    if (record) {
      record.cancel.fire(reason)
      this.active.delete(id)
    }
    const hadOutcome = this.outcomes.delete(id)
    return record !== undefined || hadOutcome
  }
}

function snapshot(record: SessionRecord): SessionSnapshot {
  return {
    id: record.id,
    locator: record.locator,
    state: record.state,
    downloadedBytes: record.progress.downloadedBytes,
    totalBytes: record.progress.totalBytes,
    percentage: record.progress.percentage(record.state),
    filePath: record.filePath,
    error: record.error,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt
  }
}
