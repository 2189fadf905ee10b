import fs from 'node:fs'
import type { ArtifactIndex, CompletedArtifact } from '../artifacts.js'
import type { TransferEngine } from '../engine/types.js'
import { generateId, shortId } from '../utils.js'
import { SessionRegistry } from './registry.js'
import type { CancelResult, ProgressReport, StartResult } from './types.js'
import { SessionWorker } from './worker.js'

export interface SessionManagerConfig {
  engine: TransferEngine
  index: ArtifactIndex
  downloadDir: string
  registry?: SessionRegistry
  /** Finished sessions kept for progress polling; ignored when `registry` is given. */
  retainedSessions?: number
}

const SESSION_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/

export function validateSessionId(id: string): string | null {
  if (!id) return 'Session ID is required'
  if (id.length > 128) return 'Session ID must be 128 characters or less'
  if (!SESSION_ID_PATTERN.test(id)) {
    return 'Session ID can only contain letters, numbers, dots, underscores, and hyphens'
  }
  return null
}

/**
 * Entry point for callers: starts, polls and cancels sessions, and owns
 * the worker of every session it started. A restarted id gets a new
 * registry record at once, while its new worker waits for the previous
 * one to wind down before touching the download directory.
 */
export class SessionManager {
  private registry: SessionRegistry
  private engine: TransferEngine
  private index: ArtifactIndex
  private downloadDir: string
  private workers: Map<string, Promise<void>> = new Map()  // latest run per session id
  private running: Set<Promise<void>> = new Set()
  private shuttingDown = false

  constructor(config: SessionManagerConfig) {
    this.registry = config.registry ?? new SessionRegistry({ maxOutcomes: config.retainedSessions })
    this.engine = config.engine
    this.index = config.index
    this.downloadDir = config.downloadDir
  }

  start(sessionId: string | undefined, locator: string): StartResult {
    if (this.shuttingDown) {
      return { accepted: false, reason: 'Service is shutting down' }
    }

    const id = sessionId ?? generateId()
    const idError = validateSessionId(id)
    if (idError) return { accepted: false, reason: idError }

    const locatorError = this.engine.validateLocator(locator)
    if (locatorError) return { accepted: false, reason: locatorError }

    const restarted = this.registry.has(id)
    const handle = this.registry.create(id, locator)
    const previous = this.workers.get(id)
    const worker = new SessionWorker(
      { registry: this.registry, index: this.index, engine: this.engine, downloadDir: this.downloadDir },
      handle,
      locator
    )

    const run: Promise<void> = (previous ?? Promise.resolve())
      .then(() => worker.run())
      .then(() => undefined)
      .catch(err => {
        console.error(`[${shortId(id)}] Worker crashed:`, err)
      })
      .finally(() => {
        this.running.delete(run)
        if (this.workers.get(id) === run) this.workers.delete(id)
      })

    this.workers.set(id, run)
    this.running.add(run)

    console.log(`[${shortId(id)}] Session ${restarted ? 'restarted' : 'started'} for ${locator}`)
    return { accepted: true, sessionId: id }
  }

  progress(sessionId: string): ProgressReport | null {
    const session = this.registry.get(sessionId)
    if (!session) return null
    return {
      sessionId: session.id,
      state: session.state,
      percentage: session.percentage,
      downloadedBytes: session.downloadedBytes,
      totalBytes: session.totalBytes,
      filePath: session.filePath,
      error: session.error
    }
  }

  cancel(sessionId: string): CancelResult {
    if (!this.registry.signal(sessionId, 'cancelled')) return 'not_found'
    console.log(`[${shortId(sessionId)}] Cancellation requested`)
    return 'accepted'
  }

  listCompleted(): CompletedArtifact[] {
    return this.index.list()
  }

  /** Path of a completed session's artifact, if it is still on disk. */
  artifactPath(sessionId: string): string | null {
    const artifact = this.index.get(sessionId)
    if (!artifact) return null
    return fs.existsSync(artifact.filePath) ? artifact.filePath : null
  }

  /** Resolves once the latest worker for `sessionId` has finished. */
  async settled(sessionId: string): Promise<void> {
    await this.workers.get(sessionId)
  }

  activeCount(): number {
    return this.registry.listActive().length
  }

  async shutdown(): Promise<void> {
    this.shuttingDown = true
    const signalled = this.registry.signalAll('shutdown')
    if (signalled > 0) {
      console.log(`Stopping ${signalled} active session(s)...`)
    }
    await Promise.all(Array.from(this.running))
  }
}
