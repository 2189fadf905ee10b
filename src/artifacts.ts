import fs from 'node:fs'
import path from 'node:path'

export interface CompletedArtifact {
  sessionId: string
  filePath: string
  completedAt: number
}

interface ArtifactState {
  artifacts: CompletedArtifact[]
}

/**
 * Final file paths of sessions that completed, keyed by session id.
 * Entries are only ever added or replaced. When a state file is given the
 * index is loaded from it on construction and rewritten after each record.
 */
export class ArtifactIndex {
  private entries: Map<string, CompletedArtifact> = new Map()
  private stateFile: string | null

  constructor(stateFile: string | null = null) {
    this.stateFile = stateFile
    this.loadState()
  }

  record(sessionId: string, filePath: string): CompletedArtifact {
    const artifact: CompletedArtifact = { sessionId, filePath, completedAt: Date.now() }
    // Re-recording moves the id to the end so list() stays in completion order
    this.entries.delete(sessionId)
    this.entries.set(sessionId, artifact)
    this.saveState()
    return { ...artifact }
  }

  get(sessionId: string): CompletedArtifact | null {
    const artifact = this.entries.get(sessionId)
    return artifact ? { ...artifact } : null
  }

  list(): CompletedArtifact[] {
    return Array.from(this.entries.values()).map(a => ({ ...a }))
  }

  size(): number {
    return this.entries.size
  }

  private loadState(): void {
    if (!this.stateFile || !fs.existsSync(this.stateFile)) return
    try {
      const raw = fs.readFileSync(this.stateFile, 'utf8')
      const parsed: unknown = JSON.parse(raw)
      for (const artifact of parseArtifacts(parsed)) {
        this.entries.set(artifact.sessionId, artifact)
      }
    } catch (err) {
      console.error('Failed to load completed artifacts:', err)
    }
  }

  private saveState(): void {
    if (!this.stateFile) return
    const state: ArtifactState = { artifacts: Array.from(this.entries.values()) }
    try {
      fs.mkdirSync(path.dirname(this.stateFile), { recursive: true })
      fs.writeFileSync(this.stateFile, JSON.stringify(state, null, 2))
    } catch (err) {
      console.error('Failed to save completed artifacts:', err)
    }
  }
}

function parseArtifacts(value: unknown): CompletedArtifact[] {
  if (typeof value !== 'object' || value === null) return []
  const list = (value as Record<string, unknown>).artifacts
  if (!Array.isArray(list)) return []

  const result: CompletedArtifact[] = []
  for (const item of list) {
    if (typeof item !== 'object' || item === null) continue
    const { sessionId, filePath, completedAt } = item as Record<string, unknown>
    if (typeof sessionId !== 'string' || typeof filePath !== 'string') continue
    result.push({
      sessionId,
      filePath,
      completedAt: typeof completedAt === 'number' ? completedAt : 0
    })
  }
  return result
}
