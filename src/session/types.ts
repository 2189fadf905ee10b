export type SessionState = 'idle' | 'active' | 'completed' | 'cancelled' | 'failed'

export type TerminalState = Extract<SessionState, 'completed' | 'cancelled' | 'failed'>

/**
 * Allowed transitions. Anything not listed is refused, and terminal
 * states have no exits.
 */
const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  idle: ['active'],
  active: ['completed', 'cancelled', 'failed'],
  completed: [],
  cancelled: [],
  failed: []
}

export function canTransition(from: SessionState, to: SessionState): boolean {
  return TRANSITIONS[from].includes(to)
}

export function isTerminal(state: SessionState): state is TerminalState {
  return TRANSITIONS[state].length === 0
}

/** Issued by `SessionRegistry.create`; identifies one generation of a session id. */
export interface SessionHandle {
  readonly id: string
  readonly generation: number
  readonly signal: AbortSignal
}

export interface SessionSnapshot {
  id: string
  locator: string
  state: SessionState
  downloadedBytes: number
  totalBytes: number
  percentage: number
  filePath: string | null
  error: string | null
  createdAt: number
  updatedAt: number
}

export interface ProgressReport {
  sessionId: string
  state: SessionState
  percentage: number
  downloadedBytes: number
  totalBytes: number
  filePath: string | null
  error: string | null
}

export type StartResult =
  | { accepted: true; sessionId: string }
  | { accepted: false; reason: string }

export type CancelResult = 'accepted' | 'not_found'
