export { SessionManager, validateSessionId } from './manager.js'
export type { SessionManagerConfig } from './manager.js'
export { SessionRegistry } from './registry.js'
export { SessionWorker } from './worker.js'
export { ProgressAccumulator, computePercentage } from './progress.js'
export { CancellationSignal } from './signal.js'
export { TransferError, ResolutionFailure, IOFailure, SessionCancelled } from './errors.js'
export type * from './types.js'
