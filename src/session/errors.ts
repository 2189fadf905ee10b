export type TransferErrorKind = 'resolution' | 'io' | 'cancelled'

export class TransferError extends Error {
  readonly kind: TransferErrorKind

  constructor(kind: TransferErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TransferError'
    this.kind = kind
  }
}

// The engine could not turn the locator into a file set
export class ResolutionFailure extends TransferError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('resolution', message, options)
    this.name = 'ResolutionFailure'
  }
}

// Local write/read error, or a stream that broke its own size contract
export class IOFailure extends TransferError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('io', message, options)
    this.name = 'IOFailure'
  }
}

export class SessionCancelled extends TransferError {
  constructor(reason = 'cancelled') {
    super('cancelled', `Session ${reason}`)
    this.name = 'SessionCancelled'
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
