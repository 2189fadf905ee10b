export interface RemoteFile {
  path: string   // relative to the resource root, forward slashes
  size: number
}

/**
 * Result of one read. End of stream is its own variant so an empty chunk
 * can never be mistaken for it.
 */
export type ReadResult =
  | { done: false; chunk: Buffer }
  | { done: true }

export interface ByteStream {
  read(): Promise<ReadResult>
  close(): Promise<void>
}

export interface ResolvedResource {
  files: RemoteFile[]
  openStream(file: RemoteFile, signal: AbortSignal): ByteStream
  /** Releases whatever `resolve` acquired. Safe to call more than once. */
  close(): Promise<void>
}

export interface TransferEngine {
  /** Returns an error message, or null when the locator is acceptable. */
  validateLocator(locator: string): string | null
  resolve(locator: string, signal: AbortSignal): Promise<ResolvedResource>
}
