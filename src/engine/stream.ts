import type { ByteStream, ReadResult } from './types.js'

export const DEFAULT_MAX_CHUNK_BYTES = 64 * 1024

/**
 * Adapts an async iterable of buffers (a readable stream, a generator) to
 * a `ByteStream`. Chunks larger than `maxChunkBytes` are handed out in
 * slices; iterator exhaustion becomes `{ done: true }`.
 */
export function chunkReader(
  source: AsyncIterable<Buffer | Uint8Array>,
  maxChunkBytes = DEFAULT_MAX_CHUNK_BYTES,
  onClose?: () => void
): ByteStream {
  if (!Number.isInteger(maxChunkBytes) || maxChunkBytes < 1) {
    throw new RangeError(`maxChunkBytes must be a positive integer, got ${maxChunkBytes}`)
  }

  const iterator = source[Symbol.asyncIterator]()
  let pending: Buffer | null = null
  let ended = false
  let closed = false

  return {
    async read(): Promise<ReadResult> {
      if (pending === null) {
        if (ended || closed) return { done: true }
        const next = await iterator.next()
        if (next.done) {
          ended = true
          return { done: true }
        }
        pending = Buffer.isBuffer(next.value) ? next.value : Buffer.from(next.value)
      }

      if (pending.length <= maxChunkBytes) {
        const chunk = pending
        pending = null
        return { done: false, chunk }
      }

      const chunk = pending.subarray(0, maxChunkBytes)
      pending = pending.subarray(maxChunkBytes)
      return { done: false, chunk }
    },

    async close(): Promise<void> {
      if (closed) return
      closed = true
      pending = null
      onClose?.()
      if (!ended && iterator.return) {
        await iterator.return()
      }
    }
  }
}
