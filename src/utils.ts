import crypto from 'hypercore-crypto'
import b4a from 'b4a'

export function generateId(): string {
  return b4a.toString(crypto.randomBytes(16), 'hex')
}

// Short form used in log lines
export function shortId(id: string): string {
  return id.length > 8 ? `${id.slice(0, 8)}...` : id
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)} GB`
}
