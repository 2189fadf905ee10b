import fs from 'node:fs'
import path from 'node:path'
import type { Readable } from 'node:stream'

export interface OpenedFile {
  name: string
  size: number
  contentType: string
  stream: Readable
}

/**
 * Joins `relativePath` onto `root`, or returns null when the result would
 * land outside `root`.
 */
export function resolveInside(root: string, relativePath: string): string | null {
  if (!relativePath || relativePath.includes('\0')) return null
  const base = path.resolve(root)
  const resolved = path.resolve(base, relativePath)
  if (resolved === base) return null
  if (!resolved.startsWith(base + path.sep)) return null
  return resolved
}

/**
 * Paths, relative to `root` and using forward slashes, of every regular
 * file below it whose extension is in `extensions` (case-insensitive).
 * An empty extension list matches every file.
 */
export async function listFiles(root: string, extensions: readonly string[]): Promise<string[]> {
  const wanted = new Set(extensions.map(e => e.toLowerCase()))
  const found: string[] = []

  async function walk(dir: string): Promise<void> {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true })
    for (const entry of entries) {
      const full = path.join(dir, entry.name)
      if (entry.isDirectory()) {
        await walk(full)
      } else if (entry.isFile()) {
        const ext = path.extname(entry.name).toLowerCase()
        if (wanted.size === 0 || wanted.has(ext)) {
          found.push(path.relative(root, full).split(path.sep).join('/'))
        }
      }
    }
  }

  if (!fs.existsSync(root)) return found
  await walk(root)
  return found.sort()
}

/** Opens a regular file for streaming, or returns null if there is none. */
export function openFile(filePath: string): OpenedFile | null {
  let stat: fs.Stats
  try {
    stat = fs.statSync(filePath)
  } catch {
    return null
  }
  if (!stat.isFile()) return null

  return {
    name: path.basename(filePath),
    size: stat.size,
    contentType: guessContentType(filePath),
    stream: fs.createReadStream(filePath)
  }
}

export async function removeFile(filePath: string): Promise<void> {
  await fs.promises.rm(filePath, { force: true })
}

export function guessContentType(filePath: string): string {
  const ext = filePath.split('.').pop()?.toLowerCase()
  switch (ext) {
    case 'txt': return 'text/plain'
    case 'html': case 'htm': return 'text/html'
    case 'json': return 'application/json'
    case 'jpg': case 'jpeg': return 'image/jpeg'
    case 'png': return 'image/png'
    case 'gif': return 'image/gif'
    case 'webp': return 'image/webp'
    case 'pdf': return 'application/pdf'
    case 'mp3': return 'audio/mpeg'
    case 'mp4': return 'video/mp4'
    case 'mkv': return 'video/x-matroska'
    case 'webm': return 'video/webm'
    case 'wav': return 'audio/wav'
    case 'zip': return 'application/zip'
    default: return 'application/octet-stream'
  }
}
