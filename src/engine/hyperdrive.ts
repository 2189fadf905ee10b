import fs from 'node:fs'
import Hyperswarm from 'hyperswarm'
import Corestore from 'corestore'
import Hyperdrive from 'hyperdrive'
import b4a from 'b4a'
import type { Duplex } from 'node:stream'
import { chunkReader, DEFAULT_MAX_CHUNK_BYTES } from './stream.js'
import type { ByteStream, RemoteFile, ResolvedResource, TransferEngine } from './types.js'

export interface HyperdriveEngineConfig {
  storageDir: string
  maxChunkBytes?: number
}

/** The part of a Hyperdrive the engine reads through. */
export type DriveHandle = Pick<Hyperdrive, 'discoveryKey' | 'update' | 'list' | 'createReadStream' | 'close'>

const LOCATOR_PATTERN = /^(?:hyper:\/\/)?([a-f0-9]{64})\/?$/i

/** Extracts the hex drive key from `hyper://<key>` or a bare key. */
export function parseDriveLocator(locator: string): string | null {
  const match = LOCATOR_PATTERN.exec(locator.trim())
  return match?.[1] ? match[1].toLowerCase() : null
}

/**
 * Pulls files out of remote Hyperdrives. One corestore and one swarm are
 * shared by every session; each `resolve` opens (or reuses) the drive for
 * its key and joins that drive's discovery topic until the resource is
 * closed.
 */
export class HyperdriveEngine implements TransferEngine {
  private store: Corestore | null = null
  private swarm: Hyperswarm | null = null
  private drives: Map<string, DriveHandle> = new Map()   // driveKey hex -> drive
  private opening: Map<string, Promise<DriveHandle>> = new Map()
  private users: Map<string, number> = new Map()        // driveKey hex -> open resources
  private config: HyperdriveEngineConfig

  constructor(config: HyperdriveEngineConfig) {
    this.config = config
  }

  async start(): Promise<void> {
    if (!fs.existsSync(this.config.storageDir)) {
      fs.mkdirSync(this.config.storageDir, { recursive: true })
    }

    const store = new Corestore(this.config.storageDir)
    await store.ready()
    this.store = store

    const swarm = new Hyperswarm()
    swarm.on('connection', (conn: Duplex) => {
      store.replicate(conn)
    })
    swarm.on('error', (err: Error) => {
      console.error('Swarm error:', err.message)
    })
    this.swarm = swarm

    console.log('Transfer engine started')
  }

  async destroy(): Promise<void> {
    for (const [key, drive] of this.drives) {
      try {
        await drive.close()
      } catch (err) {
        console.error(`Failed to close drive ${key.slice(0, 8)}...:`, err)
      }
    }
    this.drives.clear()
    this.users.clear()

    if (this.swarm) {
      await this.swarm.destroy()
      this.swarm = null
    }

    if (this.store) {
      await this.store.close()
      this.store = null
    }
  }

  validateLocator(locator: string): string | null {
    if (!locator) return 'Locator is required'
    if (!parseDriveLocator(locator)) {
      return 'Locator must be hyper://<64 hex characters> or a 64-character drive key'
    }
    return null
  }

  async resolve(locator: string, signal: AbortSignal): Promise<ResolvedResource> {
    const driveKeyHex = parseDriveLocator(locator)
    if (!driveKeyHex) throw new Error(`Invalid locator: ${locator}`)

    // Counted before the first await so a concurrent release keeps the drive open
    this.users.set(driveKeyHex, (this.users.get(driveKeyHex) ?? 0) + 1)

    let released = false
    const release = async (): Promise<void> => {
      if (released) return
      released = true
      await this.releaseDrive(driveKeyHex)
    }

    try {
      const drive = await this.openRemoteDrive(driveKeyHex)
      signal.throwIfAborted()
      await drive.update({ wait: true })
      signal.throwIfAborted()
      const files = await listDriveFiles(drive)
      const maxChunkBytes = this.config.maxChunkBytes ?? DEFAULT_MAX_CHUNK_BYTES

      return {
        files,
        openStream: (file: RemoteFile, streamSignal: AbortSignal): ByteStream => {
          const stream = drive.createReadStream(file.path)
          const onAbort = (): void => {
            stream.destroy(new Error('Stream aborted'))
          }
          streamSignal.addEventListener('abort', onAbort, { once: true })
          return chunkReader(stream, maxChunkBytes, () => {
            streamSignal.removeEventListener('abort', onAbort)
            stream.destroy()
          })
        },
        close: release
      }
    } catch (err) {
      await release()
      throw err
    }
  }

  private openRemoteDrive(driveKeyHex: string): Promise<DriveHandle> {
    const existing = this.drives.get(driveKeyHex)
    if (existing) return Promise.resolve(existing)

    const pending = this.opening.get(driveKeyHex)
    if (pending) return pending

    const opened = this.connectDrive(driveKeyHex)
      .then(drive => {
        this.drives.set(driveKeyHex, drive)
        return drive
      })
      .finally(() => {
        this.opening.delete(driveKeyHex)
      })
    this.opening.set(driveKeyHex, opened)
    return opened
  }

  /** Opens the drive for `driveKeyHex` and joins its discovery topic. */
  protected async connectDrive(driveKeyHex: string): Promise<DriveHandle> {
    if (!this.store || !this.swarm) {
      throw new Error('Transfer engine is not started')
    }

    const driveKey = b4a.from(driveKeyHex, 'hex')
    const drive = new Hyperdrive(this.store, driveKey)
    await drive.ready()

    // Join the drive's swarm topic and wait for the initial peer lookup
    const swarm = this.swarm
    const done = drive.findingPeers()
    swarm.join(drive.discoveryKey, { client: true, server: false })
    try {
      await swarm.flush()
    } catch (err) {
      // Not tracked yet, so nothing else would close it
      await swarm.leave(drive.discoveryKey).catch(leaveErr => {
        console.error(`Failed to leave drive topic ${driveKeyHex.slice(0, 8)}...:`, leaveErr)
      })
      await drive.close()
      throw err
    } finally {
      done()
    }

    return drive
  }

  private async releaseDrive(driveKeyHex: string): Promise<void> {
    const remaining = (this.users.get(driveKeyHex) ?? 1) - 1
    if (remaining > 0) {
      this.users.set(driveKeyHex, remaining)
      return
    }
    this.users.delete(driveKeyHex)

    const drive = this.drives.get(driveKeyHex)
    if (!drive) return
    this.drives.delete(driveKeyHex)

    if (this.swarm) {
      try {
        await this.swarm.leave(drive.discoveryKey)
      } catch (err) {
        console.error(`Failed to leave drive topic ${driveKeyHex.slice(0, 8)}...:`, err)
      }
    }
    await drive.close()
  }
}

async function listDriveFiles(drive: DriveHandle): Promise<RemoteFile[]> {
  const files: RemoteFile[] = []
  for await (const entry of drive.list('/', { recursive: true })) {
    // Symlinks carry no blob
    if (!entry.value.blob) continue
    files.push({ path: entry.key, size: entry.value.blob.byteLength })
  }
  return files
}
