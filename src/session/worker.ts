import fs from 'node:fs'
import path from 'node:path'
import type { ArtifactIndex } from '../artifacts.js'
import type { ByteStream, ReadResult, RemoteFile, ResolvedResource, TransferEngine } from '../engine/types.js'
import { resolveInside, removeFile } from '../files.js'
import { formatSize, shortId } from '../utils.js'
import { IOFailure, ResolutionFailure, SessionCancelled, errorMessage } from './errors.js'
import type { SessionRegistry } from './registry.js'
import type { SessionHandle, SessionSnapshot } from './types.js'

export interface WorkerDeps {
  registry: SessionRegistry
  index: ArtifactIndex
  engine: TransferEngine
  downloadDir: string
}

interface PlannedFile {
  remote: RemoteFile
  localPath: string
  partPath: string   // private to this session until completion
}

/**
 * Drives one session from idle to a terminal state: resolve the locator,
 * stream every file into a `.part` file of its own, then move them into
 * place and record the artifact, or delete them. Never rejects; the
 * outcome is the registry's final snapshot.
 */
export class SessionWorker {
  private deps: WorkerDeps
  private handle: SessionHandle
  private locator: string
  private written: string[] = []
  private tag: string

  constructor(deps: WorkerDeps, handle: SessionHandle, locator: string) {
    this.deps = deps
    this.handle = handle
    this.locator = locator
    this.tag = `[${shortId(handle.id)}]`
  }

  async run(): Promise<SessionSnapshot | null> {
    const { registry } = this.deps

    if (!registry.begin(this.handle)) {
      // Superseded or removed before it could start
      return null
    }

    let resource: ResolvedResource | null = null
    try {
      this.checkpoint()
      resource = await this.resolve()
      const files = this.plan(resource.files)
      const total = files.reduce((sum, f) => sum + f.remote.size, 0)
      registry.setTotal(this.handle, total)
      console.log(`${this.tag} Resolved ${files.length} file(s), ${formatSize(total)}`)

      for (const file of files) {
        this.checkpoint()
        if (total === 0) {
          await this.touch(file)
        } else {
          await this.transfer(resource, file)
        }
      }

      this.checkpoint()
      return this.complete(files)
    } catch (err) {
      return await this.abandon(err)
    } finally {
      if (resource) {
        try {
          await resource.close()
        } catch (err) {
          console.error(`${this.tag} Failed to release engine resource:`, err)
        }
      }
    }
  }

  private async resolve(): Promise<ResolvedResource> {
    try {
      return await this.deps.engine.resolve(this.locator, this.handle.signal)
    } catch (err) {
      if (this.handle.signal.aborted) throw new SessionCancelled(reasonOf(this.handle.signal))
      throw new ResolutionFailure(`Could not resolve ${this.locator}: ${errorMessage(err)}`, { cause: err })
    }
  }

  private plan(files: RemoteFile[]): PlannedFile[] {
    if (files.length === 0) {
      throw new ResolutionFailure(`Nothing to transfer at ${this.locator}`)
    }
    return files.map(remote => {
      const localPath = resolveInside(this.deps.downloadDir, remote.path.replace(/^\/+/, ''))
      if (!localPath) {
        throw new ResolutionFailure(`Refusing path outside the download directory: ${remote.path}`)
      }
      if (!Number.isSafeInteger(remote.size) || remote.size < 0) {
        throw new ResolutionFailure(`Invalid size ${remote.size} for ${remote.path}`)
      }
      return { remote, localPath, partPath: `${localPath}.${this.handle.generation}.part` }
    })
  }

  private async touch(file: PlannedFile): Promise<void> {
    const sink = await this.openSink(file)
    await sink.close()
  }

  private async openSink(file: PlannedFile): Promise<fs.promises.FileHandle> {
    try {
      await fs.promises.mkdir(path.dirname(file.localPath), { recursive: true })
      const sink = await fs.promises.open(file.partPath, 'w')
      this.written.push(file.partPath)
      this.deps.registry.setFilePath(this.handle, file.localPath)
      return sink
    } catch (err) {
      throw new IOFailure(`Cannot create ${file.localPath}: ${errorMessage(err)}`, { cause: err })
    }
  }

  private async transfer(resource: ResolvedResource, file: PlannedFile): Promise<void> {
    const { registry } = this.deps
    const sink = await this.openSink(file)
    let stream: ByteStream | null = null
    let received = 0

    try {
      stream = resource.openStream(file.remote, this.handle.signal)

      for (;;) {
        this.checkpoint()

        let result: ReadResult
        try {
          result = await stream.read()
        } catch (err) {
          if (this.handle.signal.aborted) throw new SessionCancelled(reasonOf(this.handle.signal))
          throw new IOFailure(`Read failed for ${file.remote.path}: ${errorMessage(err)}`, { cause: err })
        }

        if (result.done) break
        // A read can settle after the session was cancelled or superseded
        this.checkpoint()
        // An empty read is not the end of the file; keep reading
        if (result.chunk.length === 0) continue

        if (!registry.fits(this.handle, result.chunk.length)) {
          throw new IOFailure(`${file.remote.path} returned more bytes than the resource declared`)
        }

        try {
          await sink.write(result.chunk)
        } catch (err) {
          throw new IOFailure(`Write failed for ${file.localPath}: ${errorMessage(err)}`, { cause: err })
        }
        registry.advance(this.handle, result.chunk.length)
        received += result.chunk.length
      }

      if (received !== file.remote.size) {
        throw new IOFailure(`${file.remote.path} ended after ${received} of ${file.remote.size} bytes`)
      }
    } finally {
      if (stream) {
        await stream.close().catch(err => {
          console.error(`${this.tag} Failed to close stream for ${file.remote.path}:`, err)
        })
      }
      await sink.close().catch(err => {
        console.error(`${this.tag} Failed to close ${file.localPath}:`, err)
      })
    }
  }

  private checkpoint(): void {
    if (this.handle.signal.aborted) {
      throw new SessionCancelled(reasonOf(this.handle.signal))
    }
  }

  private complete(files: PlannedFile[]): SessionSnapshot | null {
    const { registry, index } = this.deps
    const last = files[files.length - 1]
    if (!last) return null

    // Renames, index entry and terminal transition happen in the same tick
    if (!registry.isCurrent(this.handle)) return null
    for (const file of files) {
      try {
        fs.renameSync(file.partPath, file.localPath)
      } catch (err) {
        throw new IOFailure(`Cannot move ${file.partPath} into place: ${errorMessage(err)}`, { cause: err })
      }
    }
    this.written = []
    index.record(this.handle.id, last.localPath)
    const final = registry.finish(this.handle, 'completed')
    console.log(`${this.tag} Completed: ${last.localPath}`)
    return final
  }

  private async abandon(err: unknown): Promise<SessionSnapshot | null> {
    await this.discardWritten()

    if (err instanceof SessionCancelled) {
      console.log(`${this.tag} ${err.message}`)
      return this.deps.registry.finish(this.handle, 'cancelled')
    }

    const message = errorMessage(err)
    console.error(`${this.tag} Failed: ${message}`)
    return this.deps.registry.finish(this.handle, 'failed', message)
  }

  private async discardWritten(): Promise<void> {
    for (const filePath of this.written) {
      try {
        await removeFile(filePath)
      } catch (err) {
        console.error(`${this.tag} Error deleting ${filePath}:`, err)
      }
    }
    this.written = []
  }
}

function reasonOf(signal: AbortSignal): string {
  return typeof signal.reason === 'string' ? signal.reason : 'cancelled'
}
