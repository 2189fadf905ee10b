declare module 'hypercore-crypto' {
  interface HypercoreCrypto {
    randomBytes(n: number): Buffer
  }

  const crypto: HypercoreCrypto
  export default crypto
}

declare module 'b4a' {
  interface B4a {
    toString(buf: Buffer | Uint8Array, encoding?: string): string
    from(data: string | Buffer, encoding?: string): Buffer
  }

  const b4a: B4a
  export default b4a
}

declare module 'hyperswarm' {
  import { EventEmitter } from 'node:events'
  import type { Duplex } from 'node:stream'

  export interface JoinOptions {
    client?: boolean
    server?: boolean
  }

  export default class Hyperswarm extends EventEmitter {
    constructor()
    join(topic: Buffer, options?: JoinOptions): unknown
    leave(topic: Buffer): Promise<void>
    flush(): Promise<void>
    destroy(): Promise<void>
    on(event: 'connection', handler: (socket: Duplex) => void): this
    on(event: 'error', handler: (err: Error) => void): this
  }
}

declare module 'corestore' {
  import { EventEmitter } from 'node:events'
  import type { Duplex } from 'node:stream'

  export default class Corestore extends EventEmitter {
    constructor(storage: string)
    ready(): Promise<void>
    replicate(stream: Duplex): unknown
    close(): Promise<void>
  }
}

declare module 'hyperdrive' {
  import { EventEmitter } from 'node:events'
  import Corestore from 'corestore'

  export interface HyperdriveEntry {
    key: string
    value: {
      blob: { byteLength: number } | null
    }
  }

  export interface HyperdriveReadStream extends AsyncIterable<Buffer> {
    destroy(err?: Error): void
  }

  export default class Hyperdrive extends EventEmitter {
    constructor(store: Corestore, key?: Buffer | null)
    ready(): Promise<void>
    update(options?: { wait?: boolean }): Promise<boolean>
    list(folder: string, options?: { recursive?: boolean }): AsyncIterable<HyperdriveEntry>
    createReadStream(path: string): HyperdriveReadStream
    close(): Promise<void>
    findingPeers(): () => void
    discoveryKey: Buffer
  }
}
