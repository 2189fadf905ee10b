export { HyperdriveEngine, parseDriveLocator } from './hyperdrive.js'
export type { HyperdriveEngineConfig } from './hyperdrive.js'
export { chunkReader, DEFAULT_MAX_CHUNK_BYTES } from './stream.js'
export type { ByteStream, ReadResult, RemoteFile, ResolvedResource, TransferEngine } from './types.js'
