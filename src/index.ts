#!/usr/bin/env node
import path from 'node:path'
import { ArtifactIndex } from './artifacts.js'
import { createHttpContext } from './context.js'
import { HyperdriveEngine } from './engine/index.js'
import { HttpServer } from './http/index.js'
import { SessionManager } from './session/index.js'
import {
  loadConfig,
  saveConfig,
  getConfigDir,
  getConfigPath,
  parseStartFlags,
  resolveSettings
} from './config.js'
import type { StartFlags } from './config.js'

const config = loadConfig()

function printUsage(): void {
  const settings = resolveSettings(config, process.env)
  console.log(`
driftload - Transfer sessions over the Hyperdrive network

Usage:
  driftload <command> [options]

Commands:
  start [--dir <path>] [--port <n>]   Start the daemon and its HTTP API
  set-dir <path>                      Set the default download directory
  config                              Show current configuration
  help                                Show this help message

Environment Variables:
  DOWNLOAD_DIR   Download directory (default: current directory)
  HTTP_PORT      HTTP API port (default: 8080)
  HTTP_HOST      HTTP API bind address (default: 127.0.0.1)

Config: ${getConfigPath()}
Download directory: ${settings.downloadDir}
`)
}

function showConfig(): void {
  const settings = resolveSettings(config, process.env)
  const users = Object.keys(settings.users)

  console.log('Current configuration:')
  console.log(`  Config file: ${getConfigPath()}`)
  console.log(`  Download dir: ${config.downloadDir ?? '(not set, using env or default)'}`)
  console.log(`  HTTP port: ${config.httpPort ?? '(not set, using env or default)'}`)
  console.log(`  Host: ${config.host ?? '(not set, using env or default)'}`)
  console.log(`  Users: ${users.length > 0 ? users.join(', ') : '(none, API is open)'}`)
  console.log('')
  console.log('Effective settings:')
  console.log(`  DOWNLOAD_DIR: ${settings.downloadDir}`)
  console.log(`  HTTP_PORT: ${settings.httpPort}`)
  console.log(`  HTTP_HOST: ${settings.host}`)
  console.log(`  Chunk size: ${settings.maxChunkBytes} bytes`)
  console.log(`  Listed extensions: ${settings.fileExtensions.join(', ') || '(all files)'}`)
  console.log(`  Finished sessions kept: ${settings.retainedSessions}`)
}

function setDownloadDir(dir: string): void {
  const resolved = path.resolve(dir)
  if (!saveConfig({ ...config, downloadDir: resolved })) {
    process.exit(1)
  }
  console.log(`Download directory set to: ${resolved}`)
}

async function startDaemon(flags: StartFlags): Promise<void> {
  const settings = resolveSettings(config, process.env, flags)

  console.log('Starting driftload daemon...')
  console.log(`  Downloads: ${settings.downloadDir}`)
  console.log(`  HTTP: ${settings.host}:${settings.httpPort}`)

  const index = new ArtifactIndex(path.join(getConfigDir(), 'completed.json'))
  const engine = new HyperdriveEngine({
    storageDir: path.join(getConfigDir(), 'drives'),
    maxChunkBytes: settings.maxChunkBytes
  })

  try {
    await engine.start()
  } catch (err) {
    console.error('Failed to start transfer engine:', err)
    await engine.destroy()
    process.exit(1)
  }

  const manager = new SessionManager({
    engine,
    index,
    downloadDir: settings.downloadDir,
    retainedSessions: settings.retainedSessions
  })

  const server = new HttpServer({
    port: settings.httpPort,
    host: settings.host,
    users: settings.users,
    context: createHttpContext(manager, settings)
  })

  try {
    await server.start()
  } catch (err) {
    console.error('Failed to start HTTP server:', err)
    await engine.destroy()
    process.exit(1)
  }

  let isShuttingDown = false

  // Graceful shutdown
  const shutdown = async (): Promise<void> => {
    if (isShuttingDown) return
    isShuttingDown = true

    console.log('')
    console.log('Shutting down...')

    // Stop accepting requests first so no session starts mid-shutdown
    try {
      await server.stop()
      console.log('  HTTP server stopped')
    } catch (err) {
      console.error('  Error stopping HTTP server:', err)
    }

    await manager.shutdown()
    console.log('  Sessions stopped')

    try {
      await engine.destroy()
      console.log('  Transfer engine closed')
    } catch (err) {
      console.error('  Error closing transfer engine:', err)
    }

    console.log('Goodbye!')
    process.exit(0)
  }

  const onSignal = (): void => {
    shutdown().catch((err) => {
      console.error('Shutdown failed:', err)
      process.exit(1)
    })
  }
  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)

  console.log('')
  if (Object.keys(settings.users).length === 0) {
    console.log('No users configured, HTTP API is unauthenticated')
  }
  const completed = index.size()
  if (completed > 0) {
    console.log(`Completed artifacts: ${completed}`)
  }
  console.log('Ready. Waiting for requests...')
  console.log('')
}

async function main(): Promise<void> {
  const args = process.argv.slice(2)

  if (args.length === 0) {
    printUsage()
    process.exit(0)
  }

  const command = args[0]

  switch (command) {
    case 'start': {
      const { flags, error } = parseStartFlags(args.slice(1))
      if (error) {
        console.error(`Error: ${error}`)
        console.error('Usage: driftload start [--dir <path>] [--port <n>]')
        process.exit(1)
      }
      await startDaemon(flags)
      break
    }

    case 'set-dir':
      if (!args[1]) {
        console.error('Error: path is required')
        console.error('Usage: driftload set-dir <path>')
        process.exit(1)
      }
      setDownloadDir(args[1])
      break

    case 'config':
      showConfig()
      break

    case 'help':
    case '--help':
    case '-h':
      printUsage()
      break

    default:
      console.error(`Unknown command: ${command}`)
      console.error('Run "driftload help" for usage.')
      process.exit(1)
  }
}

main().catch((err) => {
  console.error('Fatal error:', err)
  process.exit(1)
})
