import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import { DEFAULT_MAX_CHUNK_BYTES } from './engine/stream.js'
import { DEFAULT_MAX_OUTCOMES } from './session/registry.js'

export interface Config {
  downloadDir?: string
  httpPort?: number
  host?: string
  users?: Record<string, string>  // username -> password
  maxChunkBytes?: number
  fileExtensions?: string[]
  retainedSessions?: number
}

export interface ConfigValidationError {
  field: string
  message: string
}

/** Effective values after defaults, config file, environment and flags. */
export interface Settings {
  downloadDir: string
  httpPort: number
  host: string
  users: Record<string, string>
  maxChunkBytes: number
  fileExtensions: string[]
  retainedSessions: number
}

export interface StartFlags {
  dir?: string
  port?: number
}

export const DEFAULT_SETTINGS: Settings = {
  downloadDir: '.',
  httpPort: 8080,
  host: '127.0.0.1',
  users: {},
  maxChunkBytes: DEFAULT_MAX_CHUNK_BYTES,
  fileExtensions: ['.mkv', '.mp4'],
  retainedSessions: DEFAULT_MAX_OUTCOMES
}

const CONFIG_DIR = path.join(os.homedir(), '.driftload')
const CONFIG_FILE = path.join(CONFIG_DIR, 'config.json')

const MAX_CHUNK_LIMIT = 16 * 1024 * 1024

export function getConfigDir(): string {
  return CONFIG_DIR
}

export function getConfigPath(): string {
  return CONFIG_FILE
}

function isPort(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 65535
}

function validateUsername(name: string): string | null {
  if (name.length === 0) return 'Username cannot be empty'
  if (name.includes(':')) return 'Username cannot contain a colon'
  return null
}

export function validateConfig(config: unknown): ConfigValidationError[] {
  const errors: ConfigValidationError[] = []

  if (typeof config !== 'object' || config === null || Array.isArray(config)) {
    errors.push({ field: 'config', message: 'Config must be an object' })
    return errors
  }

  const c = config as Record<string, unknown>

  if (c.downloadDir !== undefined) {
    if (typeof c.downloadDir !== 'string') {
      errors.push({ field: 'downloadDir', message: 'Download directory must be a string' })
    } else if (c.downloadDir.length === 0) {
      errors.push({ field: 'downloadDir', message: 'Download directory cannot be empty' })
    }
  }

  if (c.httpPort !== undefined) {
    if (typeof c.httpPort !== 'number') {
      errors.push({ field: 'httpPort', message: 'HTTP port must be a number' })
    } else if (!isPort(c.httpPort)) {
      errors.push({ field: 'httpPort', message: 'HTTP port must be an integer between 1 and 65535' })
    }
  }

  if (c.host !== undefined) {
    if (typeof c.host !== 'string' || c.host.length === 0) {
      errors.push({ field: 'host', message: 'Host must be a non-empty string' })
    }
  }

  if (c.users !== undefined) {
    if (typeof c.users !== 'object' || c.users === null || Array.isArray(c.users)) {
      errors.push({ field: 'users', message: 'Users must be an object' })
    } else {
      for (const [name, password] of Object.entries(c.users as Record<string, unknown>)) {
        const nameError = validateUsername(name)
        if (nameError) {
          errors.push({ field: `users.${name}`, message: nameError })
        }
        if (typeof password !== 'string' || password.length === 0) {
          errors.push({ field: `users.${name}`, message: 'Password must be a non-empty string' })
        }
      }
    }
  }

  if (c.maxChunkBytes !== undefined) {
    if (typeof c.maxChunkBytes !== 'number' || !Number.isInteger(c.maxChunkBytes) ||
        c.maxChunkBytes < 1 || c.maxChunkBytes > MAX_CHUNK_LIMIT) {
      errors.push({ field: 'maxChunkBytes', message: `Chunk size must be an integer between 1 and ${MAX_CHUNK_LIMIT}` })
    }
  }

  if (c.retainedSessions !== undefined) {
    if (typeof c.retainedSessions !== 'number' || !Number.isInteger(c.retainedSessions) || c.retainedSessions < 0) {
      errors.push({ field: 'retainedSessions', message: 'Retained sessions must be a non-negative integer' })
    }
  }

  if (c.fileExtensions !== undefined) {
    if (!Array.isArray(c.fileExtensions)) {
      errors.push({ field: 'fileExtensions', message: 'File extensions must be an array' })
    } else {
      c.fileExtensions.forEach((ext: unknown, i: number) => {
        if (typeof ext !== 'string' || !/^\.[a-zA-Z0-9]+$/.test(ext)) {
          errors.push({ field: `fileExtensions.${i}`, message: 'Extension must look like ".mp4"' })
        }
      })
    }
  }

  return errors
}

/** Keeps only the fields of `parsed` that pass validation on their own. */
export function sanitizeConfig(parsed: unknown): Config {
  const config: Config = {}
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return config

  const c = parsed as Record<string, unknown>
  const fieldOk = (field: string): boolean =>
    validateConfig({ [field]: c[field] }).length === 0

  if (typeof c.downloadDir === 'string' && fieldOk('downloadDir')) config.downloadDir = c.downloadDir
  if (isPort(c.httpPort)) config.httpPort = c.httpPort
  if (typeof c.host === 'string' && fieldOk('host')) config.host = c.host
  if (typeof c.maxChunkBytes === 'number' && fieldOk('maxChunkBytes')) config.maxChunkBytes = c.maxChunkBytes
  if (typeof c.retainedSessions === 'number' && fieldOk('retainedSessions')) config.retainedSessions = c.retainedSessions

  // Only keep individually-valid users
  if (typeof c.users === 'object' && c.users !== null && !Array.isArray(c.users)) {
    const users: Record<string, string> = {}
    for (const [name, password] of Object.entries(c.users as Record<string, unknown>)) {
      if (!validateUsername(name) && typeof password === 'string' && password.length > 0) {
        users[name] = password
      }
    }
    if (Object.keys(users).length > 0) config.users = users
  }

  if (Array.isArray(c.fileExtensions)) {
    const exts = c.fileExtensions.filter((e: unknown): e is string =>
      typeof e === 'string' && /^\.[a-zA-Z0-9]+$/.test(e))
    config.fileExtensions = exts.map(e => e.toLowerCase())
  }

  return config
}

export function loadConfig(configFile: string = CONFIG_FILE): Config {
  try {
    if (fs.existsSync(configFile)) {
      const content = fs.readFileSync(configFile, 'utf8')
      const parsed: unknown = JSON.parse(content)

      const errors = validateConfig(parsed)
      if (errors.length > 0) {
        console.error(`Config validation errors in ${configFile}:`)
        for (const err of errors) {
          console.error(`  - ${err.field}: ${err.message}`)
        }
        console.error('Using default values for invalid fields.')
      }
      return sanitizeConfig(parsed)
    }
  } catch (err) {
    if (err instanceof SyntaxError) {
      console.error(`Invalid JSON in config file ${configFile}:`, err.message)
    } else {
      console.error('Failed to load config:', err)
    }
  }
  return {}
}

export function saveConfig(config: Config, configFile: string = CONFIG_FILE): boolean {
  const errors = validateConfig(config)
  if (errors.length > 0) {
    console.error('Cannot save invalid config:')
    for (const err of errors) {
      console.error(`  - ${err.field}: ${err.message}`)
    }
    return false
  }

  try {
    fs.mkdirSync(path.dirname(configFile), { recursive: true })
    fs.writeFileSync(configFile, JSON.stringify(config, null, 2))
    return true
  } catch (err) {
    console.error('Failed to save config:', err)
    return false
  }
}

/**
 * Parses the flags accepted by `start`: `--dir <path>` and `--port <n>`
 * (also `--dir=<path>`, `--port=<n>`).
 */
export function parseStartFlags(args: string[]): { flags: StartFlags; error: string | null } {
  const flags: StartFlags = {}

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? ''
    const eq = arg.indexOf('=')
    const name = eq >= 0 ? arg.slice(0, eq) : arg
    let value: string | undefined
    if (eq >= 0) {
      value = arg.slice(eq + 1)
    } else {
      value = args[i + 1]
      i++
    }

    switch (name) {
      case '--dir':
      case '-dir':
        if (!value) return { flags, error: '--dir requires a path' }
        flags.dir = value
        break
      case '--port':
      case '-port': {
        const port = Number(value)
        if (!isPort(port)) return { flags, error: '--port must be an integer between 1 and 65535' }
        flags.port = port
        break
      }
      default:
        return { flags, error: `Unknown option: ${arg}` }
    }
  }

  return { flags, error: null }
}

/** Precedence: flag > environment > config file > default. */
export function resolveSettings(
  config: Config,
  env: Record<string, string | undefined> = {},
  flags: StartFlags = {}
): Settings {
  const envPort = env.HTTP_PORT !== undefined ? Number(env.HTTP_PORT) : undefined
  const envDir = env.DOWNLOAD_DIR ? env.DOWNLOAD_DIR : undefined
  const envHost = env.HTTP_HOST ? env.HTTP_HOST : undefined

  return {
    downloadDir: path.resolve(flags.dir ?? envDir ?? config.downloadDir ?? DEFAULT_SETTINGS.downloadDir),
    httpPort: flags.port ?? (isPort(envPort) ? envPort : undefined) ?? config.httpPort ?? DEFAULT_SETTINGS.httpPort,
    host: envHost ?? config.host ?? DEFAULT_SETTINGS.host,
    users: { ...(config.users ?? DEFAULT_SETTINGS.users) },
    maxChunkBytes: config.maxChunkBytes ?? DEFAULT_SETTINGS.maxChunkBytes,
    fileExtensions: [...(config.fileExtensions ?? DEFAULT_SETTINGS.fileExtensions)],
    retainedSessions: config.retainedSessions ?? DEFAULT_SETTINGS.retainedSessions
  }
}
