import { timingSafeEqual } from 'node:crypto'
import type { HttpResponse } from './parser.js'
import { errorResponse } from './parser.js'

export const AUTH_REALM = 'driftload'

export interface BasicCredentials {
  username: string
  password: string
}

export function parseBasicAuth(header: string | undefined): BasicCredentials | null {
  if (!header) return null
  const match = /^Basic\s+([A-Za-z0-9+/=]+)$/i.exec(header.trim())
  if (!match?.[1]) return null

  const decoded = Buffer.from(match[1], 'base64').toString('utf8')
  const colonIdx = decoded.indexOf(':')
  if (colonIdx < 0) return null

  return { username: decoded.slice(0, colonIdx), password: decoded.slice(colonIdx + 1) }
}

function safeEqual(a: string, b: string): boolean {
  const bufA = Buffer.from(a, 'utf8')
  const bufB = Buffer.from(b, 'utf8')
  if (bufA.length !== bufB.length) return false
  return timingSafeEqual(bufA, bufB)
}

/**
 * True when `users` is empty (authentication off) or the header carries a
 * matching username and password.
 */
export function isAuthorized(header: string | undefined, users: Record<string, string>): boolean {
  if (Object.keys(users).length === 0) return true

  const credentials = parseBasicAuth(header)
  if (!credentials) return false

  const expected = Object.hasOwn(users, credentials.username) ? users[credentials.username] : undefined
  if (expected === undefined) return false
  return safeEqual(credentials.password, expected)
}

export function unauthorizedResponse(): HttpResponse {
  const res = errorResponse(401, 'Unauthorized')
  res.headers['www-authenticate'] = `Basic realm="${AUTH_REALM}"`
  return res
}
