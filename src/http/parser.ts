import type { Readable } from 'node:stream'

export interface HttpRequest {
  method: string
  path: string
  query: Record<string, string>
  headers: Record<string, string>
  body: string
}

export interface HttpResponse {
  status: number
  statusText: string
  headers: Record<string, string>
  body: string | Buffer
  /** Streamed after the head instead of `body`; `content-length` must be set by the handler. */
  stream?: Readable
}

export function parseRequestHead(raw: string): HttpRequest | null {
  const headEnd = raw.indexOf('\r\n\r\n')
  const head = headEnd >= 0 ? raw.slice(0, headEnd) : raw
  const lines = head.split('\r\n')

  const requestLine = lines[0]
  if (!requestLine) return null

  const [rawMethod, rawUrl] = requestLine.split(' ')
  if (!rawMethod || !rawUrl) return null

  const method = rawMethod.toUpperCase()

  // Split path and query string
  const qIdx = rawUrl.indexOf('?')
  const path = qIdx >= 0 ? rawUrl.slice(0, qIdx) : rawUrl
  let query: Record<string, string>
  try {
    query = qIdx >= 0 ? parseQueryString(rawUrl.slice(qIdx + 1)) : {}
  } catch {
    // Malformed percent-encoding
    return null
  }

  const headers: Record<string, string> = {}
  for (const line of lines.slice(1)) {
    const colonIdx = line.indexOf(':')
    if (colonIdx < 0) continue
    const name = line.slice(0, colonIdx).trim().toLowerCase()
    const value = line.slice(colonIdx + 1).trim()
    headers[name] = value
  }

  return { method, path, query, headers, body: '' }
}

export function parseQueryString(qs: string): Record<string, string> {
  const result: Record<string, string> = {}
  if (!qs) return result

  for (const pair of qs.split('&')) {
    const eqIdx = pair.indexOf('=')
    if (eqIdx < 0) {
      if (pair) result[decodeQueryComponent(pair)] = ''
      continue
    }
    const key = decodeQueryComponent(pair.slice(0, eqIdx))
    result[key] = decodeQueryComponent(pair.slice(eqIdx + 1))
  }

  return result
}

function decodeQueryComponent(s: string): string {
  return decodeURIComponent(s.replace(/\+/g, ' '))
}

/** Status line and headers, terminated by the blank line. */
export function formatHead(res: HttpResponse): string {
  let out = `HTTP/1.1 ${res.status} ${res.statusText}\r\n`

  const headers = { ...res.headers }
  if (!headers['content-length'] && !res.stream) {
    headers['content-length'] = String(Buffer.byteLength(res.body))
  }
  if (!headers['connection']) {
    headers['connection'] = 'close'
  }

  for (const [name, value] of Object.entries(headers)) {
    out += `${name}: ${value}\r\n`
  }

  return out + '\r\n'
}

export function formatResponse(res: HttpResponse): Buffer {
  const body = typeof res.body === 'string' ? Buffer.from(res.body, 'utf8') : res.body
  return Buffer.concat([Buffer.from(formatHead(res), 'latin1'), body])
}

export function jsonResponse(data: unknown, status = 200): HttpResponse {
  const body = JSON.stringify(data)
  return {
    status,
    statusText: statusText(status),
    headers: { 'content-type': 'application/json' },
    body
  }
}

export function errorResponse(status: number, message: string): HttpResponse {
  return jsonResponse({ error: message }, status)
}

export function statusText(code: number): string {
  switch (code) {
    case 200: return 'OK'
    case 201: return 'Created'
    case 202: return 'Accepted'
    case 204: return 'No Content'
    case 400: return 'Bad Request'
    case 401: return 'Unauthorized'
    case 403: return 'Forbidden'
    case 404: return 'Not Found'
    case 405: return 'Method Not Allowed'
    case 413: return 'Payload Too Large'
    case 422: return 'Unprocessable Entity'
    case 500: return 'Internal Server Error'
    default: return 'Unknown'
  }
}
