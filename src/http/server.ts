import net from 'node:net'
import type { Socket } from 'node:net'
import { parseRequestHead, formatHead, formatResponse, errorResponse } from './parser.js'
import type { HttpRequest, HttpResponse } from './parser.js'
import { Router } from './router.js'
import type { RouteHandler, RouteParams } from './router.js'
import { isAuthorized, unauthorizedResponse } from './auth.js'
import type { HttpContext } from './handlers.js'
import {
  handleStartSession,
  handleGetProgress,
  handleCancelSession,
  handleListCompleted,
  handleFetchArtifact,
  handleListFiles,
  handleFetchFile
} from './handlers.js'

export interface HttpServerConfig {
  port: number
  host?: string
  users?: Record<string, string>
  maxBodyBytes?: number
  context: HttpContext
}

const DEFAULT_MAX_BODY_BYTES = 1024 * 1024
const HEAD_TERMINATOR = Buffer.from('\r\n\r\n')
const MAX_HEAD_BYTES = 16 * 1024

type ContextHandler = (req: HttpRequest, params: RouteParams, ctx: HttpContext) => HttpResponse | Promise<HttpResponse>

export class HttpServer {
  private server: net.Server | null = null
  private config: HttpServerConfig
  private router: Router
  private sockets: Set<Socket> = new Set()

  constructor(config: HttpServerConfig) {
    this.config = config
    this.router = new Router()
    this.setupRoutes()
  }

  private setupRoutes(): void {
    const ctx = this.config.context

    // Wrap handlers to inject context
    const wrap = (handler: ContextHandler): RouteHandler => {
      return (req, params) => handler(req, params, ctx)
    }

    this.router.add('POST', '/api/sessions', wrap(handleStartSession))
    this.router.add('GET', '/api/sessions/:id', wrap(handleGetProgress))
    this.router.add('POST', '/api/sessions/:id/cancel', wrap(handleCancelSession))
    this.router.add('GET', '/api/completed', wrap(handleListCompleted))
    this.router.add('GET', '/api/completed/:id', wrap(handleFetchArtifact))
    this.router.add('GET', '/files', wrap(handleListFiles))
    this.router.add('GET', '/files/*', wrap(handleFetchFile))
  }

  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = net.createServer((socket) => {
        this.handleConnection(socket)
      })
      this.server = server

      server.once('error', (err: Error) => {
        reject(err)
      })

      server.listen(this.config.port, this.config.host ?? '127.0.0.1', () => {
        const addr = server.address()
        const port = (addr && typeof addr === 'object') ? addr.port : this.config.port
        console.log(`HTTP API listening on ${this.config.host ?? '127.0.0.1'}:${port}`)
        resolve(port)
      })
    })
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.server
      if (!server) {
        resolve()
        return
      }
      for (const socket of this.sockets) {
        socket.destroy()
      }
      server.close(() => {
        this.server = null
        resolve()
      })
    })
  }

  private handleConnection(socket: Socket): void {
    this.sockets.add(socket)
    socket.on('close', () => {
      this.sockets.delete(socket)
    })
    socket.on('error', () => {
      // Broken connections are normal; 'close' follows
    })

    const maxBody = this.config.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES
    let buffer = Buffer.alloc(0)
    let handled = false

    const onData = (chunk: Buffer): void => {
      if (handled) return
      buffer = Buffer.concat([buffer, chunk])

      // Wait for complete headers
      const headEnd = buffer.indexOf(HEAD_TERMINATOR)
      if (headEnd < 0) {
        if (buffer.length > MAX_HEAD_BYTES) {
          handled = true
          writeResponse(socket, errorResponse(400, 'Bad Request'))
        }
        return
      }

      const req = parseRequestHead(buffer.subarray(0, headEnd).toString('latin1'))
      if (!req) {
        handled = true
        writeResponse(socket, errorResponse(400, 'Bad Request'))
        return
      }

      const contentLength = Number(req.headers['content-length'] ?? '0')
      if (!Number.isInteger(contentLength) || contentLength < 0) {
        handled = true
        writeResponse(socket, errorResponse(400, 'Bad Request'))
        return
      }
      if (contentLength > maxBody) {
        handled = true
        writeResponse(socket, errorResponse(413, 'Request body too large'))
        return
      }

      const bodyStart = headEnd + HEAD_TERMINATOR.length
      if (buffer.length - bodyStart < contentLength) {
        // Need more data, wait for next chunk
        return
      }

      handled = true
      socket.off('data', onData)
      req.body = buffer.subarray(bodyStart, bodyStart + contentLength).toString('utf8')

      this.dispatch(req)
        .then((response) => writeResponse(socket, response))
        .catch((err) => {
          console.error('HTTP response error:', err)
          socket.destroy()
        })
    }

    socket.on('data', onData)
  }

  private async dispatch(req: HttpRequest): Promise<HttpResponse> {
    if (!isAuthorized(req.headers['authorization'], this.config.users ?? {})) {
      return unauthorizedResponse()
    }

    const match = this.router.resolve(req.method, req.path)
    if (match.kind === 'not-found') return errorResponse(404, 'Not found')
    if (match.kind === 'method-not-allowed') {
      const res = errorResponse(405, 'Method not allowed')
      res.headers['allow'] = match.allowed.join(', ')
      return res
    }

    try {
      return await match.handler(req, match.params)
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err)
      console.error(`HTTP handler error: ${msg}`)
      return errorResponse(500, 'Internal server error')
    }
  }
}

/**
 * Writes `response` to `socket`, piping its stream after the head when it
 * has one. A socket the client already closed gets nothing, and the
 * response stream is destroyed so its file handle is released.
 */
export function writeResponse(socket: Socket, response: HttpResponse): void {
  const stream = response.stream
  if (socket.destroyed) {
    stream?.destroy()
    return
  }
  if (!stream) {
    socket.end(formatResponse(response))
    return
  }

  socket.write(formatHead(response), 'latin1')
  stream.on('error', (err: Error) => {
    console.error(`Failed to stream file: ${err.message}`)
    socket.destroy()
  })
  socket.on('close', () => {
    stream.destroy()
  })
  stream.pipe(socket)
}
