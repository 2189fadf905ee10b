import type { HttpRequest, HttpResponse } from './parser.js'
import { jsonResponse, errorResponse } from './parser.js'
import type { RouteParams } from './router.js'
import type { CompletedArtifact } from '../artifacts.js'
import type { OpenedFile } from '../files.js'
import type { CancelResult, ProgressReport, StartResult } from '../session/types.js'

export interface HttpContext {
  startSession: (sessionId: string | undefined, locator: string) => StartResult
  getProgress: (sessionId: string) => ProgressReport | null
  cancelSession: (sessionId: string) => CancelResult
  listCompleted: () => CompletedArtifact[]
  openArtifact: (sessionId: string) => OpenedFile | null
  listFiles: () => Promise<string[]>
  openDownload: (relativePath: string) => OpenedFile | null
}

// --- Sessions ---

export function handleStartSession(req: HttpRequest, _params: RouteParams, ctx: HttpContext): HttpResponse {
  let payload: unknown
  try {
    payload = JSON.parse(req.body)
  } catch {
    return errorResponse(400, 'Invalid JSON body')
  }

  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    return errorResponse(400, 'Body must be a JSON object')
  }

  const { sessionId, locator } = payload as Record<string, unknown>
  if (typeof locator !== 'string' || locator.length === 0) {
    return errorResponse(400, 'Missing required field: locator')
  }
  if (sessionId !== undefined && typeof sessionId !== 'string') {
    return errorResponse(400, 'sessionId must be a string')
  }

  const result = ctx.startSession(sessionId, locator)
  if (!result.accepted) return errorResponse(422, result.reason)

  return jsonResponse({ sessionId: result.sessionId }, 202)
}

export function handleGetProgress(_req: HttpRequest, params: RouteParams, ctx: HttpContext): HttpResponse {
  const progress = ctx.getProgress(params['id'] ?? '')
  if (!progress) return errorResponse(404, 'Session not found')
  return jsonResponse(progress)
}

export function handleCancelSession(_req: HttpRequest, params: RouteParams, ctx: HttpContext): HttpResponse {
  const result = ctx.cancelSession(params['id'] ?? '')
  if (result === 'not_found') return errorResponse(404, 'No transfer in progress for this session')
  return jsonResponse({ cancelled: true }, 202)
}

// --- Completed artifacts ---

export function handleListCompleted(_req: HttpRequest, _params: RouteParams, ctx: HttpContext): HttpResponse {
  return jsonResponse({ artifacts: ctx.listCompleted() })
}

export function handleFetchArtifact(_req: HttpRequest, params: RouteParams, ctx: HttpContext): HttpResponse {
  const file = ctx.openArtifact(params['id'] ?? '')
  if (!file) return errorResponse(404, 'Artifact not found')
  return fileResponse(file)
}

// --- Download directory ---

export async function handleListFiles(_req: HttpRequest, _params: RouteParams, ctx: HttpContext): Promise<HttpResponse> {
  try {
    return jsonResponse({ files: await ctx.listFiles() })
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err)
    console.error(`Failed to read download directory: ${msg}`)
    return errorResponse(500, 'Failed to read directory')
  }
}

export function handleFetchFile(_req: HttpRequest, params: RouteParams, ctx: HttpContext): HttpResponse {
  const filePath = params['*']
  if (!filePath) return errorResponse(400, 'No file path specified')

  // Path traversal protection
  if (filePath.split('/').includes('..') || filePath.startsWith('/') || filePath.includes('\\')) {
    return errorResponse(403, 'Forbidden')
  }

  const file = ctx.openDownload(filePath)
  if (!file) return errorResponse(404, 'File not found')
  return fileResponse(file)
}

// --- Helpers ---

export function fileResponse(file: OpenedFile): HttpResponse {
  return {
    status: 200,
    statusText: 'OK',
    headers: {
      'content-type': file.contentType,
      'content-length': String(file.size),
      'content-disposition': `attachment; filename="${file.name.replace(/["\\\r\n]/g, '_')}"`
    },
    body: '',
    stream: file.stream
  }
}
