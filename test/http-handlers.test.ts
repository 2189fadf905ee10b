import { test, describe } from 'node:test'
import assert from 'node:assert'
import { Readable } from 'node:stream'
import type { HttpRequest } from '../src/http/parser.js'
import type { HttpContext } from '../src/http/handlers.js'
import type { OpenedFile } from '../src/files.js'
import type { ProgressReport } from '../src/session/types.js'
import {
  handleStartSession,
  handleGetProgress,
  handleCancelSession,
  handleListCompleted,
  handleFetchArtifact,
  handleListFiles,
  handleFetchFile,
  fileResponse
} from '../src/http/handlers.js'

function makeRequest(overrides: Partial<HttpRequest> = {}): HttpRequest {
  return {
    method: 'GET',
    path: '/',
    query: {},
    headers: {},
    body: '',
    ...overrides
  }
}

function makeFile(name: string, content = 'data'): OpenedFile {
  return {
    name,
    size: Buffer.byteLength(content),
    contentType: 'video/x-matroska',
    stream: Readable.from([Buffer.from(content)])
  }
}

const PROGRESS: ProgressReport = {
  sessionId: 's1',
  state: 'active',
  percentage: 50,
  downloadedBytes: 1500,
  totalBytes: 3000,
  filePath: '/dl/b.mkv',
  error: null
}

function makeContext(overrides: Partial<HttpContext> = {}): HttpContext {
  return {
    startSession: (sessionId, locator) =>
      locator.startsWith('fake://')
        ? { accepted: true, sessionId: sessionId ?? 'generated-id' }
        : { accepted: false, reason: 'Locator must start with fake://' },
    getProgress: (sessionId) => (sessionId === 's1' ? PROGRESS : null),
    cancelSession: (sessionId) => (sessionId === 's1' ? 'accepted' : 'not_found'),
    listCompleted: () => [{ sessionId: 'done', filePath: '/dl/done.mkv', completedAt: 1700000000000 }],
    openArtifact: (sessionId) => (sessionId === 'done' ? makeFile('done.mkv') : null),
    listFiles: async () => ['a.mkv', 'show/b.mp4'],
    openDownload: (relativePath) => (relativePath === 'show/b.mp4' ? makeFile('b.mp4') : null),
    ...overrides
  }
}

function bodyOf(res: { body: string | Buffer }): unknown {
  return JSON.parse(res.body.toString())
}

describe('handleStartSession', () => {
  test('accepts a locator with a caller-chosen id', () => {
    const req = makeRequest({ method: 'POST', body: JSON.stringify({ sessionId: 'mine', locator: 'fake://a' }) })
    const res = handleStartSession(req, {}, makeContext())
    assert.strictEqual(res.status, 202)
    assert.deepStrictEqual(bodyOf(res), { sessionId: 'mine' })
  })

  test('generates an id when none is given', () => {
    const req = makeRequest({ method: 'POST', body: JSON.stringify({ locator: 'fake://a' }) })
    const res = handleStartSession(req, {}, makeContext())
    assert.deepStrictEqual(bodyOf(res), { sessionId: 'generated-id' })
  })

  test('rejects invalid JSON', () => {
    const res = handleStartSession(makeRequest({ body: '{' }), {}, makeContext())
    assert.strictEqual(res.status, 400)
    assert.deepStrictEqual(bodyOf(res), { error: 'Invalid JSON body' })
  })

  test('rejects non-object bodies', () => {
    const res = handleStartSession(makeRequest({ body: '[1]' }), {}, makeContext())
    assert.deepStrictEqual(bodyOf(res), { error: 'Body must be a JSON object' })
  })

  test('requires a locator', () => {
    const res = handleStartSession(makeRequest({ body: '{"locator":""}' }), {}, makeContext())
    assert.strictEqual(res.status, 400)
    assert.deepStrictEqual(bodyOf(res), { error: 'Missing required field: locator' })
  })

  test('requires a string session id', () => {
    const res = handleStartSession(makeRequest({ body: '{"locator":"fake://a","sessionId":7}' }), {}, makeContext())
    assert.deepStrictEqual(bodyOf(res), { error: 'sessionId must be a string' })
  })

  test('passes rejections through as 422', () => {
    const res = handleStartSession(makeRequest({ body: '{"locator":"http://x"}' }), {}, makeContext())
    assert.strictEqual(res.status, 422)
    assert.deepStrictEqual(bodyOf(res), { error: 'Locator must start with fake://' })
  })
})

describe('handleGetProgress', () => {
  test('returns the progress report', () => {
    const res = handleGetProgress(makeRequest(), { id: 's1' }, makeContext())
    assert.strictEqual(res.status, 200)
    assert.deepStrictEqual(bodyOf(res), PROGRESS)
  })

  test('404 for unknown sessions', () => {
    const res = handleGetProgress(makeRequest(), { id: 'nope' }, makeContext())
    assert.strictEqual(res.status, 404)
    assert.deepStrictEqual(bodyOf(res), { error: 'Session not found' })
  })
})

describe('handleCancelSession', () => {
  test('202 when the signal was delivered', () => {
    const res = handleCancelSession(makeRequest({ method: 'POST' }), { id: 's1' }, makeContext())
    assert.strictEqual(res.status, 202)
    assert.deepStrictEqual(bodyOf(res), { cancelled: true })
  })

  test('404 when there is nothing to cancel', () => {
    const res = handleCancelSession(makeRequest({ method: 'POST' }), { id: 'other' }, makeContext())
    assert.strictEqual(res.status, 404)
    assert.deepStrictEqual(bodyOf(res), { error: 'No transfer in progress for this session' })
  })
})

describe('completed artifacts', () => {
  test('lists the index', () => {
    const res = handleListCompleted(makeRequest(), {}, makeContext())
    assert.deepStrictEqual(bodyOf(res), {
      artifacts: [{ sessionId: 'done', filePath: '/dl/done.mkv', completedAt: 1700000000000 }]
    })
  })

  test('streams an artifact', () => {
    const res = handleFetchArtifact(makeRequest(), { id: 'done' }, makeContext())
    assert.strictEqual(res.status, 200)
    assert.ok(res.stream)
    assert.strictEqual(res.headers['content-disposition'], 'attachment; filename="done.mkv"')
  })

  test('404 for a missing artifact', () => {
    const res = handleFetchArtifact(makeRequest(), { id: 's1' }, makeContext())
    assert.strictEqual(res.status, 404)
    assert.deepStrictEqual(bodyOf(res), { error: 'Artifact not found' })
  })
})

describe('download directory', () => {
  test('lists files', async () => {
    const res = await handleListFiles(makeRequest(), {}, makeContext())
    assert.deepStrictEqual(bodyOf(res), { files: ['a.mkv', 'show/b.mp4'] })
  })

  test('500 when the directory cannot be read', async () => {
    const ctx = makeContext({ listFiles: async () => { throw new Error('EACCES') } })
    const res = await handleListFiles(makeRequest(), {}, ctx)
    assert.strictEqual(res.status, 500)
    assert.deepStrictEqual(bodyOf(res), { error: 'Failed to read directory' })
  })

  test('streams a file', () => {
    const res = handleFetchFile(makeRequest(), { '*': 'show/b.mp4' }, makeContext())
    assert.strictEqual(res.status, 200)
    assert.strictEqual(res.headers['content-length'], '4')
  })

  test('blocks traversal', () => {
    for (const p of ['../etc/passwd', 'a/../../b', 'a\\b']) {
      const res = handleFetchFile(makeRequest(), { '*': p }, makeContext())
      assert.strictEqual(res.status, 403, p)
    }
  })

  test('400 without a path', () => {
    const res = handleFetchFile(makeRequest(), {}, makeContext())
    assert.strictEqual(res.status, 400)
  })

  test('404 for a missing file', () => {
    const res = handleFetchFile(makeRequest(), { '*': 'nope.mkv' }, makeContext())
    assert.strictEqual(res.status, 404)
    assert.deepStrictEqual(bodyOf(res), { error: 'File not found' })
  })
})

describe('fileResponse', () => {
  test('sanitizes the download filename', () => {
    const res = fileResponse(makeFile('we"ird\r\n.mkv'))
    assert.strictEqual(res.headers['content-disposition'], 'attachment; filename="we_ird__.mkv"')
    assert.strictEqual(res.headers['content-type'], 'video/x-matroska')
    assert.strictEqual(res.body, '')
  })
})
