import { test, describe, beforeEach, afterEach } from 'node:test'
import assert from 'node:assert'
import fs from 'node:fs'
import net from 'node:net'
import { Readable } from 'node:stream'
import path from 'node:path'
import os from 'node:os'
import { ArtifactIndex } from '../src/artifacts.js'
import { createHttpContext } from '../src/context.js'
import { HttpServer, writeResponse } from '../src/http/server.js'
import { SessionManager } from '../src/session/manager.js'
import { FakeEngine, bytes } from './helpers/fake-engine.js'

let tmpDir: string
let downloadDir: string
let engine: FakeEngine
let manager: SessionManager
let server: HttpServer | null = null
let baseUrl: string
let port: number

async function startServer(options: { users?: Record<string, string>; maxBodyBytes?: number } = {}): Promise<void> {
  const created = new HttpServer({
    port: 0,
    host: '127.0.0.1',
    users: options.users,
    maxBodyBytes: options.maxBodyBytes,
    context: createHttpContext(manager, { downloadDir, fileExtensions: ['.mkv'] })
  })
  server = created
  port = await created.start()
  baseUrl = `http://127.0.0.1:${port}`
}

function rawRequest(text: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const socket = net.connect(port, '127.0.0.1', () => {
      socket.write(text)
    })
    const chunks: Buffer[] = []
    socket.on('data', (chunk: Buffer) => chunks.push(chunk))
    socket.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')))
    socket.on('error', reject)
  })
}

function basic(user: string, pass: string): string {
  return `Basic ${Buffer.from(`${user}:${pass}`).toString('base64')}`
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'driftload-http-'))
  downloadDir = path.join(tmpDir, 'downloads')
  engine = new FakeEngine().add('fake://show', {
    files: [
      { path: 'a.mkv', content: bytes(1000, 0x61) },
      { path: 'b.mkv', content: bytes(2000, 0x62) }
    ]
  })
  manager = new SessionManager({ engine, index: new ArtifactIndex(), downloadDir })
})

afterEach(async () => {
  await server?.stop()
  server = null
  await manager.shutdown()
  fs.rmSync(tmpDir, { recursive: true, force: true })
})

describe('HttpServer', () => {
  test('starts a session and serves its artifact', async () => {
    await startServer()

    const started = await fetch(`${baseUrl}/api/sessions`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ sessionId: 'web-1', locator: 'fake://show' })
    })
    assert.strictEqual(started.status, 202)
    assert.deepStrictEqual(await started.json(), { sessionId: 'web-1' })

    await manager.settled('web-1')

    const progress = await fetch(`${baseUrl}/api/sessions/web-1`)
    assert.strictEqual(progress.status, 200)
    assert.deepStrictEqual(await progress.json(), {
      sessionId: 'web-1',
      state: 'completed',
      percentage: 100,
      downloadedBytes: 3000,
      totalBytes: 3000,
      filePath: path.join(downloadDir, 'b.mkv'),
      error: null
    })

    const completed = await fetch(`${baseUrl}/api/completed`)
    const list: unknown = await completed.json()
    assert.ok(typeof list === 'object' && list !== null && 'artifacts' in list && Array.isArray(list.artifacts))
    assert.strictEqual(list.artifacts.length, 1)

    const artifact = await fetch(`${baseUrl}/api/completed/web-1`)
    assert.strictEqual(artifact.status, 200)
    assert.strictEqual(artifact.headers.get('content-type'), 'video/x-matroska')
    assert.strictEqual(artifact.headers.get('content-disposition'), 'attachment; filename="b.mkv"')
    assert.deepStrictEqual(Buffer.from(await artifact.arrayBuffer()), bytes(2000, 0x62))
  })

  test('cancels a running session over HTTP', async () => {
    await startServer()
    const held = engine.pauseAt('fake://show', 500)
    manager.start('web-2', 'fake://show')
    await held

    const mid = await fetch(`${baseUrl}/api/sessions/web-2`)
    const midBody: unknown = await mid.json()
    assert.ok(typeof midBody === 'object' && midBody !== null && 'percentage' in midBody)
    assert.strictEqual(midBody.percentage, 16)

    const cancelled = await fetch(`${baseUrl}/api/sessions/web-2/cancel`, { method: 'POST' })
    assert.strictEqual(cancelled.status, 202)
    assert.deepStrictEqual(await cancelled.json(), { cancelled: true })

    const again = await fetch(`${baseUrl}/api/sessions/web-2/cancel`, { method: 'POST' })
    assert.strictEqual(again.status, 404)
    await again.body?.cancel()

    await manager.settled('web-2')
    const after = await fetch(`${baseUrl}/api/sessions/web-2`)
    const afterBody: unknown = await after.json()
    assert.ok(typeof afterBody === 'object' && afterBody !== null && 'state' in afterBody)
    assert.strictEqual(afterBody.state, 'cancelled')
  })

  test('rejects an unusable locator with 422', async () => {
    await startServer()
    const res = await fetch(`${baseUrl}/api/sessions`, {
      method: 'POST',
      body: JSON.stringify({ locator: 'ftp://nowhere' })
    })
    assert.strictEqual(res.status, 422)
    assert.deepStrictEqual(await res.json(), { error: 'Locator must start with fake://' })
  })

  test('404 for unknown sessions and routes', async () => {
    await startServer()
    const session = await fetch(`${baseUrl}/api/sessions/missing`)
    assert.strictEqual(session.status, 404)
    assert.deepStrictEqual(await session.json(), { error: 'Session not found' })

    const route = await fetch(`${baseUrl}/nowhere`)
    assert.strictEqual(route.status, 404)
    assert.deepStrictEqual(await route.json(), { error: 'Not found' })
  })

  test('405 lists the allowed methods', async () => {
    await startServer()
    const res = await fetch(`${baseUrl}/api/sessions`, { method: 'GET' })
    assert.strictEqual(res.status, 405)
    assert.strictEqual(res.headers.get('allow'), 'POST')
    await res.body?.cancel()
  })

  test('requires credentials when users are configured', async () => {
    await startServer({ users: { admin: 'test-secret' } })

    const anonymous = await fetch(`${baseUrl}/api/completed`)
    assert.strictEqual(anonymous.status, 401)
    assert.strictEqual(anonymous.headers.get('www-authenticate'), 'Basic realm="driftload"')
    await anonymous.body?.cancel()

    const wrong = await fetch(`${baseUrl}/api/completed`, { headers: { authorization: basic('admin', 'nope') } })
    assert.strictEqual(wrong.status, 401)
    await wrong.body?.cancel()

    const ok = await fetch(`${baseUrl}/api/completed`, { headers: { authorization: basic('admin', 'test-secret') } })
    assert.strictEqual(ok.status, 200)
    assert.deepStrictEqual(await ok.json(), { artifacts: [] })
  })

  test('413 for oversized bodies', async () => {
    await startServer({ maxBodyBytes: 16 })
    const response = await rawRequest(
      'POST /api/sessions HTTP/1.1\r\nHost: localhost\r\nContent-Length: 64\r\n\r\n' + 'x'.repeat(64)
    )
    assert.ok(response.startsWith('HTTP/1.1 413 Payload Too Large\r\n'))
  })

  test('400 for a malformed request', async () => {
    await startServer()
    const response = await rawRequest('garbage\r\n\r\n')
    assert.ok(response.startsWith('HTTP/1.1 400 Bad Request\r\n'))
  })

  test('lists and serves files from the download directory', async () => {
    fs.mkdirSync(path.join(downloadDir, 'show'), { recursive: true })
    fs.writeFileSync(path.join(downloadDir, 'show', 'ep1.mkv'), 'episode')
    fs.writeFileSync(path.join(downloadDir, 'notes.txt'), 'skip')
    await startServer()

    const listed = await fetch(`${baseUrl}/files`)
    assert.deepStrictEqual(await listed.json(), { files: ['show/ep1.mkv'] })

    const file = await fetch(`${baseUrl}/files/show/ep1.mkv`)
    assert.strictEqual(file.status, 200)
    assert.strictEqual(file.headers.get('content-length'), '7')
    assert.strictEqual(await file.text(), 'episode')

    const missing = await fetch(`${baseUrl}/files/show/ep2.mkv`)
    assert.strictEqual(missing.status, 404)
    await missing.body?.cancel()
  })

  test('refuses path traversal', async () => {
    fs.mkdirSync(downloadDir, { recursive: true })
    fs.writeFileSync(path.join(tmpDir, 'secret.txt'), 'secret')
    await startServer()

    const response = await rawRequest('GET /files/../secret.txt HTTP/1.1\r\nHost: localhost\r\n\r\n')
    assert.ok(response.startsWith('HTTP/1.1 403 Forbidden\r\n'))
    assert.ok(response.endsWith('{"error":"Forbidden"}'))
  })
})

describe('writeResponse', () => {
  test('destroys the file stream when the client already left', () => {
    const socket = new net.Socket()
    socket.destroy()
    const stream = Readable.from([Buffer.from('episode')])

    writeResponse(socket, {
      status: 200,
      statusText: 'OK',
      headers: { 'content-length': '7' },
      body: '',
      stream
    })

    assert.strictEqual(stream.destroyed, true)
  })

  test('a closed socket gets no plain response either', (t) => {
    const socket = new net.Socket()
    socket.destroy()
    const end = t.mock.method(socket, 'end')

    writeResponse(socket, { status: 204, statusText: 'No Content', headers: {}, body: '' })
    assert.strictEqual(end.mock.callCount(), 0)
  })
})

