import { describe, it, expect, afterEach } from 'vitest'
import { get, type IncomingMessage } from 'node:http'
import type { Server } from 'node:net'
import { createApp } from '../scripts/health-api.js'
import { broadcast, closeAll, getClientCount } from '../scripts/monitoring/sse.js'

let server: Server | null = null

afterEach(async () => {
  closeAll()
  const s = server
  server = null
  if (s) await new Promise<void>((resolve) => s.close(() => resolve()))
})

function start(): Promise<number> {
  const app = createApp({
    getChecker: () => null,
    getConfig: () => null,
    getAgentClient: () => null,
    getJumpHostClient: () => null,
    getCallStats: () => [],
  })
  return new Promise((resolve) => {
    const s = app.listen(0, '127.0.0.1', () => {
      const addr = s.address()
      resolve(typeof addr === 'object' && addr ? addr.port : 0)
    })
    server = s
  })
}

/** Resolves with everything received once `marker` shows up in the stream. */
function readUntil(res: IncomingMessage, marker: string): Promise<string> {
  let buf = ''
  return new Promise((resolve) => {
    const onData = (chunk: Buffer) => {
      buf += chunk.toString('utf-8')
      if (buf.includes(marker)) {
        res.off('data', onData)
        resolve(buf)
      }
    }
    res.on('data', onData)
  })
}

describe('SSE stream', () => {
  it('greets the client and relays broadcasts', async () => {
    const port = await start()
    const res = await new Promise<IncomingMessage>((resolve) => get(`http://127.0.0.1:${port}/api/health/sse`, resolve))

    expect(res.headers['content-type']).toBe('text/event-stream')
    const hello = await readUntil(res, '\n\n')
    expect(hello.startsWith('event: connected\ndata: {"client_id":"')).toBe(true)
    expect(getClientCount()).toBe(1)

    const next = readUntil(res, '"mode changed"}\n\n')
    broadcast('notification', { text: 'mode changed' })
    expect(await next).toBe('event: notification\ndata: {"text":"mode changed"}\n\n')

    const ended = new Promise((resolve) => res.on('end', resolve))
    closeAll()
    await ended
    expect(getClientCount()).toBe(0)
  })
})
