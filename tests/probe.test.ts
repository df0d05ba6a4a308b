import { describe, it, expect, afterEach } from 'vitest'
import { readFileSync } from 'node:fs'
import { createServer } from 'node:http'
import { createServer as createHttpsServer } from 'node:https'
import { createServer as createTcpServer, type Server } from 'node:net'
import { probe } from '../scripts/monitoring/probe.js'

// http.Server extends net.Server
const open: Server[] = []

function listen(server: Server): Promise<number> {
  open.push(server)
  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const addr = server.address()
      resolve(typeof addr === 'object' && addr ? addr.port : 0)
    })
  })
}

function close(server: Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()))
}

afterEach(async () => {
  await Promise.all(open.splice(0).filter((s) => s.listening).map(close))
})

function httpServer(status: number): Server {
  return createServer((_req, res) => {
    res.statusCode = status
    res.end('ok')
  })
}

describe('probe over HTTP', () => {
  it('counts a 200 as reachable', async () => {
    const port = await listen(httpServer(200))
    const result = await probe(`http://127.0.0.1:${port}/health`, 2000)
    expect(result.reachable).toBe(true)
    expect(result.error).toBeUndefined()
    expect(result.latencyMs).toBeGreaterThanOrEqual(0)
  })

  it('counts any 2xx as reachable', async () => {
    const port = await listen(createServer((_req, res) => {
      res.statusCode = 204
      res.end()
    }))
    expect((await probe(`http://127.0.0.1:${port}/`, 2000)).reachable).toBe(true)
  })

  it('reports a 404 as unreachable with the status code', async () => {
    const port = await listen(httpServer(404))
    const result = await probe(`http://127.0.0.1:${port}/missing`, 2000)
    expect(result.reachable).toBe(false)
    expect(result.error).toBe('HTTP 404')
  })

  it('rejects a malformed URL without dialing', async () => {
    const result = await probe('http://', 2000)
    expect(result.reachable).toBe(false)
    expect(result.latencyMs).toBe(0)
    expect(result.error).toMatch(/^invalid URL: /)
  })
})

// self-signed, CN=localhost
const tls = {
  key: readFileSync(new URL('./fixtures/self-signed.key', import.meta.url)),
  cert: readFileSync(new URL('./fixtures/self-signed.crt', import.meta.url)),
}

function httpsServer(status: number): Server {
  return createHttpsServer(tls, (_req, res) => {
    res.statusCode = status
    res.end('ok')
  })
}

describe('probe over HTTPS', () => {
  it('accepts a self-signed certificate', async () => {
    const port = await listen(httpsServer(200))
    const result = await probe(`https://127.0.0.1:${port}/health`, 2000)
    expect(result).toEqual({ reachable: true, latencyMs: result.latencyMs })
  })

  it('reports a 404 as unreachable with the status code', async () => {
    const port = await listen(httpsServer(404))
    const result = await probe(`https://127.0.0.1:${port}/missing`, 2000)
    expect(result).toEqual({ reachable: false, latencyMs: result.latencyMs, error: 'HTTP 404' })
  })

  it('does not read a large body', async () => {
    const chunk = Buffer.alloc(64 * 1024, 'x')
    let written = 0
    const port = await listen(createHttpsServer(tls, (_req, res) => {
      res.statusCode = 200
      const pump = () => {
        while (written < 64 * 1024 * 1024) {
          written += chunk.length
          if (!res.write(chunk)) {
            res.once('drain', pump)
            return
          }
        }
        res.end()
      }
      res.on('close', () => res.off('drain', pump))
      pump()
    }))
    const result = await probe(`https://127.0.0.1:${port}/big`, 5000)
    expect(result.reachable).toBe(true)
    expect(written).toBeLessThan(64 * 1024 * 1024)
  })
})

describe('probe over TCP', () => {
  it('is reachable when the port accepts', async () => {
    const port = await listen(createTcpServer((socket) => socket.end()))
    const result = await probe(`tcp://127.0.0.1:${port}`, 2000)
    expect(result).toEqual({ reachable: true, latencyMs: result.latencyMs })
  })

  it('is unreachable when nothing listens', async () => {
    const server = createTcpServer()
    const port = await listen(server)
    await close(server)

    const result = await probe(`tcp://127.0.0.1:${port}`, 2000)
    expect(result.reachable).toBe(false)
    expect(result.error).toMatch(/^connection failed: /)
  })

  it('returns a result for an out-of-range port instead of throwing', async () => {
    expect(await probe('tcp://127.0.0.1:70000', 500)).toEqual({
      reachable: false,
      latencyMs: 0,
      error: 'connection failed: address 127.0.0.1:70000: invalid port 70000',
    })
    expect((await probe('tcp://127.0.0.1:0', 500)).error).toBe('connection failed: address 127.0.0.1:0: invalid port 0')
  })

  it('fails fast when the port is missing', async () => {
    expect(await probe('tcp://db.internal', 2000)).toEqual({
      reachable: false,
      latencyMs: 0,
      error: 'connection failed: address db.internal: missing port',
    })
  })
})
