import net from 'node:net'

import { describe, expect, it } from 'vitest'

import { ConnectivityError } from '#utils/errors'

import { assertConnectivity, type ProbeTarget, probeTcp } from '../connectivity'

function listen(): Promise<net.Server> {
  return new Promise((resolve) => {
    const server = net.createServer((socket) => socket.end())
    server.listen(0, '127.0.0.1', () => resolve(server))
  })
}

function close(server: net.Server): Promise<void> {
  return new Promise((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())))
}

function portOf(server: net.Server): number {
  const address = server.address()
  if (address === null || typeof address === 'string') throw new Error('server is not listening on a port')
  return address.port
}

const target: ProbeTarget = { host: 'img.youtube.com', port: 443, timeoutMs: 2000 }

describe('assertConnectivity', () => {
  it('resolves when the probe succeeds', async () => {
    await expect(assertConnectivity(target, async () => ({ ok: true, elapsedMs: 3 }))).resolves.toBeUndefined()
  })

  it('throws ConnectivityError with the probe failure', async () => {
    const error = await assertConnectivity(target, async () => ({ ok: false, reason: 'connection refused' })).catch(
      (caught: unknown) => caught,
    )

    expect(error).toBeInstanceOf(ConnectivityError)
    if (error instanceof ConnectivityError) {
      expect(error.exitCode).toBe(2)
      expect(error.message).toBe('no internet connectivity')
      expect(error.details).toBe('Probe of img.youtube.com:443 failed: connection refused')
    }
  })
})

describe('probeTcp', () => {
  it('connects to a listening socket', async () => {
    const server = await listen()
    try {
      const result = await probeTcp({ host: '127.0.0.1', port: portOf(server), timeoutMs: 2000 })
      expect(result.ok).toBe(true)
    } finally {
      await close(server)
    }
  })

  it('reports a refused connection', async () => {
    const server = await listen()
    const port = portOf(server)
    await close(server)

    const result = await probeTcp({ host: '127.0.0.1', port, timeoutMs: 2000 })

    expect(result.ok).toBe(false)
  })
})
