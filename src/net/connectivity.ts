/**
 * Connectivity probe
 *
 * A bounded TCP connect to the image host, run before commands that hit the
 * network. Local commands never call this.
 */

import net from 'node:net'

import { ConnectivityError } from '#utils/errors'
import { createLogger } from '#utils/logger'

const logger = createLogger('net:connectivity')

export type ProbeResult = { ok: true; elapsedMs: number } | { ok: false; reason: string }

export type ProbeTarget = {
  host: string
  port: number
  timeoutMs: number
}

export type ConnectivityProbe = (target: ProbeTarget) => Promise<ProbeResult>

export const probeTcp: ConnectivityProbe = ({ host, port, timeoutMs }) =>
  new Promise((resolve) => {
    const started = Date.now()
    const socket = net.createConnection({ host, port })
    let settled = false

    const finish = (result: ProbeResult) => {
      if (settled) return
      settled = true
      socket.destroy()
      resolve(result)
    }

    socket.setTimeout(timeoutMs)
    socket.once('connect', () => finish({ ok: true, elapsedMs: Date.now() - started }))
    socket.once('timeout', () => finish({ ok: false, reason: `timed out after ${timeoutMs}ms` }))
    socket.once('error', (error) => finish({ ok: false, reason: error.message }))
  })

/**
 * @throws ConnectivityError when the probe fails
 */
export async function assertConnectivity(target: ProbeTarget, probe: ConnectivityProbe = probeTcp): Promise<void> {
  const result = await probe(target)
  if (!result.ok) {
    logger.warn('connectivity probe failed', { ...target, reason: result.reason })
    throw ConnectivityError.fromProbe(target.host, target.port, result.reason)
  }
  logger.debug('connectivity probe ok', { ...target, elapsedMs: result.elapsedMs })
}
