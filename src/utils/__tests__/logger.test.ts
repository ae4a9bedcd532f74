import { beforeEach, describe, expect, it } from 'vitest'

import type { LogEntry } from '#utils/logger'

import {
  clearSinks,
  createLogger,
  getCorrelationId,
  getLogLevel,
  registerSink,
  setLogLevel,
  withCorrelationId,
} from '#utils/logger'

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

describe('logger', () => {
  let entries: Array<LogEntry>

  beforeEach(() => {
    entries = []
    clearSinks()
    setLogLevel('debug')
    registerSink((e) => entries.push(e))
  })

  describe('custom sink', () => {
    it('forwards log entries to registered sinks', () => {
      const logger = createLogger('fetch')
      logger.info('thumbnail written', { id: 'AAAAAAAAAAA', bytes: 17 })

      expect(entries).toHaveLength(1)
      expect(entries[0]?.component).toBe('fetch')
      expect(entries[0]?.level).toBe('info')
      expect(entries[0]?.msg).toBe('thumbnail written')
      expect(entries[0]?.context).toEqual({ id: 'AAAAAAAAAAA', bytes: 17 })
      expect(entries[0]?.pid).toBe(process.pid)
    })

    it('numbers entries in emission order', () => {
      const logger = createLogger('repository')
      logger.debug('first')
      logger.warn('second')

      const [first, second] = entries
      expect(second && first ? second.seq - first.seq : 0).toBe(1)
    })
  })

  describe('levels', () => {
    it('drops entries below the active level', () => {
      setLogLevel('warn')
      const logger = createLogger('cli')
      logger.debug('hidden')
      logger.info('hidden too')
      logger.warn('shown')
      logger.error('shown too')

      expect(getLogLevel()).toBe('warn')
      expect(entries.map((entry) => entry.msg)).toEqual(['shown', 'shown too'])
    })
  })

  describe('correlationId', () => {
    it('does not include correlationId by default', () => {
      createLogger('cli').info('hello')

      expect(entries).toHaveLength(1)
      expect(entries[0]?.correlationId).toBeUndefined()
    })

    it('withCorrelationId sets and restores correlationId', async () => {
      const logger = createLogger('lifecycle')

      await withCorrelationId('run-1', async () => {
        logger.info('inside')
        expect(getCorrelationId()).toBe('run-1')
      })
      logger.info('outside')

      const [inside, outside] = entries
      expect(inside?.correlationId).toBe('run-1')
      expect(outside?.correlationId).toBeUndefined()
      expect(getCorrelationId()).toBeUndefined()
    })

    it('isolates correlationId across concurrent async contexts', async () => {
      const logger = createLogger('lifecycle')

      await Promise.all([
        withCorrelationId('download', async () => {
          logger.info('download-1')
          await delay(5)
          logger.info('download-2')
        }),
        withCorrelationId('scrape', async () => {
          await delay(1)
          logger.info('scrape-1')
          await delay(1)
          logger.info('scrape-2')
        }),
      ])

      const byMessage = new Map(entries.map((entry) => [entry.msg, entry.correlationId]))
      expect(byMessage.get('download-1')).toBe('download')
      expect(byMessage.get('download-2')).toBe('download')
      expect(byMessage.get('scrape-1')).toBe('scrape')
      expect(byMessage.get('scrape-2')).toBe('scrape')
    })
  })
})
