/**
 * Test Data Builders
 *
 * Fluent builder for thumbnail entries, and a deterministic clock for the
 * index timestamps.
 */

import type { QualityName, ThumbnailEntry, VideoForm } from '../../src/schema/thumbnail'

// ============================================================================
// Entry Builder
// ============================================================================

/**
 * @example
 * const entry = entryBuilder('AAAAAAAAAAA').short().downloaded('hqdefault').scraped('Title', 'Channel').build()
 */
export class EntryBuilder {
  private entry: ThumbnailEntry

  constructor(id: string) {
    this.entry = {
      id,
      form: 'long',
      quality: null,
      attempts: 0,
      title: null,
      channel: null,
      indexedAt: '2024-01-01T00:00:00.000Z',
      downloadedAt: null,
      scrapedAt: null,
    }
  }

  form(form: VideoForm): this {
    this.entry.form = form
    return this
  }

  short(): this {
    return this.form('short')
  }

  attempts(count: number): this {
    this.entry.attempts = count
    return this
  }

  /** Mark downloaded; counts one attempt unless attempts were set already */
  downloaded(quality: QualityName = 'maxresdefault'): this {
    this.entry.quality = quality
    this.entry.attempts = Math.max(this.entry.attempts, 1)
    this.entry.downloadedAt = '2024-01-01T00:01:00.000Z'
    return this
  }

  scraped(title: string, channel: string): this {
    this.entry.title = title
    this.entry.channel = channel
    this.entry.scrapedAt = '2024-01-01T00:02:00.000Z'
    return this
  }

  indexedAt(timestamp: string): this {
    this.entry.indexedAt = timestamp
    return this
  }

  build(): ThumbnailEntry {
    return { ...this.entry }
  }
}

export function entryBuilder(id: string): EntryBuilder {
  return new EntryBuilder(id)
}

// ============================================================================
// Clock
// ============================================================================

/**
 * ISO timestamps advancing by stepMs on every call
 */
export function steppingClock(start = '2024-01-01T00:00:00.000Z', stepMs = 1000): () => string {
  let current = Date.parse(start)
  return () => {
    const value = new Date(current).toISOString()
    current += stepMs
    return value
  }
}
