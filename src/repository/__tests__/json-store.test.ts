import { readFileSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'

import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { entryBuilder, steppingClock } from '../../../tests/helpers/test-data-builders'
import { makeTempDir } from '../../../tests/helpers/temp-repository'
import { INDEX_VERSION, JsonIndexStore } from '../json-store'

describe('JsonIndexStore', () => {
	let dir: string
	let indexPath: string
	let store: JsonIndexStore

	beforeEach(() => {
		dir = makeTempDir('ytthumbs-store-')
		indexPath = join(dir, 'index.json')
		store = new JsonIndexStore(indexPath, { now: steppingClock() })
	})

	afterEach(() => {
		store.close()
		rmSync(dir, { recursive: true, force: true })
	})

	describe('insertIfAbsent', () => {
		it('creates an entry with empty status', () => {
			expect(store.insertIfAbsent('AAAAAAAAAAA', 'long')).toBe(true)

			expect(store.get('AAAAAAAAAAA')).toEqual({
				id: 'AAAAAAAAAAA',
				form: 'long',
				quality: null,
				attempts: 0,
				title: null,
				channel: null,
				indexedAt: '2024-01-01T00:00:00.000Z',
				downloadedAt: null,
				scrapedAt: null,
			})
		})

		it('is a no-op for an existing id and keeps the first form', () => {
			store.insertIfAbsent('AAAAAAAAAAA', 'long')
			store.recordAttempt('AAAAAAAAAAA')
			const before = store.get('AAAAAAAAAAA')

			expect(store.insertIfAbsent('AAAAAAAAAAA', 'short')).toBe(false)
			expect(store.get('AAAAAAAAAAA')).toEqual(before)
			expect(store.count()).toBe(1)
		})

		it('rejects values that are not video ids', () => {
			expect(() => store.insertIfAbsent('short-id', 'long')).toThrow()
		})
	})

	describe('download status', () => {
		beforeEach(() => {
			store.insertIfAbsent('AAAAAAAAAAA', 'long')
			store.insertIfAbsent('BBBBBBBBBBB', 'short')
			store.insertIfAbsent('CCCCCCCCCCC', 'long')
		})

		it('lists undownloaded entries in indexing order', () => {
			expect(store.queryUndownloaded().map((entry) => entry.id)).toEqual([
				'AAAAAAAAAAA',
				'BBBBBBBBBBB',
				'CCCCCCCCCCC',
			])
			expect(store.queryUndownloaded({ limit: 2 })).toHaveLength(2)
		})

		it('excludes entries that used up their attempts', () => {
			store.recordAttempt('AAAAAAAAAAA')

			expect(store.queryUndownloaded().map((entry) => entry.id)).toEqual(['BBBBBBBBBBB', 'CCCCCCCCCCC'])
			expect(store.queryUndownloaded({ maxAttempts: 2 }).map((entry) => entry.id)).toContain('AAAAAAAAAAA')
		})

		it('excludes downloaded entries', () => {
			store.recordAttempt('BBBBBBBBBBB')
			store.recordQuality('BBBBBBBBBBB', 'hqdefault')

			const entry = store.get('BBBBBBBBBBB')
			expect(entry?.quality).toBe('hqdefault')
			expect(entry?.attempts).toBe(1)
			expect(entry?.downloadedAt).not.toBeNull()
			expect(store.queryUndownloaded({ maxAttempts: 5 }).map((e) => e.id)).not.toContain('BBBBBBBBBBB')
		})

		it('ignores updates for absent ids', () => {
			store.recordAttempt('ZZZZZZZZZZZ')
			store.recordQuality('ZZZZZZZZZZZ', 'default')
			store.recordMetadata('ZZZZZZZZZZZ', 'title', 'channel')

			expect(store.count()).toBe(3)
			expect(store.has('ZZZZZZZZZZZ')).toBe(false)
		})
	})

	describe('scrape status', () => {
		beforeEach(() => {
			store.insertEntries([
				entryBuilder('AAAAAAAAAAA').downloaded().build(),
				entryBuilder('BBBBBBBBBBB').short().downloaded().scraped('Title B', 'Channel B').build(),
				entryBuilder('CCCCCCCCCCC').build(),
			])
		})

		it('lists downloaded entries that are not scraped', () => {
			expect(store.queryScrapeCandidates().map((entry) => entry.id)).toEqual(['AAAAAAAAAAA'])
		})

		it('sets title and channel together', () => {
			store.recordMetadata('AAAAAAAAAAA', 'Title A', 'Channel A')

			expect(store.get('AAAAAAAAAAA')).toMatchObject({ title: 'Title A', channel: 'Channel A' })
			expect(store.queryScrapeCandidates()).toEqual([])
		})
	})

	describe('queryByFilter', () => {
		beforeEach(() => {
			store.insertEntries([
				entryBuilder('AAAAAAAAAAA').downloaded().scraped('A', 'Alpha').indexedAt('2024-01-01T00:00:01.000Z').build(),
				entryBuilder('BBBBBBBBBBB').short().downloaded().scraped('B', 'Beta').indexedAt('2024-01-01T00:00:02.000Z').build(),
				entryBuilder('CCCCCCCCCCC').downloaded().scraped('C', 'Alpha').indexedAt('2024-01-01T00:00:03.000Z').build(),
				entryBuilder('DDDDDDDDDDD').downloaded().indexedAt('2024-01-01T00:00:04.000Z').build(),
				entryBuilder('EEEEEEEEEEE').indexedAt('2024-01-01T00:00:05.000Z').build(),
			])
		})

		it('returns only downloaded and scraped entries', () => {
			expect(store.queryByFilter().map((entry) => entry.id)).toEqual(['AAAAAAAAAAA', 'BBBBBBBBBBB', 'CCCCCCCCCCC'])
		})

		it('restricts by form', () => {
			expect(store.queryByFilter({ form: 'short' }).map((entry) => entry.id)).toEqual(['BBBBBBBBBBB'])
		})

		it('restricts by channel set', () => {
			expect(store.queryByFilter({ channels: ['Alpha'] }).map((entry) => entry.id)).toEqual([
				'AAAAAAAAAAA',
				'CCCCCCCCCCC',
			])
			expect(store.queryByFilter({ form: 'long', channels: ['Beta'] })).toEqual([])
			expect(store.queryByFilter({ channels: [] })).toEqual([])
		})

		it('matches channel names literally', () => {
			expect(store.queryByFilter({ channels: ["Alpha' OR '1'='1"] })).toEqual([])
		})

		it('counts channels by count then name', () => {
			expect(store.channelCounts()).toEqual([
				{ channel: 'Alpha', count: 2 },
				{ channel: 'Beta', count: 1 },
			])
			expect(store.channelCounts({ form: 'short' })).toEqual([{ channel: 'Beta', count: 1 }])
		})
	})

	describe('countsByForm', () => {
		it('reports indexed, downloaded and scraped per form', () => {
			store.insertEntries([
				entryBuilder('AAAAAAAAAAA').downloaded().scraped('A', 'Alpha').build(),
				entryBuilder('BBBBBBBBBBB').downloaded().build(),
				entryBuilder('CCCCCCCCCCC').short().build(),
			])

			expect(store.countsByForm()).toEqual({
				long: { indexed: 2, downloaded: 2, scraped: 1 },
				short: { indexed: 1, downloaded: 0, scraped: 0 },
			})
		})
	})

	describe('insertEntries', () => {
		it('copies full records and skips ids already present', () => {
			store.insertIfAbsent('AAAAAAAAAAA', 'long')
			const incoming = [
				entryBuilder('AAAAAAAAAAA').short().downloaded('default').scraped('Other', 'Other').build(),
				entryBuilder('BBBBBBBBBBB').short().attempts(3).downloaded('sddefault').scraped('B', 'Beta').build(),
			]

			expect(store.insertEntries(incoming)).toBe(1)
			expect(store.get('AAAAAAAAAAA')).toMatchObject({ form: 'long', quality: null, title: null })
			expect(store.get('BBBBBBBBBBB')).toEqual(incoming[1])
		})

		it('inserts nothing when one record in the batch is invalid', () => {
			const broken = { ...entryBuilder('CCCCCCCCCCC').build(), title: 'title without channel' }

			expect(() => store.insertEntries([entryBuilder('BBBBBBBBBBB').build(), broken])).toThrow()
			expect(store.count()).toBe(0)
		})
	})

	it('deletes entries', () => {
		store.insertIfAbsent('AAAAAAAAAAA', 'long')

		expect(store.delete('AAAAAAAAAAA')).toBe(true)
		expect(store.delete('AAAAAAAAAAA')).toBe(false)
		expect(store.count()).toBe(0)
	})

	it('reopens an existing index without losing entries', () => {
		store.insertIfAbsent('AAAAAAAAAAA', 'long')
		store.close()

		store = new JsonIndexStore(indexPath)
		expect(store.count()).toBe(1)
		expect(store.get('AAAAAAAAAAA')?.indexedAt).toBe('2024-01-01T00:00:00.000Z')
	})

	describe('index file', () => {
		it('writes every mutation through to disk', () => {
			store.insertIfAbsent('AAAAAAAAAAA', 'short')
			store.recordAttempt('AAAAAAAAAAA')

			const document = JSON.parse(readFileSync(indexPath, 'utf-8'))
			expect(document.version).toBe(INDEX_VERSION)
			expect(document.entries).toHaveLength(1)
			expect(document.entries[0]).toMatchObject({ id: 'AAAAAAAAAAA', form: 'short', attempts: 1 })
		})

		it('refuses to open a file that does not match the schema', () => {
			writeFileSync(indexPath, JSON.stringify({ version: INDEX_VERSION, entries: [{ id: 'bad' }] }))

			expect(() => new JsonIndexStore(indexPath)).toThrow(/invalid index/)
		})

		it('requires the file to exist when opened readonly', () => {
			expect(() => new JsonIndexStore(join(dir, 'missing.json'), { readonly: true })).toThrow(/not found/)
		})

		it('rejects mutations when opened readonly and leaves the file untouched', () => {
			store.insertIfAbsent('AAAAAAAAAAA', 'long')
			const before = readFileSync(indexPath, 'utf-8')
			const readonlyStore = new JsonIndexStore(indexPath, { readonly: true })

			expect(() => readonlyStore.recordAttempt('AAAAAAAAAAA')).toThrow(/readonly/)
			expect(() => readonlyStore.insertIfAbsent('BBBBBBBBBBB', 'long')).toThrow(/readonly/)
			expect(() => readonlyStore.delete('AAAAAAAAAAA')).toThrow(/readonly/)
			expect(readonlyStore.get('AAAAAAAAAAA')?.attempts).toBe(0)
			expect(readFileSync(indexPath, 'utf-8')).toBe(before)
		})
	})
})
