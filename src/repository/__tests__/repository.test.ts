import { existsSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'

import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { NotARepositoryError } from '#utils/errors'

import { entryBuilder } from '../../../tests/helpers/test-data-builders'
import {
	createTempRepository,
	makeTempDir,
	seedRepository,
	type TempRepository,
	writeImage,
} from '../../../tests/helpers/temp-repository'
import {
	deleteThumbnail,
	findImage,
	initRepository,
	isRepository,
	openRepository,
	reconcileRepository,
	repositoryStats,
	resolveRepository,
} from '../repository'

describe('resolveRepository', () => {
	const repositories = new Set(['/work/repo', '/home/me/thumbs'])
	const check = (dir: string) => repositories.has(dir)

	it('uses an explicit target when it is a repository', () => {
		expect(resolveRepository({ cwd: '/work', explicit: 'repo', isRepository: check })).toEqual({
			ok: true,
			root: '/work/repo',
			source: 'explicit',
		})
	})

	it('rejects an explicit target that is not a repository without falling back', () => {
		const result = resolveRepository({
			cwd: '/work/repo',
			explicit: '/tmp/nope',
			defaultRepository: '/home/me/thumbs',
			isRepository: check,
		})

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(NotARepositoryError)
			expect(result.error.message).toBe('not a repository: /tmp/nope')
		}
	})

	it('prefers the working directory over the default', () => {
		expect(
			resolveRepository({ cwd: '/work/repo', defaultRepository: '/home/me/thumbs', isRepository: check }),
		).toEqual({ ok: true, root: '/work/repo', source: 'cwd' })
	})

	it('falls back to the default repository', () => {
		expect(resolveRepository({ cwd: '/work', defaultRepository: '/home/me/thumbs', isRepository: check })).toEqual(
			{ ok: true, root: '/home/me/thumbs', source: 'default' },
		)
	})

	it('fails when neither the working directory nor the default is a repository', () => {
		const result = resolveRepository({ cwd: '/work', defaultRepository: '/elsewhere', isRepository: check })

		expect(result.ok).toBe(false)
		if (!result.ok) expect(result.error.exitCode).toBe(4)
	})
})

describe('initRepository / openRepository', () => {
	let dir: string

	beforeEach(() => {
		dir = makeTempDir('ytthumbs-init-')
	})

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true })
	})

	it('creates the marker index and both stores', () => {
		const { created, layout } = initRepository(dir)

		expect(created).toBe(true)
		expect(existsSync(layout.indexPath)).toBe(true)
		expect(existsSync(join(dir, 'longs'))).toBe(true)
		expect(existsSync(join(dir, 'shorts'))).toBe(true)
		expect(isRepository(dir)).toBe(true)
	})

	it('is idempotent and keeps existing entries', () => {
		initRepository(dir)
		const repository = openRepository(dir)
		repository.index.insertIfAbsent('AAAAAAAAAAA', 'long')
		repository.close()

		expect(initRepository(dir).created).toBe(false)

		const reopened = openRepository(dir)
		expect(reopened.index.count()).toBe(1)
		reopened.close()
	})

	it('opens without creating missing stores', () => {
		initRepository(dir)
		rmSync(join(dir, 'longs'), { recursive: true, force: true })

		const repository = openRepository(dir)
		repository.close()

		expect(existsSync(join(dir, 'longs'))).toBe(false)
	})

	it('refuses to open a directory without the marker', () => {
		expect(() => openRepository(dir)).toThrow(NotARepositoryError)
		expect(isRepository(dir)).toBe(false)
	})
})

describe('repository maintenance', () => {
	let temp: TempRepository

	beforeEach(() => {
		temp = createTempRepository()
	})

	afterEach(() => {
		temp.cleanup()
	})

	describe('repositoryStats', () => {
		it('counts downloaded entries per form regardless of scrape status', async () => {
			seedRepository(temp.repository, [
				entryBuilder('AAAAAAAAAAA').downloaded().build(),
				entryBuilder('BBBBBBBBBBB').downloaded().scraped('B', 'Beta').build(),
				entryBuilder('CCCCCCCCCCC').short().downloaded().build(),
				entryBuilder('DDDDDDDDDDD').short().build(),
			])

			const stats = await repositoryStats(temp.repository)

			// each placeholder image is "image:<11 char id>" = 17 bytes
			expect(stats).toEqual({
				long: { count: 2, bytes: 34 },
				short: { count: 1, bytes: 17 },
				total: { count: 3, bytes: 51 },
			})
		})
	})

	describe('reconcileRepository', () => {
		it('reports missing and orphaned images per form', async () => {
			seedRepository(
				temp.repository,
				[
					entryBuilder('AAAAAAAAAAA').downloaded().build(),
					entryBuilder('BBBBBBBBBBB').downloaded().build(),
					entryBuilder('CCCCCCCCCCC').build(),
					entryBuilder('DDDDDDDDDDD').short().downloaded().build(),
				],
				{ writeImages: false },
			)
			writeImage(temp.repository, { id: 'AAAAAAAAAAA', form: 'long' }, 'a')
			writeImage(temp.repository, { id: 'DDDDDDDDDDD', form: 'short' }, 'd', 'webp')
			writeImage(temp.repository, { id: 'ZZZZZZZZZZZ', form: 'short' }, 'z')
			writeFileSync(join(temp.repository.layout.stores.short, 'notes.txt'), 'ignored')

			expect(await reconcileRepository(temp.repository)).toEqual({
				long: {
					indexed: 3,
					downloaded: 2,
					files: 1,
					difference: 1,
					missing: ['BBBBBBBBBBB'],
					orphaned: [],
				},
				short: {
					indexed: 1,
					downloaded: 1,
					files: 2,
					difference: -1,
					missing: [],
					orphaned: ['ZZZZZZZZZZZ.jpg'],
				},
			})
		})
	})

	describe('findImage', () => {
		it('finds jpg and webp images and returns null when absent', async () => {
			const jpg = writeImage(temp.repository, { id: 'AAAAAAAAAAA', form: 'long' }, 'a')
			const webp = writeImage(temp.repository, { id: 'BBBBBBBBBBB', form: 'short' }, 'b', 'webp')

			expect(await findImage(temp.repository.layout, { id: 'AAAAAAAAAAA', form: 'long' })).toBe(jpg)
			expect(await findImage(temp.repository.layout, { id: 'BBBBBBBBBBB', form: 'short' })).toBe(webp)
			expect(await findImage(temp.repository.layout, { id: 'AAAAAAAAAAA', form: 'short' })).toBeNull()
		})
	})

	describe('deleteThumbnail', () => {
		it('removes the entry and its image', async () => {
			seedRepository(temp.repository, [entryBuilder('AAAAAAAAAAA').downloaded().build()])
			const image = join(temp.repository.layout.stores.long, 'AAAAAAAAAAA.jpg')

			const result = await deleteThumbnail(temp.repository, 'AAAAAAAAAAA')

			expect(result).toEqual({ id: 'AAAAAAAAAAA', deleted: true, removedFiles: [image] })
			expect(existsSync(image)).toBe(false)
			expect(temp.repository.index.has('AAAAAAAAAAA')).toBe(false)
		})

		it('reports unknown ids without touching anything', async () => {
			expect(await deleteThumbnail(temp.repository, 'ZZZZZZZZZZZ')).toEqual({
				id: 'ZZZZZZZZZZZ',
				deleted: false,
				removedFiles: [],
			})
		})
	})
})
