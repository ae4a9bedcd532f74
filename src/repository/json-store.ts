/**
 * JSON-file IndexStore
 *
 * The whole index lives in one zod-validated document under `.thumbnails/`.
 * Nothing is cached: every operation reads the file, and every mutation
 * rewrites it through a temp file and a rename, so a reader sees either the
 * previous index or the next one. A hand-edited file that no longer matches
 * the schema surfaces as an error on open.
 *
 * Entry values are data only: filters compare them, nothing interprets them.
 */

import { existsSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs'

import { z } from 'zod'

import { createLogger } from '#utils/logger'

import {
	isDownloaded,
	isScraped,
	type QualityName,
	type ThumbnailEntry,
	ThumbnailEntrySchema,
	type VideoForm,
	type VideoId,
} from '../schema/thumbnail.js'
import type { ChannelCount, EntryFilter, FormCounts, IndexStore } from './index-store.js'

const logger = createLogger('repository:index')

export const INDEX_VERSION = 1

const IndexFileSchema = z.object({
	version: z.literal(INDEX_VERSION),
	entries: z.array(ThumbnailEntrySchema),
})

type IndexFile = z.infer<typeof IndexFileSchema>

const EntryBatchSchema = z.array(ThumbnailEntrySchema)

export type JsonIndexStoreOptions = {
	/** ISO timestamp source, injectable for tests */
	now?: () => string
	/** Refuse every mutation; the index file must already exist */
	readonly?: boolean
}

/** Plain code-unit ordering, the same on every machine and locale */
function compareText(a: string, b: string): number {
	if (a < b) return -1
	if (a > b) return 1
	return 0
}

function byIndexingOrder(a: ThumbnailEntry, b: ThumbnailEntry): number {
	return compareText(a.indexedAt, b.indexedAt) || compareText(a.id, b.id)
}

function isSearchable(entry: ThumbnailEntry): boolean {
	return isDownloaded(entry) && isScraped(entry)
}

export class JsonIndexStore implements IndexStore {
	private readonly now: () => string
	private readonly readonly: boolean

	constructor(
		readonly filePath: string,
		options: JsonIndexStoreOptions = {},
	) {
		this.now = options.now ?? (() => new Date().toISOString())
		this.readonly = options.readonly ?? false

		if (existsSync(filePath)) {
			this.load()
		} else if (this.readonly) {
			throw new Error(`index file not found: ${filePath}`)
		} else {
			this.persist(new Map())
			logger.debug('index created', { filePath, version: INDEX_VERSION })
		}
	}

	private load(): Map<VideoId, ThumbnailEntry> {
		const raw: unknown = JSON.parse(readFileSync(this.filePath, 'utf-8'))
		const parsed = IndexFileSchema.safeParse(raw)
		if (!parsed.success) {
			const issue = parsed.error.issues[0]
			throw new Error(`invalid index ${this.filePath}: ${issue.path.join('.')}: ${issue.message}`)
		}
		const entries = new Map<VideoId, ThumbnailEntry>()
		for (const entry of parsed.data.entries) {
			if (!entries.has(entry.id)) {
				entries.set(entry.id, entry)
			}
		}
		return entries
	}

	private assertWritable(): void {
		if (this.readonly) {
			throw new Error(`index opened readonly: ${this.filePath}`)
		}
	}

	private persist(entries: Map<VideoId, ThumbnailEntry>): void {
		const document: IndexFile = { version: INDEX_VERSION, entries: [...entries.values()] }
		const tempPath = `${this.filePath}.tmp`
		try {
			writeFileSync(tempPath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8')
			renameSync(tempPath, this.filePath)
		} catch (error) {
			rmSync(tempPath, { force: true })
			throw error
		}
	}

	/** Apply a change to one existing entry and write the index; absent ids are ignored */
	private update(id: VideoId, change: (entry: ThumbnailEntry) => ThumbnailEntry): void {
		this.assertWritable()
		const entries = this.load()
		const entry = entries.get(id)
		if (!entry) return
		entries.set(id, change(entry))
		this.persist(entries)
	}

	private sorted(predicate: (entry: ThumbnailEntry) => boolean): ThumbnailEntry[] {
		return [...this.load().values()].filter(predicate).sort(byIndexingOrder)
	}

	insertIfAbsent(id: VideoId, form: VideoForm): boolean {
		this.assertWritable()
		const entries = this.load()
		if (entries.has(id)) return false
		const entry = ThumbnailEntrySchema.parse({
			id,
			form,
			quality: null,
			attempts: 0,
			title: null,
			channel: null,
			indexedAt: this.now(),
			downloadedAt: null,
			scrapedAt: null,
		})
		entries.set(id, entry)
		this.persist(entries)
		return true
	}

	get(id: VideoId): ThumbnailEntry | null {
		return this.load().get(id) ?? null
	}

	has(id: VideoId): boolean {
		return this.load().has(id)
	}

	all(): ThumbnailEntry[] {
		return this.sorted(() => true)
	}

	count(): number {
		return this.load().size
	}

	queryUndownloaded(options: { limit?: number; maxAttempts?: number } = {}): ThumbnailEntry[] {
		const { limit, maxAttempts = 1 } = options
		const pending = this.sorted((entry) => !isDownloaded(entry) && entry.attempts < maxAttempts)
		return limit === undefined || limit < 0 ? pending : pending.slice(0, limit)
	}

	recordAttempt(id: VideoId): void {
		this.update(id, (entry) => ({ ...entry, attempts: entry.attempts + 1 }))
	}

	recordQuality(id: VideoId, quality: QualityName): void {
		this.update(id, (entry) => ({ ...entry, quality, downloadedAt: this.now() }))
	}

	queryScrapeCandidates(): ThumbnailEntry[] {
		return this.sorted((entry) => isDownloaded(entry) && !isScraped(entry))
	}

	recordMetadata(id: VideoId, title: string, channel: string): void {
		this.update(id, (entry) => ({ ...entry, title, channel, scrapedAt: this.now() }))
	}

	queryByFilter(filter: EntryFilter = {}): ThumbnailEntry[] {
		const channels = filter.channels ? new Set(filter.channels) : null
		if (channels && channels.size === 0) return []

		return this.sorted(
			(entry) =>
				isSearchable(entry) &&
				(filter.form === undefined || entry.form === filter.form) &&
				(channels === null || (entry.channel !== null && channels.has(entry.channel))),
		)
	}

	channelCounts(filter: Omit<EntryFilter, 'channels'> = {}): ChannelCount[] {
		const counts = new Map<string, number>()
		for (const entry of this.load().values()) {
			if (!isSearchable(entry) || entry.channel === null) continue
			if (filter.form !== undefined && entry.form !== filter.form) continue
			counts.set(entry.channel, (counts.get(entry.channel) ?? 0) + 1)
		}
		return [...counts]
			.map(([channel, count]) => ({ channel, count }))
			.sort((a, b) => b.count - a.count || compareText(a.channel, b.channel))
	}

	countsByForm(): Record<VideoForm, FormCounts> {
		const counts: Record<VideoForm, FormCounts> = {
			long: { indexed: 0, downloaded: 0, scraped: 0 },
			short: { indexed: 0, downloaded: 0, scraped: 0 },
		}
		for (const entry of this.load().values()) {
			const form = counts[entry.form]
			form.indexed += 1
			if (isDownloaded(entry)) form.downloaded += 1
			if (isSearchable(entry)) form.scraped += 1
		}
		return counts
	}

	delete(id: VideoId): boolean {
		this.assertWritable()
		const entries = this.load()
		if (!entries.delete(id)) return false
		this.persist(entries)
		return true
	}

	insertEntries(entries: ReadonlyArray<ThumbnailEntry>): number {
		this.assertWritable()
		// Validate the whole batch before touching the index
		const batch = EntryBatchSchema.parse(entries)
		const current = this.load()
		let inserted = 0
		for (const entry of batch) {
			if (current.has(entry.id)) continue
			current.set(entry.id, entry)
			inserted += 1
		}
		if (inserted > 0) this.persist(current)
		return inserted
	}

	close(): void {
		// Every mutation is already on disk; nothing is held open
		logger.debug('index closed', { filePath: this.filePath })
	}
}
