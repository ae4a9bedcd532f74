/**
 * IndexStore: the only writer of thumbnail entries
 *
 * Operations are synchronous and each one is atomic. Queries over derived
 * status:
 *
 * - undownloaded: quality is null and attempts < maxAttempts
 * - scrape candidates: downloaded and not scraped
 * - filter: downloaded and scraped, optionally by form and channel set
 */

import type { QualityName, ThumbnailEntry, VideoForm, VideoId } from '../schema/thumbnail.js'

export type EntryFilter = {
	form?: VideoForm
	/** Restrict to these channels; an empty list matches nothing */
	channels?: ReadonlyArray<string>
}

export type FormCounts = {
	indexed: number
	downloaded: number
	scraped: number
}

export type ChannelCount = {
	channel: string
	count: number
}

export interface IndexStore {
	insertIfAbsent(id: VideoId, form: VideoForm): boolean
	get(id: VideoId): ThumbnailEntry | null
	has(id: VideoId): boolean
	all(): ThumbnailEntry[]
	count(): number

	queryUndownloaded(options?: { limit?: number; maxAttempts?: number }): ThumbnailEntry[]
	recordAttempt(id: VideoId): void
	recordQuality(id: VideoId, quality: QualityName): void

	queryScrapeCandidates(): ThumbnailEntry[]
	recordMetadata(id: VideoId, title: string, channel: string): void

	queryByFilter(filter?: EntryFilter): ThumbnailEntry[]
	channelCounts(filter?: Omit<EntryFilter, 'channels'>): ChannelCount[]
	countsByForm(): Record<VideoForm, FormCounts>

	delete(id: VideoId): boolean

	/**
	 * Copy full records in one transaction; ids already present are left
	 * untouched. Returns the number inserted.
	 */
	insertEntries(entries: ReadonlyArray<ThumbnailEntry>): number

	close(): void
}
