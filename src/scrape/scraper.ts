/**
 * Metadata scraper
 *
 * Fetches a video's watch page and extracts its title and channel. Either
 * field can be missing on its own; only a result with both is `scraped`.
 */

import { createLogger } from '#utils/logger'

import type { HttpClient } from '../net/http.js'
import type { VideoId } from '../schema/thumbnail.js'
import { type PageMetadataExtractor, WatchPageExtractor } from './page-metadata.js'

const logger = createLogger('scrape')

export type ScrapeResult =
	| { status: 'scraped'; id: VideoId; title: string; channel: string }
	| { status: 'partial'; id: VideoId; title: string | null; channel: string | null }
	| { status: 'failed'; id: VideoId; error: string }

export interface MetadataSource {
	scrape(id: VideoId): Promise<ScrapeResult>
}

export type MetadataScraperOptions = {
	http: HttpClient
	extractor?: PageMetadataExtractor
	pageBaseUrl?: string
	timeoutMs?: number
}

export class MetadataScraper implements MetadataSource {
	private readonly http: HttpClient
	private readonly extractor: PageMetadataExtractor
	private readonly pageBaseUrl: string
	private readonly timeoutMs: number | undefined

	constructor(options: MetadataScraperOptions) {
		this.http = options.http
		this.extractor = options.extractor ?? new WatchPageExtractor()
		this.pageBaseUrl = options.pageBaseUrl ?? 'https://www.youtube.com'
		this.timeoutMs = options.timeoutMs
	}

	pageUrl(id: VideoId): string {
		return `${this.pageBaseUrl}/watch?v=${id}`
	}

	async scrape(id: VideoId): Promise<ScrapeResult> {
		const response = await this.http.get(this.pageUrl(id), {
			timeoutMs: this.timeoutMs,
			headers: { 'Accept-Language': 'en-US,en;q=0.9' },
		})

		if (!response.ok) {
			logger.debug('watch page request failed', { id, status: response.status, error: response.error })
			return { status: 'failed', id, error: response.error }
		}

		const { title, channel } = this.extractor.extract(response.body.toString('utf-8'))
		if (title !== null && channel !== null) {
			return { status: 'scraped', id, title, channel }
		}

		logger.debug('watch page metadata incomplete', { id, hasTitle: title !== null, hasChannel: channel !== null })
		return { status: 'partial', id, title, channel }
	}
}
