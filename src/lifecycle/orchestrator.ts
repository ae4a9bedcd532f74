/**
 * Lifecycle orchestrator
 *
 * Drives entries through their lifecycle:
 *
 *   indexed --download--> downloaded --scrape--> scraped
 *
 * A failed download leaves the entry indexed with one more attempt on record;
 * it is retried while attempts < maxAttempts. A failed scrape leaves the entry
 * downloaded and unscraped, so the next pass picks it up again.
 *
 * Batch passes never stop on an item failure. The attempt is recorded before
 * its fetch starts and the quality only once the file is in place, so an
 * interrupted pass leaves the index consistent.
 */

import { readFile } from 'node:fs/promises'

import { BadArgumentError, errorMessage } from '#utils/errors'
import { createLogger } from '#utils/logger'
import { mapWithConcurrency } from '#utils/pool'

import { BEST_AVAILABLE } from '../fetch/quality.js'
import type { FetchResult, ThumbnailSource } from '../fetch/thumbnail-fetcher.js'
import { type ExtractionMode, extractVideoReferences, resolveForms } from '../links/extract-links.js'
import type { ProgressSink } from '../progress/progress-manager.js'
import type { Repository } from '../repository/repository.js'
import type { VideoForm, VideoId } from '../schema/thumbnail.js'
import type { MetadataSource, ScrapeResult } from '../scrape/scraper.js'
import { LINK_BUFFER_TEMPLATE, type TextEditor } from '../terminal/editor.js'

const logger = createLogger('lifecycle')

// ============================================================================
// Types
// ============================================================================

export type LinkSource =
	| { kind: 'files'; paths: ReadonlyArray<string> }
	| { kind: 'editor'; editor: TextEditor; initial?: string }
	| { kind: 'text'; text: string }

export type IndexOptions = {
	/** Form given to bare ids; without it they are rejected */
	defaultForm?: VideoForm
}

export type IndexSummary = {
	mode: ExtractionMode
	extracted: number
	inserted: VideoId[]
	alreadyIndexed: VideoId[]
	/** Bare ids with no form to file them under */
	rejected: VideoId[]
}

export type ItemFailure = { id: VideoId; error: string }

export type DownloadSummary = {
	total: number
	downloaded: number
	failed: ItemFailure[]
}

export type ScrapeSummary = {
	total: number
	scraped: number
	failed: ItemFailure[]
}

export type GetSummary = {
	index: IndexSummary
	download: DownloadSummary
	scrape: ScrapeSummary
}

export type LifecycleOrchestratorOptions = {
	repository: Repository
	fetcher: ThumbnailSource
	scraper: MetadataSource
	/** Attempts after which an undownloaded entry is left alone (default 1) */
	maxAttempts?: number
	/** Ids in flight at once during download and scrape passes (default 1) */
	concurrency?: number
}

// ============================================================================
// Orchestrator
// ============================================================================

/**
 * Contents of link files, joined by newlines.
 * @throws BadArgumentError when a file cannot be read
 */
export async function readLinkFiles(paths: ReadonlyArray<string>): Promise<string> {
	const texts: string[] = []
	for (const filePath of paths) {
		try {
			texts.push(await readFile(filePath, 'utf-8'))
		} catch (error) {
			throw new BadArgumentError(`cannot read ${filePath}: ${errorMessage(error)}`)
		}
	}
	return texts.join('\n')
}

export async function readLinkSource(source: LinkSource): Promise<string> {
	switch (source.kind) {
		case 'text':
			return source.text
		case 'editor':
			return source.editor.edit(source.initial ?? LINK_BUFFER_TEMPLATE)
		case 'files':
			return readLinkFiles(source.paths)
	}
}

function scrapeFailure(result: Exclude<ScrapeResult, { status: 'scraped' }>): string {
	if (result.status === 'failed') return result.error
	if (result.title === null && result.channel === null) return 'title and channel not found'
	return result.title === null ? 'title not found' : 'channel not found'
}

export class LifecycleOrchestrator {
	private readonly repository: Repository
	private readonly fetcher: ThumbnailSource
	private readonly scraper: MetadataSource
	private readonly maxAttempts: number
	private readonly concurrency: number

	constructor(options: LifecycleOrchestratorOptions) {
		this.repository = options.repository
		this.fetcher = options.fetcher
		this.scraper = options.scraper
		this.maxAttempts = options.maxAttempts ?? 1
		this.concurrency = options.concurrency ?? 1
	}

	/**
	 * Extract links from the source and insert every new id. Ids already in
	 * the index keep their form and state.
	 */
	async index(source: LinkSource, options: IndexOptions = {}): Promise<IndexSummary> {
		const text = await readLinkSource(source)
		const { mode, references } = extractVideoReferences(text)
		const { accepted, rejected } = resolveForms(references, options.defaultForm)

		const inserted: VideoId[] = []
		const alreadyIndexed: VideoId[] = []
		for (const { id, form } of accepted) {
			if (this.repository.index.insertIfAbsent(id, form)) {
				inserted.push(id)
			} else {
				alreadyIndexed.push(id)
			}
		}

		logger.info('index pass finished', {
			mode,
			extracted: references.length,
			inserted: inserted.length,
			alreadyIndexed: alreadyIndexed.length,
			rejected: rejected.length,
		})
		return { mode, extracted: references.length, inserted, alreadyIndexed, rejected }
	}

	/**
	 * Fetch the best available thumbnail of every undownloaded entry into its
	 * form's store.
	 */
	async download(progress?: ProgressSink): Promise<DownloadSummary> {
		const { index, layout } = this.repository
		const pending = index.queryUndownloaded({ maxAttempts: this.maxAttempts })
		let finished = 0

		const results = await mapWithConcurrency(pending, this.concurrency, async (entry): Promise<FetchResult> => {
			index.recordAttempt(entry.id)

			let result: FetchResult
			try {
				result = await this.fetcher.fetch({
					id: entry.id,
					selector: BEST_AVAILABLE,
					directory: layout.stores[entry.form],
					overwrite: true,
				})
			} catch (error) {
				result = { status: 'failed', id: entry.id, error: errorMessage(error), outcomes: [] }
			}

			if (result.status === 'downloaded') {
				index.recordQuality(entry.id, result.quality)
			} else {
				logger.warn('download failed', { id: entry.id, status: result.status })
			}

			finished += 1
			progress?.report({ phase: 'download', current: finished, total: pending.length, id: entry.id })
			return result
		})

		const failed: ItemFailure[] = []
		let downloaded = 0
		for (const result of results) {
			if (result.status === 'downloaded') {
				downloaded += 1
			} else {
				failed.push({ id: result.id, error: result.status === 'failed' ? result.error : 'not written' })
			}
		}

		logger.info('download pass finished', { total: pending.length, downloaded, failed: failed.length })
		return { total: pending.length, downloaded, failed }
	}

	/**
	 * Scrape title and channel for downloaded, unscraped entries. Metadata is
	 * only committed when both fields were found.
	 */
	async scrape(progress?: ProgressSink): Promise<ScrapeSummary> {
		const { index } = this.repository
		const candidates = index.queryScrapeCandidates()
		let finished = 0

		const results = await mapWithConcurrency(candidates, this.concurrency, async (entry): Promise<ScrapeResult> => {
			let result: ScrapeResult
			try {
				result = await this.scraper.scrape(entry.id)
			} catch (error) {
				result = { status: 'failed', id: entry.id, error: errorMessage(error) }
			}

			if (result.status === 'scraped') {
				index.recordMetadata(entry.id, result.title, result.channel)
			} else {
				logger.warn('scrape failed', { id: entry.id, error: scrapeFailure(result) })
			}

			finished += 1
			progress?.report({ phase: 'scrape', current: finished, total: candidates.length, id: entry.id })
			return result
		})

		const failed: ItemFailure[] = []
		let scraped = 0
		for (const result of results) {
			if (result.status === 'scraped') {
				scraped += 1
			} else {
				failed.push({ id: result.id, error: scrapeFailure(result) })
			}
		}

		logger.info('scrape pass finished', { total: candidates.length, scraped, failed: failed.length })
		return { total: candidates.length, scraped, failed }
	}

	/**
	 * Index, then download, then scrape. Indexing comes first so a video is on
	 * record before it has a chance to disappear.
	 */
	async get(source: LinkSource, options: IndexOptions = {}, progress?: ProgressSink): Promise<GetSummary> {
		const indexSummary = await this.index(source, options)
		const downloadSummary = await this.download(progress)
		const scrapeSummary = await this.scrape(progress)
		return { index: indexSummary, download: downloadSummary, scrape: scrapeSummary }
	}
}
