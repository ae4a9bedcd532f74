/**
 * Thumbnail fetcher
 *
 * Downloads one video's thumbnail at the levels a QualitySelector asks for.
 * Per-level failures come back as LevelOutcome values; the fetcher never
 * throws for a missing image.
 *
 * Files land under a temporary name and are renamed into place, so an
 * interrupted download never leaves a truncated image behind.
 */

import { randomUUID } from 'node:crypto'
import { access, mkdir, rename, rm, writeFile } from 'node:fs/promises'
import path from 'node:path'

import { createLogger } from '#utils/logger'

import type { HttpClient } from '../net/http.js'
import type { ImageExtension, QualityName, VideoId } from '../schema/thumbnail.js'
import { probeOrder, type QualitySelector, thumbnailFileName, thumbnailUrl } from './quality.js'

const logger = createLogger('fetch')

export type LevelOutcome =
	| { quality: QualityName; status: 'ok'; path: string; bytes: number }
	| { quality: QualityName; status: 'failed'; httpStatus: number | null; error: string }
	| { quality: QualityName; status: 'skipped'; path: string }

export type FetchResult =
	| {
			status: 'downloaded'
			id: VideoId
			quality: QualityName
			bytesWritten: number
			outcomes: LevelOutcome[]
	  }
	| { status: 'skipped'; id: VideoId; outcomes: LevelOutcome[] }
	| { status: 'failed'; id: VideoId; error: string; outcomes: LevelOutcome[] }

export type FetchRequest = {
	id: VideoId
	selector: QualitySelector
	directory: string
	overwrite?: boolean
}

export interface ThumbnailSource {
	fetch(request: FetchRequest): Promise<FetchResult>
}

export type ThumbnailFetcherOptions = {
	http: HttpClient
	format?: ImageExtension
	imageBaseUrl?: string
	webpBaseUrl?: string
	timeoutMs?: number
}

async function fileExists(filePath: string): Promise<boolean> {
	try {
		await access(filePath)
		return true
	} catch {
		return false
	}
}

/**
 * Write through a temp file in the same directory, then rename. The
 * directory is created when missing.
 */
export async function writeFileAtomic(filePath: string, data: Buffer): Promise<void> {
	const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${randomUUID()}.part`)
	await mkdir(path.dirname(filePath), { recursive: true })
	try {
		await writeFile(tempPath, data)
		await rename(tempPath, filePath)
	} catch (error) {
		await rm(tempPath, { force: true })
		throw error
	}
}

export class ThumbnailFetcher implements ThumbnailSource {
	private readonly http: HttpClient
	private readonly format: ImageExtension
	private readonly baseUrl: string
	private readonly timeoutMs: number | undefined

	constructor(options: ThumbnailFetcherOptions) {
		this.http = options.http
		this.format = options.format ?? 'jpg'
		this.baseUrl =
			this.format === 'webp'
				? (options.webpBaseUrl ?? 'https://i.ytimg.com/vi_webp')
				: (options.imageBaseUrl ?? 'https://img.youtube.com/vi')
		this.timeoutMs = options.timeoutMs
	}

	get extension(): ImageExtension {
		return this.format
	}

	async fetch(request: FetchRequest): Promise<FetchResult> {
		return request.selector.kind === 'all' ? this.fetchAllLevels(request) : this.fetchSingle(request)
	}

	/**
	 * Fixed level or best available: one file named by id. Levels are tried in
	 * probe order until one returns content.
	 */
	private async fetchSingle(request: FetchRequest): Promise<FetchResult> {
		const { id, selector, directory, overwrite = false } = request
		const target = path.join(directory, thumbnailFileName(id, this.format))
		const levels = probeOrder(selector)

		if (!overwrite && (await fileExists(target))) {
			logger.debug('thumbnail exists, skipping', { id, target })
			return { status: 'skipped', id, outcomes: [] }
		}

		const outcomes: LevelOutcome[] = []
		for (const quality of levels) {
			const outcome = await this.download(id, quality, target)
			outcomes.push(outcome)
			if (outcome.status === 'ok') {
				return { status: 'downloaded', id, quality, bytesWritten: outcome.bytes, outcomes }
			}
		}

		const last = outcomes.at(-1)
		const error =
			last && last.status === 'failed'
				? `no thumbnail available (${last.quality}: ${last.error})`
				: 'no thumbnail available'
		logger.debug('thumbnail fetch failed', { id, tried: levels })
		return { status: 'failed', id, error, outcomes }
	}

	/**
	 * Every level into its own `<id>-<quality>` file. Levels are independent;
	 * the achieved quality is the best level that produced a file.
	 */
	private async fetchAllLevels(request: FetchRequest): Promise<FetchResult> {
		const { id, directory, overwrite = false } = request
		const outcomes: LevelOutcome[] = []

		for (const quality of probeOrder(request.selector)) {
			const target = path.join(directory, thumbnailFileName(id, this.format, quality))
			if (!overwrite && (await fileExists(target))) {
				outcomes.push({ quality, status: 'skipped', path: target })
				continue
			}
			outcomes.push(await this.download(id, quality, target))
		}

		let best: QualityName | null = null
		let bytesWritten = 0
		for (const outcome of outcomes) {
			if (outcome.status === 'ok') {
				best = outcome.quality
				bytesWritten += outcome.bytes
			}
		}

		if (best !== null) {
			return { status: 'downloaded', id, quality: best, bytesWritten, outcomes }
		}
		if (outcomes.some((outcome) => outcome.status === 'skipped')) {
			return { status: 'skipped', id, outcomes }
		}
		return { status: 'failed', id, error: 'no level available', outcomes }
	}

	private async download(id: VideoId, quality: QualityName, target: string): Promise<LevelOutcome> {
		const url = thumbnailUrl(this.baseUrl, id, quality, this.format)
		const response = await this.http.get(url, { timeoutMs: this.timeoutMs })

		if (!response.ok) {
			return { quality, status: 'failed', httpStatus: response.status, error: response.error }
		}
		if (response.body.length === 0) {
			return { quality, status: 'failed', httpStatus: response.status, error: 'empty response' }
		}

		await writeFileAtomic(target, response.body)
		logger.debug('thumbnail written', { id, quality, bytes: response.body.length, target })
		return { quality, status: 'ok', path: target, bytes: response.body.length }
	}
}
