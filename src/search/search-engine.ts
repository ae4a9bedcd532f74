/**
 * Search and filter engine
 *
 * Candidates are downloaded, scraped entries, optionally narrowed by form and
 * by a channel set picked in a first selection step. The final selection
 * resolves to image paths or to video page URLs.
 *
 * ctrl-d in the selector deletes the marked entries and reopens the selector
 * over the refreshed list, keeping the channel choice.
 */

import { createLogger } from '#utils/logger'

import type { Repository } from '../repository/repository.js'
import { deleteThumbnail, findImage } from '../repository/repository.js'
import { type ThumbnailEntry, type VideoForm, type VideoId, videoPageUrl } from '../schema/thumbnail.js'
import type { ImageRenderer } from '../terminal/renderer.js'
import type { InteractiveSelector, SelectorItem } from '../terminal/selector.js'

const logger = createLogger('search')

export const DELETE_KEY = 'ctrl-d'

export type SearchOutput = 'path' | 'url'

export type SearchOptions = {
	form?: VideoForm
	/** Ask for a channel set before listing thumbnails */
	byChannel?: boolean
	output?: SearchOutput
	preview?: ImageRenderer | null
	pageBaseUrl?: string
}

export type SearchResult = {
	/** Absolute image paths or video URLs, in selection order */
	selected: string[]
	deleted: VideoId[]
	cancelled: boolean
}

export type SearchEngineOptions = {
	repository: Repository
	selector: InteractiveSelector
}

export class SearchEngine {
	private readonly repository: Repository
	private readonly selector: InteractiveSelector

	constructor(options: SearchEngineOptions) {
		this.repository = options.repository
		this.selector = options.selector
	}

	/**
	 * Channel pre-step. Resolves to the chosen channels, or null when the user
	 * backed out.
	 */
	async chooseChannels(form?: VideoForm): Promise<string[] | null> {
		const counts = this.repository.index.channelCounts({ form })
		if (counts.length === 0) return []

		// Channel names may hold characters the selector line format drops,
		// so items are keyed by position.
		const items: SelectorItem[] = counts.map(({ channel, count }, index) => ({
			key: String(index),
			label: `${channel} (${count})`,
		}))
		const result = await this.selector.select({ items, multi: true, prompt: 'channel> ' })
		if (result.kind !== 'accept') return null

		return result.keys.flatMap((key) => {
			const picked = counts[Number(key)]
			return picked ? [picked.channel] : []
		})
	}

	async search(options: SearchOptions = {}): Promise<SearchResult> {
		const deleted: VideoId[] = []
		let channels: string[] | undefined

		if (options.byChannel) {
			const chosen = await this.chooseChannels(options.form)
			if (chosen === null) return { selected: [], deleted, cancelled: true }
			channels = chosen
		}

		for (;;) {
			const candidates = this.repository.index.queryByFilter({ form: options.form, channels })
			if (candidates.length === 0) {
				logger.debug('no candidates', { form: options.form, channels })
				return { selected: [], deleted, cancelled: false }
			}

			const byId = new Map(candidates.map((entry) => [entry.id, entry]))
			const result = await this.selector.select({
				items: await this.toItems(candidates),
				multi: true,
				prompt: 'thumbnail> ',
				header: `enter: select  ${DELETE_KEY}: delete  ctrl-space: refresh preview`,
				actionKeys: [DELETE_KEY],
				preview: options.preview ?? null,
			})

			if (result.kind === 'cancel') {
				return { selected: [], deleted, cancelled: true }
			}

			if (result.kind === 'action') {
				for (const id of result.keys) {
					if (!byId.has(id)) continue
					const outcome = await deleteThumbnail(this.repository, id)
					if (outcome.deleted) deleted.push(id)
				}
				continue
			}

			const selected: string[] = []
			for (const id of result.keys) {
				const entry = byId.get(id)
				if (!entry) continue
				const resolved = await this.resolve(entry, options)
				if (resolved === null) {
					logger.warn('image missing for selected entry', { id })
					continue
				}
				selected.push(resolved)
			}
			return { selected, deleted, cancelled: false }
		}
	}

	private async toItems(entries: ReadonlyArray<ThumbnailEntry>): Promise<SelectorItem[]> {
		const items: SelectorItem[] = []
		for (const entry of entries) {
			items.push({
				key: entry.id,
				label: entry.title ?? entry.id,
				previewPath: (await findImage(this.repository.layout, entry)) ?? undefined,
				form: entry.form,
			})
		}
		return items
	}

	private async resolve(entry: ThumbnailEntry, options: SearchOptions): Promise<string | null> {
		if (options.output === 'url') {
			return videoPageUrl(entry.id, entry.form, options.pageBaseUrl)
		}
		return findImage(this.repository.layout, entry)
	}
}
