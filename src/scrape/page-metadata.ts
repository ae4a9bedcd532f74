/**
 * Watch page metadata extraction
 *
 * Everything that depends on YouTube's page markup lives here. Markup drift
 * shows up as null fields, which callers treat as a per-item failure.
 */

import * as cheerio from 'cheerio'

export type PageMetadata = {
	title: string | null
	channel: string | null
}

export interface PageMetadataExtractor {
	extract(html: string): PageMetadata
}

const TITLE_SUFFIX = /\s*- YouTube$/
const OWNER_CHANNEL_PATTERN = /"ownerChannelName":"((?:[^"\\]|\\.)*)"/

function nonEmpty(value: string | undefined | null): string | null {
	const trimmed = value?.trim()
	return trimmed ? trimmed : null
}

/**
 * Decode a JSON string literal body (`\"`, `&`, ...).
 */
function unescapeJsonString(raw: string): string | null {
	try {
		const parsed: unknown = JSON.parse(`"${raw}"`)
		return typeof parsed === 'string' ? parsed : null
	} catch {
		return null
	}
}

export class WatchPageExtractor implements PageMetadataExtractor {
	extract(html: string): PageMetadata {
		const $ = cheerio.load(html)
		return { title: this.extractTitle($), channel: this.extractChannel($, html) }
	}

	/**
	 * `<title>` text with entities decoded and the site suffix removed.
	 */
	private extractTitle($: cheerio.CheerioAPI): string | null {
		return nonEmpty($('title').first().text().trim().replace(TITLE_SUFFIX, ''))
	}

	/**
	 * The embedded player response names the owner channel; older markup
	 * carries it as microdata on the author span.
	 */
	private extractChannel($: cheerio.CheerioAPI, html: string): string | null {
		const match = OWNER_CHANNEL_PATTERN.exec(html)
		if (match) {
			const decoded = unescapeJsonString(match[1])
			const channel = decoded === null ? null : nonEmpty(cheerio.load(decoded, null, false).text())
			if (channel) return channel
		}
		return nonEmpty($('span[itemprop="author"] link[itemprop="name"]').attr('content'))
	}
}
