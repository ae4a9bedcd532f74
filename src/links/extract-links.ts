/**
 * Video link extraction
 *
 * Recognizes YouTube video references in free-form text (pasted links,
 * bookmark exports, chat logs) and classifies each by form:
 *
 * - `youtube.com/watch?...v=<id>` → long (v may sit anywhere in the query,
 *   `&amp;` separators from HTML are accepted)
 * - `youtu.be/<id>` → long
 * - `youtube.com/shorts/<id>` → short
 *
 * A short that was shared as a watch URL comes out as long; nothing here
 * resolves links over the network, so the URL shape is all there is to go on.
 */

import { isVideoId, type VideoForm, type VideoId } from '../schema/thumbnail.js'

export type ExtractedForm = VideoForm | 'unspecified'

export type VideoReference = {
	id: VideoId
	form: ExtractedForm
}

export type ExtractionMode = 'links' | 'bare-ids' | 'none'

export type ExtractionResult = {
	mode: ExtractionMode
	references: VideoReference[]
}

const ID = '([A-Za-z0-9_-]{11})(?![A-Za-z0-9_-])'

const LINK_PATTERN = new RegExp(
	[
		`youtube\\.com/shorts/${ID}`,
		`youtu\\.be/${ID}`,
		`youtube\\.com/watch\\?(?:[^\\s"'<>]*?&(?:amp;)?)?v=${ID}`,
	].join('|'),
	'g',
)

/**
 * Extract deduplicated video references, in order of first appearance.
 *
 * When the text holds no recognizable link, lines consisting of exactly one
 * bare id are returned with form `unspecified`; the caller decides their form.
 */
export function extractVideoReferences(text: string): ExtractionResult {
	const seen = new Set<VideoId>()
	const references: VideoReference[] = []

	for (const match of text.matchAll(LINK_PATTERN)) {
		const [, shortId, shortenedId, watchId] = match
		const reference: VideoReference | null = shortId
			? { id: shortId, form: 'short' }
			: shortenedId
				? { id: shortenedId, form: 'long' }
				: watchId
					? { id: watchId, form: 'long' }
					: null
		if (reference && !seen.has(reference.id)) {
			seen.add(reference.id)
			references.push(reference)
		}
	}

	if (references.length > 0) {
		return { mode: 'links', references }
	}

	for (const line of text.split(/\r?\n/)) {
		const candidate = line.trim()
		if (isVideoId(candidate) && !seen.has(candidate)) {
			seen.add(candidate)
			references.push({ id: candidate, form: 'unspecified' })
		}
	}

	return { mode: references.length > 0 ? 'bare-ids' : 'none', references }
}

/**
 * Assign a form to `unspecified` references, or split them out when no
 * default is available.
 */
export function resolveForms(
	references: ReadonlyArray<VideoReference>,
	defaultForm?: VideoForm,
): { accepted: Array<{ id: VideoId; form: VideoForm }>; rejected: VideoId[] } {
	const accepted: Array<{ id: VideoId; form: VideoForm }> = []
	const rejected: VideoId[] = []

	for (const reference of references) {
		if (reference.form !== 'unspecified') {
			accepted.push({ id: reference.id, form: reference.form })
		} else if (defaultForm) {
			accepted.push({ id: reference.id, form: defaultForm })
		} else {
			rejected.push(reference.id)
		}
	}

	return { accepted, rejected }
}
