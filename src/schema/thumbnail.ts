// src/schema/thumbnail.ts
import { z } from 'zod'

// ============================================================================
// Type Aliases
// ============================================================================

export type VideoId = string

export const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]{11}$/

export function isVideoId(value: string): boolean {
	return VIDEO_ID_PATTERN.test(value)
}

// ============================================================================
// Form and quality ladder
// ============================================================================

export const VIDEO_FORMS = ['long', 'short'] as const
export type VideoForm = (typeof VIDEO_FORMS)[number]

/**
 * Worst to best. Level n (1-based) is QUALITY_LADDER[n - 1].
 */
export const QUALITY_LADDER = ['default', 'mqdefault', 'hqdefault', 'sddefault', 'maxresdefault'] as const
export type QualityName = (typeof QUALITY_LADDER)[number]
export type QualityLevel = 1 | 2 | 3 | 4 | 5

export const IMAGE_EXTENSIONS = ['jpg', 'webp'] as const
export type ImageExtension = (typeof IMAGE_EXTENSIONS)[number]

export function qualityForLevel(level: QualityLevel): QualityName {
	return QUALITY_LADDER[level - 1]
}

export function isQualityLevel(value: number): value is QualityLevel {
	return Number.isInteger(value) && value >= 1 && value <= QUALITY_LADDER.length
}

export function isVideoForm(value: string): value is VideoForm {
	return value === 'long' || value === 'short'
}

// ============================================================================
// Thumbnail entry
// ============================================================================

export type ThumbnailEntry = {
	id: VideoId
	form: VideoForm
	quality: QualityName | null
	attempts: number
	title: string | null
	channel: string | null
	indexedAt: string // ISO 8601
	downloadedAt: string | null
	scrapedAt: string | null
}

export const ThumbnailEntrySchema: z.ZodType<ThumbnailEntry> = z
	.object({
		id: z.string().regex(VIDEO_ID_PATTERN, 'id must be an 11 character video id'),
		form: z.enum(VIDEO_FORMS),
		quality: z.enum(QUALITY_LADDER).nullable(),
		attempts: z.number().int().min(0),
		title: z.string().nullable(),
		channel: z.string().nullable(),
		indexedAt: z.string().min(1),
		downloadedAt: z.string().nullable(),
		scrapedAt: z.string().nullable(),
	})
	.superRefine((entry, ctx) => {
		if ((entry.title === null) !== (entry.channel === null)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['channel'],
				message: 'title and channel must be set together',
			})
		}
	})

export function isDownloaded(entry: Pick<ThumbnailEntry, 'quality'>): boolean {
	return entry.quality !== null
}

export function isScraped(entry: Pick<ThumbnailEntry, 'title' | 'channel'>): boolean {
	return entry.title !== null && entry.channel !== null
}

// ============================================================================
// Canonical URLs
// ============================================================================

export function videoPageUrl(id: VideoId, form: VideoForm, baseUrl = 'https://www.youtube.com'): string {
	return form === 'short' ? `${baseUrl}/shorts/${id}` : `${baseUrl}/watch?v=${id}`
}
