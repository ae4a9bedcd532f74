/**
 * Quality selection for thumbnail downloads
 */

import {
	type ImageExtension,
	QUALITY_LADDER,
	type QualityLevel,
	type QualityName,
	qualityForLevel,
} from '../schema/thumbnail.js'

export type QualitySelector = { kind: 'fixed'; level: QualityLevel } | { kind: 'best' } | { kind: 'all' }

export const BEST_AVAILABLE: QualitySelector = { kind: 'best' }

/**
 * Build a selector from grab-style flags. All levels beats best, best beats
 * a fixed level; with no flag the lowest level is used since it always exists.
 */
export function selectorFromFlags(flags: { all?: boolean; best?: boolean; level?: QualityLevel }): QualitySelector {
	if (flags.all) return { kind: 'all' }
	if (flags.best) return { kind: 'best' }
	return { kind: 'fixed', level: flags.level ?? 1 }
}

/**
 * Order in which levels are requested for a selector.
 */
export function probeOrder(selector: QualitySelector): QualityName[] {
	switch (selector.kind) {
		case 'fixed':
			return [qualityForLevel(selector.level)]
		case 'best':
			return [...QUALITY_LADDER].reverse()
		case 'all':
			return [...QUALITY_LADDER]
	}
}

export function describeSelector(selector: QualitySelector): string {
	switch (selector.kind) {
		case 'fixed':
			return `${qualityForLevel(selector.level)} (level ${selector.level})`
		case 'best':
			return 'best available'
		case 'all':
			return 'all levels'
	}
}

export function thumbnailFileName(id: string, ext: ImageExtension, quality?: QualityName): string {
	return quality ? `${id}-${quality}.${ext}` : `${id}.${ext}`
}

export function thumbnailUrl(baseUrl: string, id: string, quality: QualityName, ext: ImageExtension): string {
	return `${baseUrl}/${id}/${quality}.${ext}`
}
