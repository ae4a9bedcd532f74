/**
 * Absorb: merge a secondary repository into a primary one
 *
 * Ids are the only key. Entries the primary already has are never touched;
 * the rest are copied as full records in one transaction, then their images
 * are copied without overwriting anything in the primary's stores.
 */

import { constants, existsSync, realpathSync } from 'node:fs'
import { copyFile, mkdir, readdir, rm, rmdir } from 'node:fs/promises'

import { BadArgumentError } from '#utils/errors'
import { createLogger } from '#utils/logger'

import type { ProgressSink } from '../progress/progress-manager.js'
import { imagePath, isRepository, openRepository, type Repository } from '../repository/repository.js'
import { IMAGE_EXTENSIONS, type ThumbnailEntry, type VideoForm, type VideoId } from '../schema/thumbnail.js'
import type { Confirmer } from '../terminal/confirm.js'

const logger = createLogger('absorb')

export type AbsorbOptions = {
	dryRun?: boolean
	/** Remove the secondary once merged; asks the confirmer first */
	deleteSecondary?: boolean
	confirmer?: Confirmer
	progress?: ProgressSink
}

export type AbsorbReport = {
	dryRun: boolean
	primary: string
	secondary: string
	/** Secondary ids absent from primary, per form */
	unique: Record<VideoForm, number>
	inserted: number
	copiedFiles: number
	/** Images that already existed in primary and were left alone */
	existingFiles: string[]
	/** Unique ids with no image in the secondary's store */
	missingImages: VideoId[]
	secondaryDeleted: boolean
	/** Dry run only: whether a real run would remove the secondary */
	wouldDeleteSecondary: boolean
}

function isAlreadyExists(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'EEXIST'
}

/**
 * @throws BadArgumentError when the secondary is not a repository or is the
 * primary itself
 */
export function assertAbsorbable(primary: Repository, secondaryRoot: string): void {
	if (!isRepository(secondaryRoot)) {
		throw new BadArgumentError(`not a repository: ${secondaryRoot}`, 'absorb takes the path of another repository')
	}
	if (realpathSync(primary.layout.root) === realpathSync(secondaryRoot)) {
		throw new BadArgumentError('cannot absorb a repository into itself')
	}
}

async function removeRepository(secondary: Repository): Promise<void> {
	const { layout } = secondary
	secondary.close()
	await rm(layout.markerDir, { recursive: true, force: true })
	await rm(layout.stores.long, { recursive: true, force: true })
	await rm(layout.stores.short, { recursive: true, force: true })
	if ((await readdir(layout.root)).length === 0) {
		await rmdir(layout.root)
	}
}

export async function absorb(
	primary: Repository,
	secondaryRoot: string,
	options: AbsorbOptions = {},
): Promise<AbsorbReport> {
	assertAbsorbable(primary, secondaryRoot)

	const dryRun = options.dryRun ?? false
	const deleteSecondary = options.deleteSecondary ?? false
	const secondary = openRepository(secondaryRoot, { readonly: true })

	try {
		const unique: ThumbnailEntry[] = secondary.index.all().filter((entry) => !primary.index.has(entry.id))
		const report: AbsorbReport = {
			dryRun,
			primary: primary.layout.root,
			secondary: secondary.layout.root,
			unique: {
				long: unique.filter((entry) => entry.form === 'long').length,
				short: unique.filter((entry) => entry.form === 'short').length,
			},
			inserted: 0,
			copiedFiles: 0,
			existingFiles: [],
			missingImages: [],
			secondaryDeleted: false,
			wouldDeleteSecondary: dryRun && deleteSecondary,
		}

		if (dryRun) {
			logger.info('absorb dry run', { secondary: report.secondary, unique: report.unique })
			return report
		}

		report.inserted = primary.index.insertEntries(unique)

		let finished = 0
		for (const entry of unique) {
			let found = false
			for (const ext of IMAGE_EXTENSIONS) {
				const source = imagePath(secondary.layout, entry.form, entry.id, ext)
				if (!existsSync(source)) continue
				found = true
				const target = imagePath(primary.layout, entry.form, entry.id, ext)
				await mkdir(primary.layout.stores[entry.form], { recursive: true })
				try {
					await copyFile(source, target, constants.COPYFILE_EXCL)
					report.copiedFiles += 1
				} catch (error) {
					if (!isAlreadyExists(error)) throw error
					report.existingFiles.push(target)
				}
			}
			if (!found && entry.quality !== null) {
				report.missingImages.push(entry.id)
			}
			finished += 1
			options.progress?.report({ phase: 'absorb', current: finished, total: unique.length, id: entry.id })
		}

		logger.info('absorb finished', {
			secondary: report.secondary,
			inserted: report.inserted,
			copiedFiles: report.copiedFiles,
		})

		if (deleteSecondary) {
			const confirmed = options.confirmer
				? await options.confirmer.confirm(`Delete the absorbed repository at ${report.secondary}?`)
				: false
			if (confirmed) {
				await removeRepository(secondary)
				report.secondaryDeleted = true
				logger.info('secondary repository deleted', { secondary: report.secondary })
			}
		}

		return report
	} finally {
		secondary.close()
	}
}
