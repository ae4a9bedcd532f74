/**
 * Delete Command
 *
 * Remove entries and their images by id, outside of search.
 */

import type { Command } from 'commander'
import { BadArgumentError } from '#utils/errors'
import { humanInfo, humanWarn } from '#utils/human'

import { type DeleteResult, deleteThumbnail } from '../../repository/repository.js'
import { isVideoId } from '../../schema/thumbnail.js'
import type { CliServices } from '../services.js'
import type { GlobalOptions } from '../types.js'
import { logEvent, openCommandContext, runCommand } from '../utils.js'

/**
 * Execute the delete command logic
 */
export async function executeDelete(
	ids: ReadonlyArray<string>,
	globalOptions: GlobalOptions,
	services: CliServices,
): Promise<DeleteResult[]> {
	const invalid = ids.filter((id) => !isVideoId(id))
	if (invalid.length > 0) {
		throw new BadArgumentError(`invalid video id(s): ${invalid.join(', ')}`, 'Video ids are 11 characters of A-Z a-z 0-9 _ -')
	}

	const context = await openCommandContext(globalOptions, services)
	try {
		const results: DeleteResult[] = []
		for (const id of new Set(ids)) {
			const result = await deleteThumbnail(context.repository, id)
			if (result.deleted) {
				humanInfo(`✓ Deleted ${id}${result.removedFiles.length === 0 ? ' (no image on disk)' : ''}`)
			} else {
				humanWarn(`⚠️  Not indexed: ${id}`)
			}
			results.push(result)
		}

		logEvent('delete-summary', {
			command: 'delete',
			phase: 'summary',
			metrics: {
				requested: results.length,
				deleted: results.filter((result) => result.deleted).length,
			},
			context: { repository: context.repository.layout.root },
			exitCode: 0,
		})
		return results
	} finally {
		context.repository.close()
	}
}

/**
 * Register the delete command with Commander
 */
export function registerDeleteCommand(
	program: Command,
	getGlobalOptions: () => GlobalOptions,
	services: CliServices,
): void {
	program
		.command('delete')
		.description('Remove thumbnails (index entry and image) by video id')
		.argument('<ids...>', 'video ids')
		.action(async (ids: Array<string>) => {
			const globalOptions = getGlobalOptions()
			await runCommand('delete', globalOptions, services, async () => {
				await executeDelete(ids, globalOptions, services)
			})
		})
}
