/**
 * Troubleshoot Command
 *
 * Compare the index against the image stores. A non-zero DIFFERENCE means
 * files were removed by hand or a download was interrupted; desync is
 * reported, never treated as an error.
 */

import type { Command } from 'commander'
import { formatTable, humanResult } from '#utils/human'

import { type Reconciliation, reconcileRepository } from '../../repository/repository.js'
import type { CliServices } from '../services.js'
import type { GlobalOptions } from '../types.js'
import { logEvent, openCommandContext, runCommand } from '../utils.js'

export function formatReconciliation(reconciliation: Reconciliation, verbose: boolean): string {
	const { long, short } = reconciliation
	const lines = [
		formatTable([
			['', 'INDEXED', 'DOWNLOADED', 'FILES', 'DIFFERENCE'],
			['LONGS', long.indexed, long.downloaded, long.files, long.difference],
			['SHORTS', short.indexed, short.downloaded, short.files, short.difference],
		]),
	]

	if (verbose) {
		for (const [label, form] of [
			['longs', long],
			['shorts', short],
		] as const) {
			for (const id of form.missing) lines.push(`missing in ${label}: ${id}`)
			for (const name of form.orphaned) lines.push(`not indexed in ${label}: ${name}`)
		}
	}
	return lines.join('\n')
}

/**
 * Execute the troubleshoot command logic
 */
export async function executeTroubleshoot(globalOptions: GlobalOptions, services: CliServices): Promise<Reconciliation> {
	const context = await openCommandContext(globalOptions, services)
	try {
		const reconciliation = await reconcileRepository(context.repository)
		humanResult(
			globalOptions.json ? JSON.stringify(reconciliation) : formatReconciliation(reconciliation, globalOptions.verbose),
		)

		logEvent('troubleshoot-summary', {
			command: 'troubleshoot',
			phase: 'summary',
			metrics: {
				longDifference: reconciliation.long.difference,
				shortDifference: reconciliation.short.difference,
			},
			context: { repository: context.repository.layout.root },
			exitCode: 0,
		})
		return reconciliation
	} finally {
		context.repository.close()
	}
}

/**
 * Register the troubleshoot command with Commander
 */
export function registerTroubleshootCommand(
	program: Command,
	getGlobalOptions: () => GlobalOptions,
	services: CliServices,
): void {
	program
		.command('troubleshoot')
		.description('Check the index against the image files on disk')
		.action(async () => {
			const globalOptions = getGlobalOptions()
			await runCommand('troubleshoot', globalOptions, services, async () => {
				await executeTroubleshoot(globalOptions, services)
			})
		})
}
