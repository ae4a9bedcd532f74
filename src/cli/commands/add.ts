/**
 * Add Command
 *
 * Index links from files, or from an editor buffer when no file is given.
 * Nothing is downloaded; `exec` does that.
 */

import type { Command } from 'commander'
import { humanInfo, humanWarn } from '#utils/human'

import type { IndexSummary } from '../../lifecycle/orchestrator.js'
import type { CliServices } from '../services.js'
import type { AddOptions, GlobalOptions } from '../types.js'
import { createOrchestrator, linkSourceFor, logEvent, openCommandContext, parseForm, runCommand } from '../utils.js'

/**
 * Human summary of an index pass, shared with `get`
 */
export function reportIndexSummary(summary: IndexSummary): void {
	if (summary.mode === 'none') {
		humanWarn('⚠️  No YouTube links or video ids found')
		return
	}
	humanInfo(
		`✓ Indexed ${summary.inserted.length} new thumbnail(s), ${summary.alreadyIndexed.length} already indexed`,
	)
	if (summary.rejected.length > 0) {
		humanWarn(
			`⚠️  Skipped ${summary.rejected.length} bare id(s) with no form: pass --as long or --as short`,
		)
	}
}

/**
 * Execute the add command logic
 */
export async function executeAdd(
	options: AddOptions,
	globalOptions: GlobalOptions,
	services: CliServices,
): Promise<IndexSummary> {
	const defaultForm = parseForm(options.as)
	const source = await linkSourceFor(options.file, services)
	const context = await openCommandContext(globalOptions, services)

	try {
		logEvent('add-start', {
			command: 'add',
			phase: 'start',
			options: { files: options.file ?? [], as: defaultForm },
			context: { repository: context.repository.layout.root },
		})

		const summary = await createOrchestrator(context, services).index(source, { defaultForm })
		reportIndexSummary(summary)

		logEvent('add-summary', {
			command: 'add',
			phase: 'summary',
			metrics: {
				extracted: summary.extracted,
				inserted: summary.inserted.length,
				alreadyIndexed: summary.alreadyIndexed.length,
				rejected: summary.rejected.length,
			},
			exitCode: 0,
		})
		return summary
	} finally {
		context.repository.close()
	}
}

/**
 * Register the add command with Commander
 */
export function registerAddCommand(
	program: Command,
	getGlobalOptions: () => GlobalOptions,
	services: CliServices,
): void {
	program
		.command('add')
		.description('Index YouTube links from files or from your editor')
		.option('--file <paths...>', 'read links from these files instead of opening an editor')
		.option('--as <form>', 'form for files of bare video ids (long|short)')
		.action(async (options: AddOptions) => {
			const globalOptions = getGlobalOptions()
			await runCommand('add', globalOptions, services, async () => {
				await executeAdd(options, globalOptions, services)
			})
		})
}
