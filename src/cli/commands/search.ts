/**
 * Search Command
 *
 * Fuzzy-find thumbnails by title, optionally by channel first, and print the
 * chosen image paths (or video URLs) on stdout, one per line.
 */

import type { Command } from 'commander'
import { BadArgumentError } from '#utils/errors'
import { humanResult } from '#utils/human'

import type { VideoForm } from '../../schema/thumbnail.js'
import { SearchEngine, type SearchOutput, type SearchResult } from '../../search/search-engine.js'
import { requireExecutables } from '../../terminal/process.js'
import { ChafaRenderer } from '../../terminal/renderer.js'
import type { CliServices } from '../services.js'
import type { GlobalOptions, SearchOptions } from '../types.js'
import { logEvent, openCommandContext, runCommand } from '../utils.js'

function formFromFlags(options: SearchOptions): VideoForm | undefined {
	if (options.long && options.short) {
		throw new BadArgumentError('--long and --short cannot be combined')
	}
	return options.long ? 'long' : options.short ? 'short' : undefined
}

function outputFromFlags(options: SearchOptions, fallback: SearchOutput): SearchOutput {
	if (options.url && options.path) {
		throw new BadArgumentError('--url and --path cannot be combined')
	}
	return options.url ? 'url' : options.path ? 'path' : fallback
}

/**
 * Execute the search command logic
 */
export async function executeSearch(
	options: SearchOptions,
	globalOptions: GlobalOptions,
	services: CliServices,
): Promise<SearchResult> {
	const form = formFromFlags(options)
	const context = await openCommandContext(globalOptions, services)

	try {
		const output = outputFromFlags(options, context.config.search.output)
		const preview = (options.preview ?? context.config.search.preview) ? new ChafaRenderer({ cropShorts: true }) : null
		await requireExecutables(['fzf', ...(preview?.requiredExecutables() ?? [])], services.locate)

		logEvent('search-start', {
			command: 'search',
			phase: 'start',
			options: { form, byChannel: options.channel ?? false, output, preview: preview !== null },
		})

		const engine = new SearchEngine({ repository: context.repository, selector: services.selector() })
		const result = await engine.search({
			form,
			byChannel: options.channel ?? false,
			output,
			preview,
			pageBaseUrl: context.config.network.pageBaseUrl,
		})
		for (const line of result.selected) {
			humanResult(line)
		}

		logEvent('search-summary', {
			command: 'search',
			phase: 'summary',
			metrics: { selected: result.selected.length, deleted: result.deleted.length, cancelled: result.cancelled },
			exitCode: 0,
		})
		return result
	} finally {
		context.repository.close()
	}
}

/**
 * Register the search command with Commander
 */
export function registerSearchCommand(
	program: Command,
	getGlobalOptions: () => GlobalOptions,
	services: CliServices,
): void {
	program
		.command('search')
		.description('Pick thumbnails interactively and print their paths (ctrl-d deletes)')
		.option('--long', 'only long-form videos')
		.option('--short', 'only shorts')
		.option('--channel', 'choose channels first')
		.option('--url', 'print video URLs instead of image paths')
		.option('--path', 'print image paths (overrides search.output)')
		.option('--preview', 'render image previews (overrides search.preview)')
		.option('--no-preview', 'disable image previews')
		.action(async (options: SearchOptions) => {
			const globalOptions = getGlobalOptions()
			await runCommand('search', globalOptions, services, async () => {
				await executeSearch(options, globalOptions, services)
			})
		})
}
