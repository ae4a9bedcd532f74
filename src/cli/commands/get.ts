/**
 * Get Command
 *
 * add, exec and scrape in one run. Links are indexed before anything is
 * downloaded, so a video that goes away mid-run is still on record.
 */

import type { Command } from 'commander'

import type { GetSummary } from '../../lifecycle/orchestrator.js'
import type { CliServices } from '../services.js'
import type { GetOptions, GlobalOptions } from '../types.js'
import {
	createOrchestrator,
	linkSourceFor,
	logEvent,
	openCommandContext,
	parseForm,
	parsePositiveInt,
	requireConnectivity,
	runCommand,
} from '../utils.js'
import { reportIndexSummary } from './add.js'
import { reportDownloadSummary } from './download.js'
import { reportScrapeSummary } from './scrape.js'

/**
 * Execute the get command logic
 */
export async function executeGet(
	options: GetOptions,
	globalOptions: GlobalOptions,
	services: CliServices,
): Promise<GetSummary> {
	const defaultForm = parseForm(options.as)
	const maxAttempts = parsePositiveInt('--max-attempts', options.maxAttempts)
	const concurrency = parsePositiveInt('--concurrency', options.concurrency)
	const source = await linkSourceFor(options.file, services)
	const context = await openCommandContext(globalOptions, services, { download: { maxAttempts, concurrency } })

	try {
		await requireConnectivity(context.config, services)
		logEvent('get-start', {
			command: 'get',
			phase: 'start',
			options: { files: options.file ?? [], as: defaultForm },
			context: { repository: context.repository.layout.root },
		})

		const summary = await createOrchestrator(context, services).get(source, { defaultForm }, context.progress)
		reportIndexSummary(summary.index)
		reportDownloadSummary(summary.download, globalOptions.verbose)
		reportScrapeSummary(summary.scrape, globalOptions.verbose)

		logEvent('get-summary', {
			command: 'get',
			phase: 'summary',
			metrics: {
				inserted: summary.index.inserted.length,
				downloaded: summary.download.downloaded,
				downloadFailed: summary.download.failed.length,
				scraped: summary.scrape.scraped,
				scrapeFailed: summary.scrape.failed.length,
			},
			exitCode: 0,
		})
		return summary
	} finally {
		context.progress.stopAll()
		context.repository.close()
	}
}

/**
 * Register the get command with Commander
 */
export function registerGetCommand(
	program: Command,
	getGlobalOptions: () => GlobalOptions,
	services: CliServices,
): void {
	program
		.command('get')
		.description('Index links, download their thumbnails and scrape their metadata')
		.option('--file <paths...>', 'read links from these files instead of opening an editor')
		.option('--as <form>', 'form for files of bare video ids (long|short)')
		.option('--max-attempts <n>', 'skip entries that already failed this many times')
		.option('--concurrency <n>', 'requests in flight at once')
		.action(async (options: GetOptions) => {
			const globalOptions = getGlobalOptions()
			await runCommand('get', globalOptions, services, async () => {
				await executeGet(options, globalOptions, services)
			})
		})
}
