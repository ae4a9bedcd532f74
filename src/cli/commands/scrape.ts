/**
 * Scrape Command
 *
 * Fill in title and channel for downloaded entries that have none yet.
 */

import type { Command } from 'commander'
import { humanInfo } from '#utils/human'

import type { ScrapeSummary } from '../../lifecycle/orchestrator.js'
import type { CliServices } from '../services.js'
import type { GlobalOptions, ScrapeOptions } from '../types.js'
import {
	createOrchestrator,
	logEvent,
	openCommandContext,
	parsePositiveInt,
	requireConnectivity,
	runCommand,
} from '../utils.js'
import { reportFailures } from './download.js'

export function reportScrapeSummary(summary: ScrapeSummary, verbose: boolean): void {
	if (summary.total === 0) {
		humanInfo('Nothing to scrape')
		return
	}
	humanInfo(`✓ Scraped ${summary.scraped}/${summary.total} page(s)`)
	reportFailures(summary.failed, verbose)
}

/**
 * Execute the scrape command logic
 */
export async function executeScrape(
	options: ScrapeOptions,
	globalOptions: GlobalOptions,
	services: CliServices,
): Promise<ScrapeSummary> {
	const concurrency = parsePositiveInt('--concurrency', options.concurrency)
	const context = await openCommandContext(globalOptions, services, { download: { concurrency } })

	try {
		await requireConnectivity(context.config, services)
		logEvent('scrape-start', {
			command: 'scrape',
			phase: 'start',
			context: { repository: context.repository.layout.root },
		})

		const summary = await createOrchestrator(context, services).scrape(context.progress)
		reportScrapeSummary(summary, globalOptions.verbose)

		logEvent('scrape-summary', {
			command: 'scrape',
			phase: 'summary',
			metrics: { total: summary.total, scraped: summary.scraped, failed: summary.failed.length },
			exitCode: 0,
		})
		return summary
	} finally {
		context.progress.stopAll()
		context.repository.close()
	}
}

/**
 * Register the scrape command with Commander
 */
export function registerScrapeCommand(
	program: Command,
	getGlobalOptions: () => GlobalOptions,
	services: CliServices,
): void {
	program
		.command('scrape')
		.description('Scrape titles and channels for downloaded thumbnails')
		.option('--concurrency <n>', 'page requests in flight at once')
		.action(async (options: ScrapeOptions) => {
			const globalOptions = getGlobalOptions()
			await runCommand('scrape', globalOptions, services, async () => {
				await executeScrape(options, globalOptions, services)
			})
		})
}
