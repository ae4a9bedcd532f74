/**
 * Exec Command (alias: download)
 *
 * Download the best available thumbnail of every indexed entry that has not
 * been downloaded and still has attempts left.
 */

import type { Command } from 'commander'
import { humanInfo, humanWarn } from '#utils/human'

import type { DownloadSummary, ItemFailure } from '../../lifecycle/orchestrator.js'
import type { CliServices } from '../services.js'
import type { DownloadOptions, GlobalOptions } from '../types.js'
import {
	createOrchestrator,
	logEvent,
	openCommandContext,
	parsePositiveInt,
	requireConnectivity,
	runCommand,
} from '../utils.js'

export function reportFailures(failures: ReadonlyArray<ItemFailure>, verbose: boolean): void {
	if (failures.length === 0) return
	humanWarn(`⚠️  ${failures.length} failed`)
	if (verbose) {
		for (const { id, error } of failures) {
			humanWarn(`   ${id}: ${error}`)
		}
	}
}

export function reportDownloadSummary(summary: DownloadSummary, verbose: boolean): void {
	if (summary.total === 0) {
		humanInfo('Nothing to download')
		return
	}
	humanInfo(`✓ Downloaded ${summary.downloaded}/${summary.total} thumbnail(s)`)
	reportFailures(summary.failed, verbose)
}

/**
 * Execute the exec command logic
 */
export async function executeDownload(
	options: DownloadOptions,
	globalOptions: GlobalOptions,
	services: CliServices,
): Promise<DownloadSummary> {
	const maxAttempts = parsePositiveInt('--max-attempts', options.maxAttempts)
	const concurrency = parsePositiveInt('--concurrency', options.concurrency)
	const context = await openCommandContext(globalOptions, services, { download: { maxAttempts, concurrency } })

	try {
		await requireConnectivity(context.config, services)
		logEvent('exec-start', {
			command: 'exec',
			phase: 'start',
			options: { maxAttempts: context.config.download.maxAttempts, concurrency: context.config.download.concurrency },
			context: { repository: context.repository.layout.root },
		})

		const summary = await createOrchestrator(context, services).download(context.progress)
		reportDownloadSummary(summary, globalOptions.verbose)

		logEvent('exec-summary', {
			command: 'exec',
			phase: 'summary',
			metrics: { total: summary.total, downloaded: summary.downloaded, failed: summary.failed.length },
			exitCode: 0,
		})
		return summary
	} finally {
		context.progress.stopAll()
		context.repository.close()
	}
}

/**
 * Register the exec command with Commander
 */
export function registerDownloadCommand(
	program: Command,
	getGlobalOptions: () => GlobalOptions,
	services: CliServices,
): void {
	program
		.command('exec')
		.alias('download')
		.description('Download thumbnails for indexed entries')
		.option('--max-attempts <n>', 'skip entries that already failed this many times')
		.option('--concurrency <n>', 'downloads in flight at once')
		.action(async (options: DownloadOptions) => {
			const globalOptions = getGlobalOptions()
			await runCommand('exec', globalOptions, services, async () => {
				await executeDownload(options, globalOptions, services)
			})
		})
}
