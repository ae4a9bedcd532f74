/**
 * Grab Command
 *
 * Standalone bulk download: every video linked from a file, into a plain
 * directory, without a repository or index.
 */

import { mkdir } from 'node:fs/promises'
import path from 'node:path'

import type { Command } from 'commander'
import { BadArgumentError, errorMessage } from '#utils/errors'
import { humanInfo, humanWarn } from '#utils/human'
import { mapWithConcurrency } from '#utils/pool'

import { describeSelector, type QualitySelector, selectorFromFlags } from '../../fetch/quality.js'
import { type FetchResult, ThumbnailFetcher } from '../../fetch/thumbnail-fetcher.js'
import { type ItemFailure, readLinkFiles } from '../../lifecycle/orchestrator.js'
import { extractVideoReferences } from '../../links/extract-links.js'
import { isQualityLevel, type QualityLevel } from '../../schema/thumbnail.js'
import type { CliServices } from '../services.js'
import type { GlobalOptions, GrabOptions } from '../types.js'
import { loadCommandConfig, logEvent, requireConnectivity, runCommand } from '../utils.js'
import { reportFailures } from './download.js'

export type GrabSummary = {
	selector: QualitySelector
	directory: string
	total: number
	downloaded: number
	skipped: number
	failed: ItemFailure[]
}

/**
 * @throws BadArgumentError unless the value is 1 to 5
 */
export function parseQualityOption(value: string | undefined): QualityLevel | undefined {
	if (value === undefined) return undefined
	const level = Number(value)
	if (!isQualityLevel(level)) {
		throw new BadArgumentError(`quality must be a level from 1 to 5, got "${value}"`)
	}
	return level
}

/**
 * Execute the grab command logic
 */
export async function executeGrab(
	file: string,
	options: GrabOptions,
	globalOptions: GlobalOptions,
	services: CliServices,
): Promise<GrabSummary> {
	const selector = selectorFromFlags({
		all: options.all,
		best: options.best,
		level: parseQualityOption(options.quality),
	})
	const cwd = services.cwd()
	const directory = path.resolve(cwd, options.output ?? '.')
	const config = await loadCommandConfig(globalOptions, services)
	const { references } = extractVideoReferences(await readLinkFiles([path.resolve(cwd, file)]))

	const summary: GrabSummary = { selector, directory, total: references.length, downloaded: 0, skipped: 0, failed: [] }
	if (references.length === 0) {
		humanWarn('⚠️  No YouTube links or video ids found')
		return summary
	}

	await requireConnectivity(config, services)
	await mkdir(directory, { recursive: true })
	logEvent('grab-start', {
		command: 'grab',
		phase: 'start',
		options: { file, selector: describeSelector(selector), directory, force: options.force },
	})

	const fetcher = new ThumbnailFetcher({
		http: services.http(config),
		format: config.download.format,
		imageBaseUrl: config.network.imageBaseUrl,
		webpBaseUrl: config.network.webpBaseUrl,
		timeoutMs: config.download.timeoutMs,
	})

	let finished = 0
	const results = await mapWithConcurrency(references, config.download.concurrency, async ({ id }) => {
		let result: FetchResult
		try {
			result = await fetcher.fetch({ id, selector, directory, overwrite: options.force })
		} catch (error) {
			result = { status: 'failed', id, error: errorMessage(error), outcomes: [] }
		}
		finished += 1
		if (options.count) {
			humanInfo(`[${finished}/${references.length}] ${id} ${result.status}`)
		}
		return result
	})

	for (const result of results) {
		if (result.status === 'downloaded') summary.downloaded += 1
		else if (result.status === 'skipped') summary.skipped += 1
		else summary.failed.push({ id: result.id, error: result.error })
	}

	humanInfo(
		`✓ Grabbed ${summary.downloaded}/${summary.total} thumbnail(s) (${describeSelector(selector)}) into ${directory}` +
			(summary.skipped > 0 ? `, ${summary.skipped} already present` : ''),
	)
	reportFailures(summary.failed, globalOptions.verbose)

	logEvent('grab-summary', {
		command: 'grab',
		phase: 'summary',
		metrics: {
			total: summary.total,
			downloaded: summary.downloaded,
			skipped: summary.skipped,
			failed: summary.failed.length,
		},
		exitCode: 0,
	})
	return summary
}

/**
 * Register the grab command with Commander
 */
export function registerGrabCommand(
	program: Command,
	getGlobalOptions: () => GlobalOptions,
	services: CliServices,
): void {
	program
		.command('grab')
		.description('Download thumbnails for the links in a file, no repository needed')
		.argument('<file>', 'file of links (or of bare video ids, one per line)')
		.option('-q, --quality <level>', 'quality level 1 (lowest) to 5 (highest)')
		.option('-b, --best', 'best available quality', false)
		.option('-a, --all', 'every quality level, one file each', false)
		.option('-f, --force', 'overwrite existing files', false)
		.option('-c, --count', 'print each thumbnail as it finishes', false)
		.option('-o, --output <dir>', 'output directory (default: current directory)')
		.action(async (file: string, options: GrabOptions) => {
			const globalOptions = getGlobalOptions()
			await runCommand('grab', globalOptions, services, async () => {
				await executeGrab(file, options, globalOptions, services)
			})
		})
}
