/**
 * Stats Command
 *
 * Downloaded thumbnails and store size per form. Works offline.
 */

import type { Command } from 'commander'
import { formatBytes, formatTable, humanResult } from '#utils/human'

import { type RepositoryStats, repositoryStats } from '../../repository/repository.js'
import type { CliServices } from '../services.js'
import type { GlobalOptions } from '../types.js'
import { logEvent, openCommandContext, runCommand } from '../utils.js'

export function formatStatsTable(stats: RepositoryStats): string {
	return formatTable([
		['', 'COUNT', 'SIZE'],
		['LONGS', stats.long.count, formatBytes(stats.long.bytes)],
		['SHORTS', stats.short.count, formatBytes(stats.short.bytes)],
		['TOTAL', stats.total.count, formatBytes(stats.total.bytes)],
	])
}

/**
 * Execute the stats command logic
 */
export async function executeStats(globalOptions: GlobalOptions, services: CliServices): Promise<RepositoryStats> {
	const context = await openCommandContext(globalOptions, services)
	try {
		const stats = await repositoryStats(context.repository)
		humanResult(globalOptions.json ? JSON.stringify(stats) : formatStatsTable(stats))

		logEvent('stats-summary', {
			command: 'stats',
			phase: 'summary',
			metrics: stats,
			context: { repository: context.repository.layout.root },
			exitCode: 0,
		})
		return stats
	} finally {
		context.repository.close()
	}
}

/**
 * Register the stats command with Commander
 */
export function registerStatsCommand(
	program: Command,
	getGlobalOptions: () => GlobalOptions,
	services: CliServices,
): void {
	program
		.command('stats')
		.description('Show thumbnail counts and disk usage per form')
		.action(async () => {
			const globalOptions = getGlobalOptions()
			await runCommand('stats', globalOptions, services, async () => {
				await executeStats(globalOptions, services)
			})
		})
}
