/**
 * Absorb Command
 *
 * Merge another repository into this one. Entries already here win; only
 * new ids and their images come over.
 */

import path from 'node:path'

import type { Command } from 'commander'
import { humanInfo, humanWarn } from '#utils/human'

import { type AbsorbReport, absorb } from '../../absorb/absorb.js'
import type { CliServices } from '../services.js'
import type { AbsorbOptions, GlobalOptions } from '../types.js'
import { logEvent, openCommandContext, runCommand } from '../utils.js'

export function reportAbsorb(report: AbsorbReport): void {
	const { long, short } = report.unique
	if (report.dryRun) {
		humanInfo(`Would absorb ${long} long and ${short} short thumbnail(s) from ${report.secondary}`)
		if (report.wouldDeleteSecondary) {
			humanInfo(`Would delete ${report.secondary} afterwards`)
		}
		return
	}

	humanInfo(
		`✓ Absorbed ${report.inserted} entr${report.inserted === 1 ? 'y' : 'ies'} (${long} long, ${short} short), copied ${report.copiedFiles} image(s)`,
	)
	if (report.existingFiles.length > 0) {
		humanWarn(`⚠️  Kept ${report.existingFiles.length} image(s) already present here`)
	}
	if (report.missingImages.length > 0) {
		humanWarn(`⚠️  ${report.missingImages.length} absorbed entr${report.missingImages.length === 1 ? 'y has' : 'ies have'} no image`)
	}
	if (report.secondaryDeleted) {
		humanInfo(`✓ Deleted ${report.secondary}`)
	}
}

/**
 * Execute the absorb command logic
 */
export async function executeAbsorb(
	secondary: string,
	options: AbsorbOptions,
	globalOptions: GlobalOptions,
	services: CliServices,
): Promise<AbsorbReport> {
	const context = await openCommandContext(globalOptions, services)
	const secondaryRoot = path.resolve(services.cwd(), secondary)

	try {
		logEvent('absorb-start', {
			command: 'absorb',
			phase: 'start',
			options: { secondary: secondaryRoot, dryRun: options.dryRun, delete: options.delete },
			context: { repository: context.repository.layout.root },
		})

		const report = await absorb(context.repository, secondaryRoot, {
			dryRun: options.dryRun,
			deleteSecondary: options.delete,
			confirmer: services.confirmer(options.yes),
			progress: context.progress,
		})
		reportAbsorb(report)

		logEvent('absorb-summary', {
			command: 'absorb',
			phase: 'summary',
			metrics: {
				dryRun: report.dryRun,
				uniqueLong: report.unique.long,
				uniqueShort: report.unique.short,
				inserted: report.inserted,
				copiedFiles: report.copiedFiles,
				secondaryDeleted: report.secondaryDeleted,
			},
			exitCode: 0,
		})
		return report
	} finally {
		context.progress.stopAll()
		context.repository.close()
	}
}

/**
 * Register the absorb command with Commander
 */
export function registerAbsorbCommand(
	program: Command,
	getGlobalOptions: () => GlobalOptions,
	services: CliServices,
): void {
	program
		.command('absorb')
		.description('Merge another repository into this one')
		.argument('<repository>', 'repository to absorb')
		.option('--dry-run', 'report what would be absorbed without changing anything', false)
		.option('--delete', 'delete the absorbed repository afterwards (asks first)', false)
		.option('-y, --yes', 'do not ask before deleting', false)
		.action(async (secondary: string, options: AbsorbOptions) => {
			const globalOptions = getGlobalOptions()
			await runCommand('absorb', globalOptions, services, async () => {
				await executeAbsorb(secondary, options, globalOptions, services)
			})
		})
}
