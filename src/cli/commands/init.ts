/**
 * Init Command
 *
 * Create a repository in the working directory (or the -r target), and
 * optionally a starter config file inside its marker directory.
 */

import path from 'node:path'

import type { Command } from 'commander'
import { BadArgumentError } from '#utils/errors'
import { humanInfo, humanWarn } from '#utils/human'

import { generateConfigFile, getDefaultConfigPath } from '../../config/generator.js'
import { initRepository } from '../../repository/repository.js'
import type { CliServices } from '../services.js'
import type { GlobalOptions, InitOptions } from '../types.js'
import { logEvent, runCommand } from '../utils.js'

/**
 * Execute the init command logic
 */
export async function executeInit(
	options: InitOptions,
	globalOptions: GlobalOptions,
	services: CliServices,
): Promise<void> {
	const { withConfig, format, force } = options
	if (format !== 'json' && format !== 'yaml') {
		throw new BadArgumentError(`invalid config format: ${format}`, 'Supported formats: yaml, json')
	}

	const root = path.resolve(services.cwd(), globalOptions.repository ?? '.')
	logEvent('init-start', { command: 'init', phase: 'start', options: { root, withConfig, format, force } })

	const { created, layout } = initRepository(root)
	humanInfo(created ? `✓ Initialized repository in ${layout.root}` : `Repository already initialized: ${layout.root}`)

	let configPath: string | undefined
	if (withConfig) {
		const result = await generateConfigFile({ filePath: getDefaultConfigPath(layout.root, format), format, force })
		if (result.success) {
			configPath = result.filePath
			humanInfo(`✓ ${result.message}`)
		} else {
			humanWarn(`⚠️  ${result.message} (use --force to overwrite)`)
		}
	}

	logEvent('init-summary', {
		command: 'init',
		phase: 'summary',
		metrics: { created, configWritten: configPath !== undefined },
		context: { root: layout.root, configPath },
		exitCode: 0,
	})
}

/**
 * Register the init command with Commander
 */
export function registerInitCommand(
	program: Command,
	getGlobalOptions: () => GlobalOptions,
	services: CliServices,
): void {
	program
		.command('init')
		.description('Create a thumbnail repository here (or at -r <dir>)')
		.option('--with-config', 'also write a starter config file', false)
		.option('-f, --format <type>', 'config file format (yaml|json)', 'yaml')
		.option('--force', 'overwrite an existing config file', false)
		.action(async (options: InitOptions) => {
			const globalOptions = getGlobalOptions()
			await runCommand('init', globalOptions, services, () => executeInit(options, globalOptions, services))
		})
}
