/**
 * ytthumbs CLI
 *
 * Main CLI entry point that registers all commands and maps Commander's own
 * failures (unknown command, bad usage) onto the tool's exit codes.
 */

import { readFileSync } from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

import { Command, CommanderError } from 'commander'
import { ExitCode, type ExitCodeValue } from '#utils/errors'
import { humanError, setHumanLoggingEnabled } from '#utils/human'
import { createLogger } from '#utils/logger'
import { z } from 'zod'

import {
	registerAbsorbCommand,
	registerAddCommand,
	registerDeleteCommand,
	registerDownloadCommand,
	registerGetCommand,
	registerGrabCommand,
	registerInitCommand,
	registerScrapeCommand,
	registerSearchCommand,
	registerStatsCommand,
	registerTroubleshootCommand,
} from './commands/index.js'
import { type CliServices, defaultServices } from './services.js'
import type { GlobalOptions } from './types.js'

const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), '../../package.json')
const packageJson = z.object({ version: z.string() }).parse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')))

const cliLogger = createLogger('cli')

/**
 * Exit code for an error Commander raised while parsing
 */
export function commanderExitCode(error: CommanderError): ExitCodeValue {
	switch (error.code) {
		case 'commander.help':
		case 'commander.helpDisplayed':
		case 'commander.version':
			return ExitCode.Success
		case 'commander.unknownCommand':
			return ExitCode.UnknownCommand
		default:
			return ExitCode.BadArgument
	}
}

/**
 * Creates and configures the main CLI program with all commands.
 */
export function createProgram(services: CliServices = defaultServices()): Command {
	const program = new Command()

	program
		.name('ytthumbs')
		.description('Curate an offline, searchable repository of YouTube thumbnails')
		.version(packageJson.version)
		.enablePositionalOptions()

	// Global options, given before the command name
	program
		.option('-r, --repository <dir>', 'repository to work on (default: current directory)')
		.option('-c, --config <path>', 'path to config file')
		.option('-v, --verbose', 'enable verbose logging', false)
		.option('-q, --quiet', 'suppress warnings and progress', false)
		.option('--json', 'emit structured JSON log events only (machine-readable)', false)
		.option('--no-progress', 'disable progress bars')

	program.hook('preAction', () => {
		const opts = program.opts<Pick<GlobalOptions, 'json'>>()
		setHumanLoggingEnabled(!opts.json)
	})

	program.configureOutput({
		outputError: (str: string, write: (msg: string) => void) => {
			write(str.replace(/^error: /, '❌ Error: '))
			cliLogger.error('Commander output error', { raw: str })
		},
	})

	// Inherited by every command registered below. Throwing keeps Commander
	// from calling process.exit itself.
	program.exitOverride((err: CommanderError) => {
		const code = commanderExitCode(err)
		if (code === ExitCode.UnknownCommand) {
			humanError(`\nRun 'ytthumbs --help' to see available commands`)
		}
		if (code !== ExitCode.Success) {
			cliLogger.error('CLI exit override error', { code: err.code, message: err.message, exitCode: code })
		}
		services.exit(code)
		throw err
	})

	const getGlobalOptions = (): GlobalOptions => program.opts<GlobalOptions>()

	registerInitCommand(program, getGlobalOptions, services)
	registerAddCommand(program, getGlobalOptions, services)
	registerDownloadCommand(program, getGlobalOptions, services)
	registerScrapeCommand(program, getGlobalOptions, services)
	registerGetCommand(program, getGlobalOptions, services)
	registerStatsCommand(program, getGlobalOptions, services)
	registerSearchCommand(program, getGlobalOptions, services)
	registerAbsorbCommand(program, getGlobalOptions, services)
	registerTroubleshootCommand(program, getGlobalOptions, services)
	registerGrabCommand(program, getGlobalOptions, services)
	registerDeleteCommand(program, getGlobalOptions, services)

	return program
}

/**
 * Parse and run one invocation. Arguments exclude the node and script paths.
 * The exit code is reported through services.exit, never thrown.
 */
export async function runCli(argv: ReadonlyArray<string>, services: CliServices = defaultServices()): Promise<void> {
	const program = createProgram(services)
	try {
		await program.parseAsync([...argv], { from: 'user' })
	} catch (error) {
		if (error instanceof CommanderError) {
			return
		}
		throw error
	}
}

/**
 * Main CLI entry point.
 */
export async function main(): Promise<void> {
	await runCli(process.argv.slice(2))
}
