/**
 * CLI Utility Functions
 *
 * Shared utilities for CLI command handling: log levels, structured events,
 * repository and config resolution, and the error-to-exit-code mapping every
 * command action goes through.
 */

import { randomUUID } from 'node:crypto'
import path from 'node:path'

import {
	BadArgumentError,
	ExitCode,
	type ExitCodeValue,
	errorMessage,
	exitCodeFor,
	ThumbnailRepoError,
} from '#utils/errors'
import { humanError, humanWarn, setHumanWarningsEnabled } from '#utils/human'
import { createLogger, setLogLevel, withCorrelationId } from '#utils/logger'

import { loadConfig } from '../config/loader.js'
import type { Config, ConfigOverrides } from '../config/schema.js'
import { ThumbnailFetcher } from '../fetch/thumbnail-fetcher.js'
import { type LinkSource, LifecycleOrchestrator, readLinkFiles } from '../lifecycle/orchestrator.js'
import { assertConnectivity } from '../net/connectivity.js'
import { ProgressManager } from '../progress/progress-manager.js'
import { openRepository, type Repository, type RepositorySource, resolveRepository } from '../repository/repository.js'
import { isVideoForm, type VideoForm } from '../schema/thumbnail.js'
import { MetadataScraper } from '../scrape/scraper.js'
import type { CliServices } from './services.js'
import type { CLILogMeta, GlobalOptions } from './types.js'

export const DEFAULT_REPOSITORY_ENV = 'DEFAULT_YOUTUBE_THUMBNAIL_REPOSITORY'

/**
 * CLI Logger instance
 */
export const cliLogger = createLogger('cli')

/**
 * Apply log level based on verbose/quiet/json flags. Log lines go to stderr,
 * so the default stays at warn to keep interactive runs readable.
 */
export function applyLogLevel(globalOptions: Pick<GlobalOptions, 'verbose' | 'quiet' | 'json'>): void {
	const { verbose, quiet, json } = globalOptions
	const level = quiet ? 'error' : verbose ? 'debug' : json ? 'info' : 'warn'
	setLogLevel(level)
	setHumanWarningsEnabled(!quiet)
}

/**
 * Emit structured CLI events for logging
 */
export function logEvent(event: string, meta: CLILogMeta): void {
	cliLogger.info(event, meta)
}

/**
 * Format an error for CLI logging
 */
export function formatErrorMeta(error: unknown): CLILogMeta['error'] {
	return {
		type: error instanceof Error ? error.name : 'Unknown',
		message: errorMessage(error),
		...(error instanceof Error && error.stack ? { stack: error.stack } : {}),
	}
}

// ============================================================================
// Option parsing
// ============================================================================

/**
 * Parse a positive integer option value.
 * @throws BadArgumentError
 */
export function parsePositiveInt(name: string, value: string | undefined): number | undefined {
	if (value === undefined) return undefined
	const parsed = Number(value)
	if (!Number.isInteger(parsed) || parsed < 1) {
		throw new BadArgumentError(`${name} must be a positive integer, got "${value}"`)
	}
	return parsed
}

// ============================================================================
// Command context
// ============================================================================

export type CommandContext = {
	repository: Repository
	source: RepositorySource
	config: Config
	/** Progress bars on stderr, silent under --quiet, --json or --no-progress */
	progress: ProgressManager
}

export async function loadCommandConfig(
	globalOptions: GlobalOptions,
	services: CliServices,
	options: { repositoryRoot?: string; overrides?: ConfigOverrides } = {},
): Promise<Config> {
	try {
		return await loadConfig({
			configPath: globalOptions.config ? path.resolve(services.cwd(), globalOptions.config) : undefined,
			repositoryRoot: options.repositoryRoot,
			baseDir: services.cwd(),
			overrides: options.overrides,
			skipCache: true,
		})
	} catch (error) {
		throw new BadArgumentError(errorMessage(error), 'Fix the configuration file or pass another with --config')
	}
}

export function createProgress(globalOptions: GlobalOptions): ProgressManager {
	return new ProgressManager({ quiet: !globalOptions.progress || globalOptions.quiet || globalOptions.json })
}

/**
 * Resolve the repository the command works on, open it and load its config.
 * Callers close the repository when done.
 *
 * @throws NotARepositoryError when nothing resolves
 */
export async function openCommandContext(
	globalOptions: GlobalOptions,
	services: CliServices,
	overrides?: ConfigOverrides,
): Promise<CommandContext> {
	const resolution = resolveRepository({
		cwd: services.cwd(),
		explicit: globalOptions.repository,
		defaultRepository: services.env[DEFAULT_REPOSITORY_ENV],
	})
	if (!resolution.ok) {
		throw resolution.error
	}
	if (resolution.source === 'default') {
		humanWarn(`⚠️  using default repository: ${resolution.root}`)
	}

	const config = await loadCommandConfig(globalOptions, services, { repositoryRoot: resolution.root, overrides })
	const repository = openRepository(resolution.root)
	cliLogger.debug('repository opened', { root: resolution.root, source: resolution.source })
	return { repository, source: resolution.source, config, progress: createProgress(globalOptions) }
}

export function createOrchestrator(context: CommandContext, services: CliServices): LifecycleOrchestrator {
	const { config, repository } = context
	const http = services.http(config)
	return new LifecycleOrchestrator({
		repository,
		fetcher: new ThumbnailFetcher({
			http,
			format: config.download.format,
			imageBaseUrl: config.network.imageBaseUrl,
			webpBaseUrl: config.network.webpBaseUrl,
			timeoutMs: config.download.timeoutMs,
		}),
		scraper: new MetadataScraper({
			http,
			pageBaseUrl: config.network.pageBaseUrl,
			timeoutMs: config.scrape.timeoutMs,
		}),
		maxAttempts: config.download.maxAttempts,
		concurrency: config.download.concurrency,
	})
}

/**
 * Link text from --file paths, or from the user's editor when none are given.
 * Files are read here, so a bad path fails before any repository work or
 * network probe; the editor only opens once the command gets to indexing.
 * @throws BadArgumentError when a file cannot be read
 */
export async function linkSourceFor(
	files: ReadonlyArray<string> | undefined,
	services: CliServices,
): Promise<LinkSource> {
	if (files && files.length > 0) {
		const text = await readLinkFiles(files.map((file) => path.resolve(services.cwd(), file)))
		return { kind: 'text', text }
	}
	return { kind: 'editor', editor: services.editor() }
}

/**
 * @throws BadArgumentError for anything but long or short
 */
export function parseForm(value: string | undefined): VideoForm | undefined {
	if (value === undefined) return undefined
	if (!isVideoForm(value)) {
		throw new BadArgumentError(`invalid form: ${value}`, 'Use --as long or --as short')
	}
	return value
}

/**
 * Gate for commands that go out to the network.
 * @throws ConnectivityError
 */
export async function requireConnectivity(config: Config, services: CliServices): Promise<void> {
	await assertConnectivity(
		{
			host: config.network.connectivityHost,
			port: config.network.connectivityPort,
			timeoutMs: config.network.connectivityTimeoutMs,
		},
		services.probe,
	)
}

// ============================================================================
// Action wrapper
// ============================================================================

/**
 * Run a command body and turn its outcome into an exit code: 0 on success,
 * the error's own code for known failures, 6 for anything else. Every log
 * entry of the run carries one correlation id, `<command>-<8 hex digits>`.
 */
export async function runCommand(
	command: string,
	globalOptions: GlobalOptions,
	services: CliServices,
	body: () => Promise<void>,
): Promise<ExitCodeValue> {
	applyLogLevel(globalOptions)
	let code: ExitCodeValue = ExitCode.Success
	await withCorrelationId(`${command}-${randomUUID().slice(0, 8)}`, async () => {
		try {
			await body()
		} catch (error) {
			code = exitCodeFor(error)
			humanError(`❌ ${errorMessage(error)}`)
			if (error instanceof ThumbnailRepoError && error.details) {
				humanError(`   ${error.details}`)
			}
			if (globalOptions.verbose && error instanceof Error && error.stack) {
				humanError(error.stack)
			}
			logEvent(`${command}-error`, {
				command,
				phase: 'error',
				error: formatErrorMeta(error),
				exitCode: code,
			})
		}
	})
	services.exit(code)
	return code
}
