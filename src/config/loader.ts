/**
 * Configuration loader
 *
 * Loads config from YAML/JSON files with env var substitution and precedence
 * CLI > file > schema defaults.
 */

import { constants } from 'node:fs'
import { access, readFile } from 'node:fs/promises'
import path from 'node:path'

import yaml from 'js-yaml'

import {
	CONFIG_FILE_NAMES,
	type Config,
	type ConfigOverrides,
	detectConfigFormat,
	REPOSITORY_CONFIG_FILE_NAMES,
	validateConfig,
} from './schema.js'

/**
 * In-memory cache keyed by the resolved config file path
 */
let configCache: Config | null = null
let configCacheKey: string | null = null

async function isReadable(filePath: string): Promise<boolean> {
	try {
		await access(filePath, constants.R_OK)
		return true
	} catch {
		return false
	}
}

/**
 * Discover a config file
 *
 * Checks, in order:
 * 1. `<repositoryRoot>/.thumbnails/config.{yaml,yml,json}` when a repository is known
 * 2. `<baseDir>/ytthumbs.config.{yaml,yml,json}`
 *
 * @returns Path to the first readable config file, or null if none found
 */
export async function discoverConfigFile(
	options: { baseDir?: string; repositoryRoot?: string } = {},
): Promise<string | null> {
	const { baseDir = process.cwd(), repositoryRoot } = options
	const candidates: string[] = []

	if (repositoryRoot) {
		for (const name of REPOSITORY_CONFIG_FILE_NAMES) {
			candidates.push(path.join(repositoryRoot, '.thumbnails', name))
		}
	}
	for (const name of CONFIG_FILE_NAMES) {
		candidates.push(path.resolve(baseDir, name))
	}

	for (const candidate of candidates) {
		if (await isReadable(candidate)) {
			return candidate
		}
	}

	return null
}

/**
 * Load and parse a config file (unvalidated)
 *
 * @throws Error if file cannot be read or parsed
 */
export async function loadConfigFile(filePath: string): Promise<unknown> {
	const content = await readFile(filePath, 'utf-8')
	const format = detectConfigFormat(filePath)

	if (format === 'json') {
		try {
			return JSON.parse(content)
		} catch (error) {
			throw new Error(
				`Failed to parse JSON config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
			)
		}
	}

	try {
		// JSON_SCHEMA keeps YAML scalars to plain JSON types
		return yaml.load(content, { schema: yaml.JSON_SCHEMA })
	} catch (error) {
		throw new Error(
			`Failed to parse YAML config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
		)
	}
}

/**
 * Recursively replace ${VAR_NAME} patterns with environment variable values
 *
 * @example
 * ```typescript
 * // With process.env.YT_UA = 'curl/8'
 * substituteEnvVars({ scrape: { userAgent: '${YT_UA}' } })
 * // => { scrape: { userAgent: 'curl/8' } }
 * ```
 */
export function substituteEnvVars(obj: unknown): unknown {
	if (typeof obj === 'string') {
		return obj.replace(/\$\{(\w+)\}/g, (_match, envVar: string) => {
			const value = process.env[envVar]
			if (value === undefined) {
				throw new Error(`Environment variable ${envVar} is not set but referenced in config`)
			}
			return value
		})
	}

	if (Array.isArray(obj)) {
		return obj.map(substituteEnvVars)
	}

	if (typeof obj === 'object' && obj !== null) {
		return Object.fromEntries(Object.entries(obj).map(([key, value]) => [key, substituteEnvVars(value)]))
	}

	return obj
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Merge CLI overrides over a file config, one level deep per section.
 * Undefined override values never erase a file value.
 */
export function mergeConfig(fileConfig: unknown, overrides: ConfigOverrides = {}): Record<string, unknown> {
	const merged: Record<string, unknown> = isPlainObject(fileConfig) ? { ...fileConfig } : {}

	for (const [section, values] of Object.entries(overrides)) {
		if (!isPlainObject(values)) continue
		const defined = Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined))
		const existing = merged[section]
		merged[section] = isPlainObject(existing) ? { ...existing, ...defined } : defined
	}

	return merged
}

/**
 * Load configuration
 *
 * @example
 * ```typescript
 * const config = await loadConfig({ repositoryRoot: repo.root })
 * const config = await loadConfig({ configPath: './ytthumbs.config.yaml' })
 * const config = await loadConfig({ overrides: { download: { concurrency: 4 } } })
 * ```
 */
export async function loadConfig(
	options: {
		configPath?: string
		repositoryRoot?: string
		baseDir?: string
		overrides?: ConfigOverrides
		skipCache?: boolean
	} = {},
): Promise<Config> {
	const { configPath, repositoryRoot, baseDir, overrides = {}, skipCache = false } = options

	const filePath = configPath ?? (await discoverConfigFile({ baseDir, repositoryRoot }))
	const cacheKey = `${filePath ?? '<defaults>'}|${JSON.stringify(overrides)}`

	if (!skipCache && configCache && configCacheKey === cacheKey) {
		return configCache
	}

	let fileConfig: unknown = {}
	if (filePath) {
		try {
			fileConfig = substituteEnvVars(await loadConfigFile(filePath))
		} catch (error) {
			throw new Error(
				`Failed to load config from ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
			)
		}
	}

	const merged = mergeConfig(fileConfig ?? {}, overrides)

	try {
		const validated = validateConfig(merged)
		configCache = validated
		configCacheKey = cacheKey
		return validated
	} catch (error) {
		throw new Error(`Config validation failed: ${error instanceof Error ? error.message : String(error)}`)
	}
}

export function clearConfigCache(): void {
	configCache = null
	configCacheKey = null
}

export function isConfigCached(): boolean {
	return configCache !== null
}
