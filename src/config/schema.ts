/**
 * Configuration schema for the thumbnail repository tools
 *
 * Supports JSON and YAML config files validated with Zod. Every key has a
 * default, so an absent config file yields a fully populated Config.
 */

import { z } from 'zod'

/**
 * Download pass: attempt budget, worker pool size, image format and the
 * bounds of each HTTP request.
 */
const DownloadConfigSchema = z.object({
	maxAttempts: z.number().int().min(1).default(1),
	concurrency: z.number().int().min(1).max(16).default(1),
	format: z.enum(['jpg', 'webp']).default('jpg'),
	timeoutMs: z.number().int().min(100).default(15000),
	maxRetries: z.number().int().min(0).max(10).default(2),
	requestDelayMs: z.number().int().min(0).default(0),
})

const ScrapeConfigSchema = z.object({
	timeoutMs: z.number().int().min(100).default(15000),
	userAgent: z.string().min(1).default('Mozilla/5.0 (X11; Linux x86_64) ytthumbs'),
})

/**
 * Endpoints and the connectivity probe target
 */
const NetworkConfigSchema = z.object({
	connectivityHost: z.string().min(1).default('img.youtube.com'),
	connectivityPort: z.number().int().min(1).max(65535).default(443),
	connectivityTimeoutMs: z.number().int().min(100).default(2000),
	imageBaseUrl: z.string().url().default('https://img.youtube.com/vi'),
	webpBaseUrl: z.string().url().default('https://i.ytimg.com/vi_webp'),
	pageBaseUrl: z.string().url().default('https://www.youtube.com'),
})

const SearchConfigSchema = z.object({
	output: z.enum(['path', 'url']).default('path'),
	preview: z.boolean().default(true),
})

export const ConfigSchema = z.object({
	version: z.string().default('1.0'),
	download: DownloadConfigSchema.default({}),
	scrape: ScrapeConfigSchema.default({}),
	network: NetworkConfigSchema.default({}),
	search: SearchConfigSchema.default({}),
})

export type Config = z.output<typeof ConfigSchema>

/**
 * Per-section partial overrides, as assembled from CLI flags
 */
export type ConfigOverrides = {
	[Section in Exclude<keyof Config, 'version'>]?: Partial<Config[Section]>
}

/**
 * Validate config, applying defaults
 *
 * @throws ZodError with field paths and expected types
 */
export function validateConfig(config: unknown): Config {
	return ConfigSchema.parse(config)
}

/**
 * Validate config and return result with detailed errors
 */
export function validateConfigSafe(config: unknown): {
	success: boolean
	data?: Config
	errors?: Array<{ path: string; message: string }>
} {
	const result = ConfigSchema.safeParse(config)

	if (result.success) {
		return { success: true, data: result.data }
	}

	return {
		success: false,
		errors: result.error.errors.map((err) => ({
			path: err.path.join('.'),
			message: err.message,
		})),
	}
}

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({})

/**
 * Config file names, checked in order in each discovery directory
 */
export const CONFIG_FILE_NAMES = ['ytthumbs.config.yaml', 'ytthumbs.config.yml', 'ytthumbs.config.json'] as const

/**
 * Config file names inside a repository's `.thumbnails/` marker directory
 */
export const REPOSITORY_CONFIG_FILE_NAMES = ['config.yaml', 'config.yml', 'config.json'] as const

export type ConfigFormat = 'json' | 'yaml'

/**
 * Detect config file format from file extension
 */
export function detectConfigFormat(filePath: string): ConfigFormat {
	if (filePath.endsWith('.json')) {
		return 'json'
	}
	if (filePath.endsWith('.yaml') || filePath.endsWith('.yml')) {
		return 'yaml'
	}

	throw new Error(`Unsupported config file format: ${filePath}. Supported formats: .json, .yaml, .yml`)
}
