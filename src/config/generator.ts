/**
 * Starter config generator
 *
 * Writes a commented config file populated with the schema defaults, either
 * as YAML (default) or JSON.
 */

import { constants } from 'node:fs'
import { access, mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'

import yaml from 'js-yaml'

import { type ConfigFormat, DEFAULT_CONFIG } from './schema.js'

const YAML_HEADER = `# ytthumbs configuration
#
# download.maxAttempts    attempts per video before it is no longer retried
# download.concurrency    parallel downloads (1 = one video at a time)
# download.format         jpg (img.youtube.com) or webp (i.ytimg.com)
# network.*               endpoints and the connectivity probe target
# search.output           print image paths (path) or video URLs (url)
#
# String values may reference environment variables as \${NAME}.

`

export function getDefaultConfigPath(repositoryRoot: string, format: ConfigFormat = 'yaml'): string {
	return path.join(repositoryRoot, '.thumbnails', format === 'json' ? 'config.json' : 'config.yaml')
}

export async function configFileExists(filePath: string): Promise<boolean> {
	try {
		await access(filePath, constants.F_OK)
		return true
	} catch {
		return false
	}
}

export function generateConfigContent(format: ConfigFormat): string {
	if (format === 'json') {
		return `${JSON.stringify(DEFAULT_CONFIG, null, 2)}\n`
	}
	return YAML_HEADER + yaml.dump(DEFAULT_CONFIG, { lineWidth: 100 })
}

export type GenerateConfigResult = {
	success: boolean
	filePath: string
	message: string
}

export async function generateConfigFile(options: {
	filePath: string
	format: ConfigFormat
	force?: boolean
}): Promise<GenerateConfigResult> {
	const { filePath, format, force = false } = options

	if (!force && (await configFileExists(filePath))) {
		return { success: false, filePath, message: `Config file already exists: ${filePath}` }
	}

	await mkdir(path.dirname(filePath), { recursive: true })
	await writeFile(filePath, generateConfigContent(format), 'utf-8')
	return { success: true, filePath, message: `Created config file: ${filePath}` }
}
