import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'

import yaml from 'js-yaml'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { generateConfigContent, generateConfigFile, getDefaultConfigPath } from '../generator'
import { DEFAULT_CONFIG, validateConfig } from '../schema'

describe('Config generator', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'ytthumbs-generator-'))
  })

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true })
  })

  it('places the config inside the marker directory', () => {
    expect(getDefaultConfigPath('/repo')).toBe(path.join('/repo', '.thumbnails', 'config.yaml'))
    expect(getDefaultConfigPath('/repo', 'json')).toBe(path.join('/repo', '.thumbnails', 'config.json'))
  })

  it('generates YAML that parses back to the defaults', () => {
    const content = generateConfigContent('yaml')

    expect(content.startsWith('# ytthumbs configuration\n')).toBe(true)
    expect(validateConfig(yaml.load(content))).toEqual(DEFAULT_CONFIG)
  })

  it('generates JSON that parses back to the defaults', () => {
    expect(JSON.parse(generateConfigContent('json'))).toEqual(DEFAULT_CONFIG)
  })

  it('writes the file and creates the marker directory', async () => {
    const filePath = getDefaultConfigPath(tempDir)

    const result = await generateConfigFile({ filePath, format: 'yaml' })

    expect(result).toEqual({ success: true, filePath, message: `Created config file: ${filePath}` })
    expect(await readFile(filePath, 'utf-8')).toBe(generateConfigContent('yaml'))
  })

  it('leaves an existing file alone unless forced', async () => {
    const filePath = getDefaultConfigPath(tempDir, 'json')
    await generateConfigFile({ filePath, format: 'json' })
    await writeFile(filePath, '{"download":{"maxAttempts":4}}')

    const refused = await generateConfigFile({ filePath, format: 'json' })
    expect(refused).toEqual({ success: false, filePath, message: `Config file already exists: ${filePath}` })
    expect(await readFile(filePath, 'utf-8')).toBe('{"download":{"maxAttempts":4}}')

    const forced = await generateConfigFile({ filePath, format: 'json', force: true })
    expect(forced.success).toBe(true)
    expect(JSON.parse(await readFile(filePath, 'utf-8'))).toEqual(DEFAULT_CONFIG)
  })
})
