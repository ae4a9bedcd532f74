/**
 * Repository layout, creation and resolution
 *
 * A repository is a directory holding:
 *
 *   .thumbnails/index.json the entry index (its presence is the marker)
 *   longs/                 long-form images, <id>.<ext>
 *   shorts/                short-form images, <id>.<ext>
 *
 * Opening never creates anything; a store directory that has gone missing is
 * recreated by whatever writes into it next.
 */

import { existsSync, mkdirSync } from 'node:fs'
import { access, readdir, rm, stat } from 'node:fs/promises'
import path from 'node:path'

import { NotARepositoryError } from '#utils/errors'
import { createLogger } from '#utils/logger'

import {
	IMAGE_EXTENSIONS,
	type ImageExtension,
	type ThumbnailEntry,
	VIDEO_FORMS,
	type VideoForm,
	type VideoId,
} from '../schema/thumbnail.js'
import type { IndexStore } from './index-store.js'
import { JsonIndexStore, type JsonIndexStoreOptions } from './json-store.js'

const logger = createLogger('repository')

export const MARKER_DIR = '.thumbnails'
export const INDEX_FILE = 'index.json'
export const STORE_DIRS: Record<VideoForm, string> = { long: 'longs', short: 'shorts' }

export type RepositoryLayout = {
	root: string
	markerDir: string
	indexPath: string
	stores: Record<VideoForm, string>
}

export type Repository = {
	layout: RepositoryLayout
	index: IndexStore
	close(): void
}

export function repositoryLayout(root: string): RepositoryLayout {
	const resolved = path.resolve(root)
	const markerDir = path.join(resolved, MARKER_DIR)
	return {
		root: resolved,
		markerDir,
		indexPath: path.join(markerDir, INDEX_FILE),
		stores: {
			long: path.join(resolved, STORE_DIRS.long),
			short: path.join(resolved, STORE_DIRS.short),
		},
	}
}

export function isRepository(dir: string): boolean {
	return existsSync(repositoryLayout(dir).indexPath)
}

// ============================================================================
// Creation and opening
// ============================================================================

/**
 * Create the marker, index and both stores. On an existing repository this
 * only fills in whatever is missing; the index is never recreated.
 */
export function initRepository(
	root: string,
	options: JsonIndexStoreOptions = {},
): { created: boolean; layout: RepositoryLayout } {
	const layout = repositoryLayout(root)
	const created = !existsSync(layout.indexPath)

	mkdirSync(layout.markerDir, { recursive: true })
	for (const form of VIDEO_FORMS) {
		mkdirSync(layout.stores[form], { recursive: true })
	}
	new JsonIndexStore(layout.indexPath, options).close()

	logger.info(created ? 'repository initialized' : 'repository already initialized', { root: layout.root })
	return { created, layout }
}

/**
 * @throws NotARepositoryError when the marker index is missing
 */
export function openRepository(root: string, options: JsonIndexStoreOptions = {}): Repository {
	const layout = repositoryLayout(root)
	if (!existsSync(layout.indexPath)) {
		throw NotARepositoryError.fromPath(layout.root)
	}
	const index = new JsonIndexStore(layout.indexPath, options)
	return { layout, index, close: () => index.close() }
}

// ============================================================================
// Resolution
// ============================================================================

export type RepositorySource = 'explicit' | 'cwd' | 'default'

export type RepositoryResolution =
	| { ok: true; root: string; source: RepositorySource }
	| { ok: false; error: NotARepositoryError }

/**
 * Pick the repository a command works on:
 *
 * 1. an explicit target, which must be a repository (no fallback)
 * 2. the working directory
 * 3. the default repository from the environment
 */
export function resolveRepository(input: {
	cwd: string
	explicit?: string
	defaultRepository?: string
	isRepository?: (dir: string) => boolean
}): RepositoryResolution {
	const check = input.isRepository ?? isRepository

	if (input.explicit) {
		const root = path.resolve(input.cwd, input.explicit)
		return check(root)
			? { ok: true, root, source: 'explicit' }
			: { ok: false, error: NotARepositoryError.fromPath(root) }
	}

	const cwd = path.resolve(input.cwd)
	if (check(cwd)) {
		return { ok: true, root: cwd, source: 'cwd' }
	}

	if (input.defaultRepository) {
		const root = path.resolve(input.cwd, input.defaultRepository)
		if (check(root)) {
			return { ok: true, root, source: 'default' }
		}
	}

	return { ok: false, error: NotARepositoryError.fromPath(cwd) }
}

// ============================================================================
// Image files
// ============================================================================

const IMAGE_FILE_PATTERN = /^([A-Za-z0-9_-]{11})\.(jpg|webp)$/

export function imagePath(layout: RepositoryLayout, form: VideoForm, id: VideoId, ext: ImageExtension): string {
	return path.join(layout.stores[form], `${id}.${ext}`)
}

/**
 * Path of an entry's image on disk, trying each known extension.
 */
export async function findImage(
	layout: RepositoryLayout,
	entry: Pick<ThumbnailEntry, 'id' | 'form'>,
): Promise<string | null> {
	for (const ext of IMAGE_EXTENSIONS) {
		const candidate = imagePath(layout, entry.form, entry.id, ext)
		try {
			await access(candidate)
			return candidate
		} catch {
			continue
		}
	}
	return null
}

export type StoreFile = { id: VideoId; name: string; path: string; bytes: number }

/**
 * Image files in a store named `<id>.<ext>`; anything else is ignored.
 */
export async function listStoreImages(layout: RepositoryLayout, form: VideoForm): Promise<StoreFile[]> {
	const dir = layout.stores[form]
	let names: string[]
	try {
		names = await readdir(dir)
	} catch {
		return []
	}

	const files: StoreFile[] = []
	for (const name of names.sort()) {
		const match = IMAGE_FILE_PATTERN.exec(name)
		if (!match) continue
		const filePath = path.join(dir, name)
		const info = await stat(filePath)
		if (info.isFile()) {
			files.push({ id: match[1], name, path: filePath, bytes: info.size })
		}
	}
	return files
}

/**
 * Total bytes of regular files directly inside a store.
 */
export async function storeSize(layout: RepositoryLayout, form: VideoForm): Promise<number> {
	const dir = layout.stores[form]
	let names: string[]
	try {
		names = await readdir(dir)
	} catch {
		return 0
	}
	let total = 0
	for (const name of names) {
		const info = await stat(path.join(dir, name))
		if (info.isFile()) total += info.size
	}
	return total
}

// ============================================================================
// Stats, reconcile, delete
// ============================================================================

export type FormStats = { count: number; bytes: number }

export type RepositoryStats = Record<VideoForm | 'total', FormStats>

/**
 * Downloaded entries per form and the on-disk size of each store.
 */
export async function repositoryStats(repository: Repository): Promise<RepositoryStats> {
	const counts = repository.index.countsByForm()
	const long = { count: counts.long.downloaded, bytes: await storeSize(repository.layout, 'long') }
	const short = { count: counts.short.downloaded, bytes: await storeSize(repository.layout, 'short') }
	return { long, short, total: { count: long.count + short.count, bytes: long.bytes + short.bytes } }
}

export type FormReconciliation = {
	indexed: number
	downloaded: number
	files: number
	/** downloaded - files: positive means images are missing on disk */
	difference: number
	missing: VideoId[]
	orphaned: string[]
}

export type Reconciliation = Record<VideoForm, FormReconciliation>

/**
 * Compare the index against the image stores. Desync is reported as data.
 */
export async function reconcileRepository(repository: Repository): Promise<Reconciliation> {
	const entries = repository.index.all()

	const reconcileForm = async (form: VideoForm): Promise<FormReconciliation> => {
		const formEntries = entries.filter((entry) => entry.form === form)
		const downloaded = new Set(formEntries.filter((entry) => entry.quality !== null).map((entry) => entry.id))
		const files = await listStoreImages(repository.layout, form)
		const fileIds = new Set(files.map((file) => file.id))

		return {
			indexed: formEntries.length,
			downloaded: downloaded.size,
			files: files.length,
			difference: downloaded.size - files.length,
			missing: [...downloaded].filter((id) => !fileIds.has(id)),
			orphaned: files.filter((file) => !downloaded.has(file.id)).map((file) => file.name),
		}
	}

	return { long: await reconcileForm('long'), short: await reconcileForm('short') }
}

export type DeleteResult = { id: VideoId; deleted: boolean; removedFiles: string[] }

/**
 * Remove an entry and its image file(s).
 */
export async function deleteThumbnail(repository: Repository, id: VideoId): Promise<DeleteResult> {
	const entry = repository.index.get(id)
	if (!entry) {
		return { id, deleted: false, removedFiles: [] }
	}

	const removedFiles: string[] = []
	for (const ext of IMAGE_EXTENSIONS) {
		const candidate = imagePath(repository.layout, entry.form, id, ext)
		if (existsSync(candidate)) {
			await rm(candidate, { force: true })
			removedFiles.push(candidate)
		}
	}

	const deleted = repository.index.delete(id)
	logger.info('thumbnail deleted', { id, removedFiles })
	return { id, deleted, removedFiles }
}
