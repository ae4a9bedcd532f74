/**
 * Public API for the thumbnail repository library
 *
 * This package can be used both as:
 * 1. CLI tool: `ytthumbs --help`
 * 2. Library: `import { openRepository, LifecycleOrchestrator } from 'yt-thumbnail-vault'`
 *
 * @packageDocumentation
 */

// ===== Absorb =====
export type { AbsorbOptions, AbsorbReport } from './absorb/absorb.js'
export { absorb, assertAbsorbable } from './absorb/absorb.js'
// ===== CLI =====
export { createProgram, main, runCli } from './cli/index.js'
export type { CliServices } from './cli/services.js'
export { defaultServices } from './cli/services.js'
// ===== Config Management =====
export { generateConfigContent, generateConfigFile, getDefaultConfigPath } from './config/generator.js'
export {
	clearConfigCache,
	discoverConfigFile,
	isConfigCached,
	loadConfig,
	loadConfigFile,
	mergeConfig,
	substituteEnvVars,
} from './config/loader.js'
export type { Config, ConfigFormat, ConfigOverrides } from './config/schema.js'
export {
	CONFIG_FILE_NAMES,
	DEFAULT_CONFIG,
	detectConfigFormat,
	validateConfig,
	validateConfigSafe,
} from './config/schema.js'
// ===== Fetch =====
export type { QualitySelector } from './fetch/quality.js'
export { BEST_AVAILABLE, describeSelector, probeOrder, selectorFromFlags } from './fetch/quality.js'
export type { FetchRequest, FetchResult, LevelOutcome, ThumbnailSource } from './fetch/thumbnail-fetcher.js'
export { ThumbnailFetcher } from './fetch/thumbnail-fetcher.js'
// ===== Lifecycle =====
export type {
	DownloadSummary,
	GetSummary,
	IndexSummary,
	ItemFailure,
	LinkSource,
	ScrapeSummary,
} from './lifecycle/orchestrator.js'
export { LifecycleOrchestrator, readLinkSource } from './lifecycle/orchestrator.js'
// ===== Links =====
export type { ExtractionResult, VideoReference } from './links/extract-links.js'
export { extractVideoReferences, resolveForms } from './links/extract-links.js'
// ===== Network =====
export type { ConnectivityProbe, ProbeResult } from './net/connectivity.js'
export { assertConnectivity, probeTcp } from './net/connectivity.js'
export type { HttpClient, HttpRequestOptions, HttpResponse } from './net/http.js'
export { createHttpClient, FetchHttpClient, is5xx, isRetryableStatus } from './net/http.js'
// ===== Progress =====
export type { ProgressEvent, ProgressSink } from './progress/progress-manager.js'
export { createProgressManager, ProgressManager } from './progress/progress-manager.js'
// ===== Repository =====
export type { ChannelCount, EntryFilter, IndexStore } from './repository/index-store.js'
export type {
	DeleteResult,
	Reconciliation,
	Repository,
	RepositoryLayout,
	RepositoryStats,
} from './repository/repository.js'
export {
	deleteThumbnail,
	findImage,
	initRepository,
	isRepository,
	openRepository,
	reconcileRepository,
	repositoryStats,
	resolveRepository,
} from './repository/repository.js'
export type { JsonIndexStoreOptions } from './repository/json-store.js'
export { JsonIndexStore } from './repository/json-store.js'
// ===== Core Types & Schemas =====
export type { QualityLevel, QualityName, ThumbnailEntry, VideoForm, VideoId } from './schema/thumbnail.js'
export { isVideoId, QUALITY_LADDER, ThumbnailEntrySchema, videoPageUrl } from './schema/thumbnail.js'
// ===== Scrape =====
export type { PageMetadata, PageMetadataExtractor } from './scrape/page-metadata.js'
export { WatchPageExtractor } from './scrape/page-metadata.js'
export type { ScrapeResult } from './scrape/scraper.js'
export { MetadataScraper } from './scrape/scraper.js'
// ===== Search =====
export type { SearchResult } from './search/search-engine.js'
export { SearchEngine } from './search/search-engine.js'
// ===== Utilities =====
export {
	BadArgumentError,
	ConnectivityError,
	ExitCode,
	exitCodeFor,
	MissingDependencyError,
	NotARepositoryError,
	ThumbnailRepoError,
} from './utils/errors.js'
