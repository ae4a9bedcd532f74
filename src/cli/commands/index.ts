/**
 * CLI Commands Index
 *
 * Barrel export for all CLI command modules.
 */

export { executeAbsorb, registerAbsorbCommand } from './absorb.js'
export { executeAdd, registerAddCommand } from './add.js'
export { executeDelete, registerDeleteCommand } from './delete.js'
export { executeDownload, registerDownloadCommand } from './download.js'
export { executeGet, registerGetCommand } from './get.js'
export { executeGrab, registerGrabCommand } from './grab.js'
export { executeInit, registerInitCommand } from './init.js'
export { executeScrape, registerScrapeCommand } from './scrape.js'
export { executeSearch, registerSearchCommand } from './search.js'
export { executeStats, registerStatsCommand } from './stats.js'
export { executeTroubleshoot, registerTroubleshootCommand } from './troubleshoot.js'
