/**
 * Core module exports
 *
 * Pure business logic for building the library using async generators.
 * The generators emit events that the CLI (or any other front end) renders.
 */

// Build engine
export { buildLibrary } from "./builder.js"
export { BuildSummaryCollector, isCleanBuild, summarizeBuild } from "./summary.js"

// Scraper engine
export { countRomFiles, scrapePlatform, scraperCacheLease } from "./scraper/index.js"
export type { ScrapePlatformOptions } from "./scraper/index.js"
export { ExclusiveResource, type Lease } from "./scraper/lease.js"
export {
	cachePassArgs,
	ensureScraper,
	generatePassArgs,
	hasCommand,
	spawnRunner,
	type ToolRunResult,
	type ToolRunner,
} from "./scraper/skyscraper.js"

// Shared types
export type * from "./types.js"
