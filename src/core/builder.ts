/**
 * Core Build Engine
 *
 * Pure business logic for building the muOS library using async generators.
 * Platforms are processed one after another; within a platform ROMs are
 * located through a bounded pool (downloads are the only slow part), then
 * scraped, and the scraper's output is turned into text and artwork.
 */

import { mkdirSync, rmSync } from "node:fs"
import { join } from "node:path"
import pLimit from "p-limit"

import { ArchiveClient } from "../archive.js"
import { normalizeArtwork } from "../artwork.js"
import { collectBios } from "../bios.js"
import { loadCatalog } from "../catalog.js"
import type { FetchResult } from "../fetcher.js"
import { writeTextFiles } from "../gamelist.js"
import { locateRom, type LocatorContext } from "../locator.js"
import { log } from "../logger.js"
import { PlatformRegistry } from "../platforms.js"
import { buildLocalIndex } from "../scan.js"
import {
	biosDir,
	catalogueLayout,
	cleanupCatalogue,
	ensureCatalogueDirs,
	linkRoms,
	placeRom,
	removeWorkDir,
	resetWorkDir,
	romsRoot,
	workDir,
} from "../tree.js"
import type { ArtworkKind, PlatformBucket, ResolvedRom, ScrapeResult } from "../types.js"
import { countRomFiles, scrapePlatform } from "./scraper/index.js"
import { ensureScraper } from "./scraper/skyscraper.js"
import type { BuildEvent, BuildOptions } from "./types.js"

// ─────────────────────────────────────────────────────────────────────────────
// Main Generator
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Async generator that yields build events.
 *
 * Fatal setup problems (unreadable catalog, missing scraper) are thrown
 * before any output is written; everything else becomes an event.
 *
 * Usage:
 * ```ts
 * for await (const event of buildLibrary(options)) {
 *   switch (event.type) {
 *     case "platform-start": showPlatform(event); break
 *     case "unresolved": reportGap(event); break
 *     case "done": finish(event); break
 *   }
 * }
 * ```
 */
export async function* buildLibrary(options: BuildOptions): AsyncGenerator<BuildEvent> {
	const started = Date.now()
	const registry = options.registry ?? PlatformRegistry.load()
	const catalog = loadCatalog(options.catalogPath)
	yield { type: "catalog", entries: catalog.entries.length, skipped: catalog.skipped }

	if (options.artwork) {
		await ensureScraper(options.config.scraperPath, options.toolCheck)
	}

	const scratch = workDir(options.outputDir)
	const roms = romsRoot(options.outputDir)
	mkdirSync(options.outputDir, { recursive: true })
	resetWorkDir(scratch)

	try {
		const { buckets, unmapped } = registry.route(catalog.entries, roms)
		for (const unresolved of unmapped) {
			yield { type: "unmapped", unresolved }
		}

		const index = buildLocalIndex(registry, options.romDirs, roms)
		log.locator.info({ roms: index.size }, "indexed local ROMs")

		const archive = options.download
			? new ArchiveClient({
					baseUrl: options.config.archiveBaseUrl,
					threshold: options.config.remoteMatchThreshold,
					...(options.scorer ? { scorer: options.scorer } : {}),
					dispatcher: options.dispatcher,
				})
			: undefined

		for (const [position, bucket] of buckets.entries()) {
			if (options.signal?.aborted) {
				yield {
					type: "cancelled",
					remaining: buckets.slice(position).map(b => b.platform.folderCode),
				}
				return
			}

			const locator: LocatorContext = {
				index,
				accepted: registry.acceptedExtensions(bucket.platform),
				workDir: scratch,
				threshold: options.config.matchThreshold,
				scorer: options.scorer,
				archive,
				fetch: {
					retryCount: options.config.retryCount,
					retryDelay: options.config.retryDelay,
					dispatcher: options.dispatcher,
				},
				inflight: new Map<string, Promise<FetchResult>>(),
			}
			yield* buildPlatform(bucket, locator, options)
		}

		if (options.signal?.aborted) {
			yield { type: "cancelled", remaining: [] }
			return
		}

		const copies = collectBios(options.romDirs, biosDir(options.outputDir), registry)
		yield { type: "bios", copies }
		yield { type: "done", durationMs: Date.now() - started }
	} finally {
		removeWorkDir(scratch)
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Per-platform pipeline
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Locate and place every entry of a bucket. Yields resolved/unresolved
 * events as tasks finish and returns the ROMs in catalog order.
 */
async function* resolveBucket(
	bucket: PlatformBucket,
	locator: LocatorContext,
	options: BuildOptions,
): AsyncGenerator<BuildEvent, ResolvedRom[]> {
	const folderCode = bucket.platform.folderCode
	const results: Array<ResolvedRom | null> = bucket.entries.map(() => null)

	// Create a queue for yielding events from concurrent tasks
	const eventQueue: BuildEvent[] = []
	let resolveQueue: (() => void) | null = null

	const pushEvent = (event: BuildEvent) => {
		eventQueue.push(event)
		if (resolveQueue) {
			resolveQueue()
			resolveQueue = null
		}
	}

	const limit = pLimit(options.config.jobs)
	const tasks = bucket.entries.map((entry, position) =>
		limit(async () => {
			const located = await locateRom(entry, bucket, locator)
			if (!located.ok) {
				pushEvent({ type: "unresolved", folderCode, unresolved: located.unresolved })
				return
			}

			let rom = located.rom
			if (options.copy) {
				const placed = placeRom(rom, bucket.romDir, locator.workDir)
				if (!placed.success) {
					pushEvent({
						type: "unresolved",
						folderCode,
						unresolved: { entry, reason: "copy-failed", detail: placed.error },
					})
					return
				}
				rom = { ...rom, path: placed.path }
			}
			results[position] = rom
			pushEvent({ type: "resolved", folderCode, rom })
		}),
	)

	// Process events while tasks run
	let done = false
	let failure: unknown = null
	void Promise.all(tasks).then(
		() => {
			done = true
			if (resolveQueue) resolveQueue()
		},
		(err: unknown) => {
			failure = err
			done = true
			if (resolveQueue) resolveQueue()
		},
	)

	while (!done || eventQueue.length > 0) {
		const event = eventQueue.shift()
		if (event) {
			yield event
		} else if (!done) {
			await new Promise<void>(resolve => {
				resolveQueue = resolve
			})
		}
	}
	if (failure !== null) throw failure

	// Two entries can resolve to the same file; it is scraped once
	const seen = new Set<string>()
	return results.filter((rom): rom is ResolvedRom => {
		if (!rom || seen.has(rom.filename)) return false
		seen.add(rom.filename)
		return true
	})
}

async function* buildPlatform(
	bucket: PlatformBucket,
	locator: LocatorContext,
	options: BuildOptions,
): AsyncGenerator<BuildEvent> {
	const { platform } = bucket
	const folderCode = platform.folderCode
	const catalogueName = platform.catalogueName
	yield { type: "platform-start", folderCode, catalogueName, entries: bucket.entries.length }

	const resolved = yield* resolveBucket(bucket, locator, options)
	if (resolved.length === 0) {
		yield { type: "platform-skipped", folderCode, catalogueName, reason: "no ROMs resolved" }
		return
	}

	// Without copying, the scraper reads a directory of links to the sources
	let scrapeInput = bucket.romDir
	if (!options.copy) {
		scrapeInput = join(locator.workDir, "links", folderCode)
		linkRoms(resolved, scrapeInput)
	}

	if (countRomFiles(scrapeInput, locator.accepted) === 0) {
		yield { type: "platform-skipped", folderCode, catalogueName, reason: "ROM directory empty" }
		return
	}

	const layout = catalogueLayout(options.outputDir, platform)

	if (!options.artwork) {
		ensureCatalogueDirs(layout)
		yield { type: "platform-complete", folderCode, catalogueName }
		return
	}

	const { config } = options
	const scrapeDir = join(locator.workDir, "scrape", folderCode)
	const outcome = yield* scrapePlatform({
		folderCode,
		platform: platform.scraperPlatform,
		romDir: scrapeInput,
		accepted: locator.accepted,
		workDir: scrapeDir,
		scraperPath: config.scraperPath,
		cacheDir: config.scraperCacheDir,
		user: config.screenscraperUser,
		password: config.screenscraperPassword,
		maxFails: config.maxFails,
		cacheTimeoutSec: config.cacheTimeoutSec,
		generateTimeoutSec: config.generateTimeoutSec,
		boxProfile: config.boxProfile,
		previewProfile: config.previewProfile,
		runner: options.runner,
		lease: options.cacheLease,
	})

	if (outcome.status === "skipped") {
		yield { type: "platform-skipped", folderCode, catalogueName, reason: outcome.reason }
		return
	}

	ensureCatalogueDirs(layout)

	if (outcome.text) {
		const written = writeTextFiles(outcome.text, resolved, layout.text)
		yield { type: "text", folderCode, written: written.length }
	} else {
		const error = outcome.parseErrors.join("; ") || "no export produced"
		log.scrape.warn({ folderCode, error }, "skipping text generation")
		yield { type: "text", folderCode, written: 0, error }
	}

	const artwork: Array<[ArtworkKind, ScrapeResult | null, string]> = [
		["box", outcome.box, layout.box],
		["preview", outcome.preview, layout.preview],
	]
	for (const [kind, records, destDir] of artwork) {
		const result = await normalizeArtwork(resolved, records ?? new Map(), kind, destDir, {
			size: kind === "box" ? config.boxSize : config.previewSize,
			searchDir: join(scrapeDir, kind),
			resizer: options.resizer,
		})
		for (const failure of result.failed) {
			yield {
				type: "artwork-error",
				folderCode,
				kind,
				baseName: failure.baseName,
				error: failure.error,
			}
		}
		yield { type: "artwork", folderCode, kind, written: result.written.length }
	}

	cleanupCatalogue(layout.root)
	rmSync(scrapeDir, { recursive: true, force: true })
	yield { type: "platform-complete", folderCode, catalogueName }
}
