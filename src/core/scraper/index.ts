/**
 * Scrape orchestrator
 *
 * Runs the three Skyscraper passes for one platform while holding the
 * scraper-cache lease: an online cache pass, then offline box and preview
 * generation passes. A failed pass is reported and the next one still runs.
 * The gamelist export is parsed after each generation pass and removed.
 */

import { existsSync, mkdirSync, readdirSync } from "node:fs"
import { extname, join } from "node:path"

import { errorMessage } from "../../errors.js"
import { readGamelist, removeGamelist } from "../../gamelist.js"
import { log } from "../../logger.js"
import type { ArtworkKind, ScrapeResult } from "../../types.js"
import type { ScrapeEvent, ScrapeOutcome, ScrapePassName } from "../types.js"
import { ExclusiveResource } from "./lease.js"
import {
	cachePassArgs,
	generatePassArgs,
	redactArgs,
	spawnRunner,
	type ScraperInvocation,
	type ToolRunner,
} from "./skyscraper.js"

/** Process-wide lease: Skyscraper keeps one cache for every platform */
export const scraperCacheLease = new ExclusiveResource("skyscraper-cache")

export interface ScrapePlatformOptions {
	folderCode: string
	/** Skyscraper platform id */
	platform: string
	/** Directory holding the platform's ROMs (or links to them) */
	romDir: string
	/** Extensions counted as ROM files */
	accepted: ReadonlySet<string>
	/** Scratch directory for the export and raw artwork */
	workDir: string
	scraperPath: string
	cacheDir?: string | undefined
	user?: string | undefined
	password?: string | undefined
	maxFails: number
	cacheTimeoutSec: number
	generateTimeoutSec: number
	boxProfile: string
	previewProfile: string
	runner?: ToolRunner | undefined
	lease?: ExclusiveResource | undefined
}

/** Number of ROM files directly inside `dir` (0 when absent) */
export function countRomFiles(dir: string, accepted: ReadonlySet<string>): number {
	if (!existsSync(dir)) return 0
	try {
		return readdirSync(dir).filter(
			name => !name.startsWith(".") && accepted.has(extname(name).toLowerCase()),
		).length
	} catch (err) {
		log.scrape.warn({ dir, error: errorMessage(err) }, "cannot read ROM directory")
		return 0
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Main Generator
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Async generator that yields pass events and returns what the passes
 * produced.
 *
 * Usage:
 * ```ts
 * const outcome = yield* scrapePlatform(options)
 * if (outcome.status === "scraped") writeTextFiles(outcome.text, ...)
 * ```
 */
export async function* scrapePlatform(
	options: ScrapePlatformOptions,
): AsyncGenerator<ScrapeEvent, ScrapeOutcome> {
	const romCount = countRomFiles(options.romDir, options.accepted)
	if (romCount === 0) {
		return {
			status: "skipped",
			reason: existsSync(options.romDir) ? "no ROM files" : "ROM directory missing",
		}
	}

	const runner = options.runner ?? spawnRunner
	const lease = await (options.lease ?? scraperCacheLease).acquire(options.folderCode)
	const failedPasses: ScrapePassName[] = []
	const parseErrors: string[] = []
	let box: ScrapeResult | null = null
	let preview: ScrapeResult | null = null
	let text: ScrapeResult | null = null

	const invocation: ScraperInvocation = {
		platform: options.platform,
		romDir: options.romDir,
		cacheDir: options.cacheDir,
	}

	async function* runPass(
		pass: ScrapePassName,
		args: string[],
		timeoutSec: number,
	): AsyncGenerator<ScrapeEvent, boolean> {
		yield { type: "scrape-pass", folderCode: options.folderCode, pass, status: "start" }
		log.scrape.debug(
			{ folderCode: options.folderCode, pass, args: redactArgs(args) },
			"running scraper",
		)
		const started = Date.now()
		const result = await runner(options.scraperPath, args, {
			timeoutMs: timeoutSec * 1000,
		})
		const durationMs = Date.now() - started

		const error = result.timedOut
			? `timed out after ${timeoutSec}s`
			: result.error
				? result.error
				: result.exitCode !== 0
					? `exited with code ${result.exitCode ?? "unknown"}`
					: undefined
		if (error) {
			failedPasses.push(pass)
			log.scrape.warn(
				{ folderCode: options.folderCode, pass, error, stderr: result.stderr.slice(-2000) },
				"scraper pass failed",
			)
			yield {
				type: "scrape-pass",
				folderCode: options.folderCode,
				pass,
				status: "failed",
				error,
				durationMs,
			}
			return false
		}
		yield { type: "scrape-pass", folderCode: options.folderCode, pass, status: "ok", durationMs }
		return true
	}

	async function* generate(
		kind: ArtworkKind,
		profile: string,
	): AsyncGenerator<ScrapeEvent, ScrapeResult | null> {
		mkdirSync(join(options.workDir, kind), { recursive: true })
		const ok = yield* runPass(
			kind,
			generatePassArgs(invocation, { workDir: options.workDir, kind, profile }),
			options.generateTimeoutSec,
		)
		try {
			const records = await readGamelist(options.workDir)
			text = records
			return records
		} catch (err) {
			// A failed pass already reported its own error
			if (ok) parseErrors.push(`${kind} export: ${errorMessage(err)}`)
			return null
		} finally {
			removeGamelist(options.workDir)
		}
	}

	try {
		mkdirSync(options.workDir, { recursive: true })
		yield* runPass(
			"cache",
			cachePassArgs(invocation, {
				user: options.user,
				password: options.password,
				maxFails: options.maxFails,
			}),
			options.cacheTimeoutSec,
		)
		box = yield* generate("box", options.boxProfile)
		preview = yield* generate("preview", options.previewProfile)
	} finally {
		lease.release()
	}

	return { status: "scraped", box, preview, text, failedPasses, parseErrors }
}
