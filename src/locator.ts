/**
 * ROM locator: turns a catalog entry into a ROM file.
 *
 * Order of precedence: the entry's rom_path override, a fuzzy match in the
 * local index, then (when enabled) the remote archive. An override that
 * cannot be used is reported only when neither fallback finds a file.
 */

import { statSync } from "node:fs"
import { homedir } from "node:os"
import { basename, join, resolve } from "node:path"
import type { ArchiveClient } from "./archive.js"
import { fetchRom, type FetchResult, type FetchSettings } from "./fetcher.js"
import { log } from "./logger.js"
import { selectBestMatch, type MatchScorer } from "./match.js"
import { stripExtension } from "./romname.js"
import type { LocalRomIndex } from "./scan.js"
import type {
	CatalogEntry,
	LocateResult,
	PlatformBucket,
	Provenance,
	UnresolvedEntry,
	UnresolvedReason,
} from "./types.js"

export interface LocatorContext {
	index: LocalRomIndex
	/** Extensions accepted for the bucket's platform */
	accepted: ReadonlySet<string>
	workDir: string
	threshold: number
	scorer?: MatchScorer | undefined
	/** Present when downloading missing ROMs is enabled */
	archive?: ArchiveClient | undefined
	fetch: FetchSettings
	/** Downloads in flight keyed by destination, shared across entries */
	inflight?: Map<string, Promise<FetchResult>>
}

const URL_PATTERN = /^https?:\/\//i

export function expandHome(path: string): string {
	if (path === "~") return homedir()
	if (path.startsWith("~/")) return join(homedir(), path.slice(2))
	return path
}

function resolved(
	entry: CatalogEntry,
	path: string,
	provenance: Provenance,
	score?: number,
): LocateResult {
	const filename = basename(path)
	return {
		ok: true,
		rom: {
			entry,
			path,
			filename,
			baseName: stripExtension(filename),
			provenance,
			...(score !== undefined ? { score } : {}),
		},
	}
}

function unresolved(
	entry: CatalogEntry,
	reason: UnresolvedReason,
	detail: string,
): LocateResult {
	log.locator.warn({ row: entry.row, title: entry.title, reason }, detail)
	return { ok: false, unresolved: { entry, reason, detail } }
}

function overrideFailure(
	entry: CatalogEntry,
	reason: UnresolvedReason,
	detail: string,
): UnresolvedEntry {
	log.locator.warn(
		{ row: entry.row, title: entry.title, reason },
		`${detail}; falling back to catalog match`,
	)
	return { entry, reason, detail }
}

function fetchOnce(
	url: string,
	filename: string | undefined,
	bucket: PlatformBucket,
	ctx: LocatorContext,
): Promise<FetchResult> {
	const key = `${bucket.romDir}\0${filename ?? url}`
	const existing = ctx.inflight?.get(key)
	if (existing) return existing
	const pending = fetchRom(
		{ url, filename, romDir: bucket.romDir, workDir: ctx.workDir, accepted: ctx.accepted },
		ctx.fetch,
	)
	ctx.inflight?.set(key, pending)
	return pending
}

async function locateOverride(
	entry: CatalogEntry,
	override: string,
	bucket: PlatformBucket,
	ctx: LocatorContext,
): Promise<LocateResult | UnresolvedEntry> {
	if (URL_PATTERN.test(override)) {
		const result = await fetchOnce(override, undefined, bucket, ctx)
		if (!result.success) return overrideFailure(entry, result.reason, result.error)
		return resolved(entry, result.path, "user-override")
	}

	const path = resolve(expandHome(override))
	try {
		const stat = statSync(path)
		if (!stat.isFile()) {
			return overrideFailure(entry, "override-missing", `${path} is not a file`)
		}
		if (stat.size === 0) {
			return overrideFailure(entry, "override-missing", `${path} is empty`)
		}
	} catch {
		return overrideFailure(entry, "override-missing", `${path} does not exist`)
	}
	return resolved(entry, path, "user-override")
}

export async function locateRom(
	entry: CatalogEntry,
	bucket: PlatformBucket,
	ctx: LocatorContext,
): Promise<LocateResult> {
	let failedOverride: UnresolvedEntry | undefined
	if (entry.romOverride) {
		const result = await locateOverride(entry, entry.romOverride, bucket, ctx)
		if ("ok" in result) return result
		failedOverride = result
	}
	const giveUp = (reason: UnresolvedReason, detail: string): LocateResult =>
		failedOverride
			? unresolved(entry, failedOverride.reason, failedOverride.detail)
			: unresolved(entry, reason, detail)

	const candidates = ctx.index.candidates(bucket.platform.folderCode)
	const best = selectBestMatch(
		entry.title,
		candidates.map(rom => rom.filename),
		{ threshold: ctx.threshold, ...(ctx.scorer ? { scorer: ctx.scorer } : {}) },
	)
	if (best) {
		const rom = ctx.index.find(bucket.platform.folderCode, best.filename)
		if (rom) {
			log.locator.debug(
				{ title: entry.title, filename: best.filename, score: best.score },
				"matched local ROM",
			)
			return resolved(entry, rom.path, "matched-local", best.score)
		}
	}

	if (!ctx.archive) {
		return giveUp("no-match", `no local ROM matches "${entry.title}" (downloads disabled)`)
	}

	const remote = await ctx.archive.findRom(entry.title, bucket.platform, ctx.accepted)
	if (!remote.success) {
		return giveUp("no-match", remote.error)
	}
	const fetched = await fetchOnce(remote.match.url, remote.match.filename, bucket, ctx)
	if (!fetched.success) {
		return giveUp(fetched.reason, fetched.error)
	}
	return resolved(entry, fetched.path, "downloaded", remote.match.score)
}
