/**
 * Remote ROM archive: HTML directory listings (Myrient layout) per platform,
 * fetched once per build, and title lookup against them.
 */

import type { Dispatcher } from "undici"
import { fetchText } from "./download.js"
import { log } from "./logger.js"
import { selectBestMatch, type MatchScorer } from "./match.js"
import { regionBonus } from "./romname.js"
import type { PlatformDescriptor } from "./types.js"

export interface ArchiveEntry {
	filename: string
	/** Approximate size from the listing; 0 when unknown */
	size: number
}

export interface ArchiveMatch {
	url: string
	filename: string
	score: number
}

export type ListingResult =
	| { success: true; entries: ArchiveEntry[] }
	| { success: false; error: string }

function safeDecodeURIComponent(value: string): string {
	try {
		return decodeURIComponent(value)
	} catch {
		return value
	}
}

/**
 * Parse size string (e.g., "1.2 MiB", "500K") to bytes
 */
export function parseSize(sizeStr: string): number {
	const match = sizeStr.trim().match(/^(\d[\d.,]*)\s*([KMGT]?)i?B?$/i)
	if (!match?.[1]) return 0
	const num = parseFloat(match[1].replace(/,/g, ""))
	if (!Number.isFinite(num)) return 0
	const exponent = ["", "K", "M", "G", "T"].indexOf((match[2] ?? "").toUpperCase())
	return Math.round(num * 1024 ** Math.max(exponent, 0))
}

function isFileHref(href: string): boolean {
	if (!href || href.endsWith("/")) return false
	if (href.startsWith("?") || href.startsWith("#")) return false
	return !/^[a-z]+:/i.test(href)
}

/**
 * Extract file links from a directory listing.
 *
 * Myrient listings are HTML tables:
 * <tr><td><a href="file.zip">file.zip</a></td><td>35.9 KiB</td><td>04-Jan-2023 09:01</td></tr>
 * Other index pages fall back to bare href scanning.
 */
export function parseListing(html: string): ArchiveEntry[] {
	const entries: ArchiveEntry[] = []
	const seen = new Set<string>()
	const push = (href: string, sizeCell: string): void => {
		if (!isFileHref(href)) return
		const filename = safeDecodeURIComponent(href.split("/").pop() ?? href)
		if (seen.has(filename)) return
		seen.add(filename)
		entries.push({ filename, size: parseSize(sizeCell) })
	}

	const tableRowRegex =
		/<tr[^>]*>\s*<td[^>]*>\s*<a\s+href="([^"]+)"[^>]*>[^<]*<\/a>\s*<\/td>\s*<td[^>]*>\s*([^<]*)\s*<\/td>/gim
	let match: RegExpExecArray | null
	while ((match = tableRowRegex.exec(html)) !== null) {
		push(match[1] ?? "", match[2] ?? "")
	}

	if (entries.length === 0) {
		const hrefRegex = /href="([^"]+)"/gi
		while ((match = hrefRegex.exec(html)) !== null) {
			push(match[1] ?? "", "")
		}
	}

	return entries
}

/** Percent-encode every segment of a relative path */
export function encodePath(path: string): string {
	return path
		.split("/")
		.filter(segment => segment.length > 0)
		.map(segment => encodeURIComponent(segment))
		.join("/")
}

export interface ArchiveClientOptions {
	baseUrl: string
	/** Minimum score after the region bonus */
	threshold?: number
	scorer?: MatchScorer
	dispatcher?: Dispatcher | undefined
}

export class ArchiveClient {
	private readonly listings = new Map<string, Promise<ListingResult>>()
	private readonly baseUrl: string

	constructor(private readonly options: ArchiveClientOptions) {
		this.baseUrl = options.baseUrl.endsWith("/") ? options.baseUrl : `${options.baseUrl}/`
	}

	directoryUrl(platform: PlatformDescriptor): string | null {
		if (!platform.archivePath) return null
		return `${this.baseUrl}${encodePath(platform.archivePath)}/`
	}

	/** Directory listing for a platform, fetched at most once */
	listing(platform: PlatformDescriptor): Promise<ListingResult> {
		const cached = this.listings.get(platform.folderCode)
		if (cached) return cached

		const url = this.directoryUrl(platform)
		const pending: Promise<ListingResult> = url
			? fetchText(url, { dispatcher: this.options.dispatcher }).then((result): ListingResult => {
					if (!result.success) {
						log.download.warn({ url, error: result.error }, "archive listing failed")
						return result
					}
					const entries = parseListing(result.text)
					log.download.debug({ url, entries: entries.length }, "archive listing")
					return { success: true, entries }
				})
			: Promise.resolve<ListingResult>({
					success: false,
					error: `no archive source for ${platform.folderCode}`,
				})
		this.listings.set(platform.folderCode, pending)
		return pending
	}

	/**
	 * Best archive file for a title: matcher score times the region bonus,
	 * restricted to the accepted extensions.
	 */
	async findRom(
		title: string,
		platform: PlatformDescriptor,
		accepted: ReadonlySet<string>,
	): Promise<{ success: true; match: ArchiveMatch } | { success: false; error: string }> {
		const listing = await this.listing(platform)
		if (!listing.success) return listing

		const candidates = listing.entries
			.map(entry => entry.filename)
			.filter(filename => {
				const dot = filename.lastIndexOf(".")
				return dot !== -1 && accepted.has(filename.slice(dot).toLowerCase())
			})
		const best = selectBestMatch(title, candidates, {
			threshold: this.options.threshold ?? 0.6,
			...(this.options.scorer ? { scorer: this.options.scorer } : {}),
			bonus: regionBonus,
		})
		if (!best) {
			return { success: false, error: `no archive file matches "${title}"` }
		}

		const directory = this.directoryUrl(platform) ?? this.baseUrl
		return {
			success: true,
			match: {
				url: `${directory}${encodeURIComponent(best.filename)}`,
				filename: best.filename,
				score: best.score,
			},
		}
	}
}
