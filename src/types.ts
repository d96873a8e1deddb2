/**
 * Shared type definitions for muos-curator
 */

// ─────────────────────────────────────────────────────────────────────────────
// Catalog
// ─────────────────────────────────────────────────────────────────────────────

/** One row of curated intent from the catalog spreadsheet */
export interface CatalogEntry {
	/** 1-based data row (header excluded), used in reports */
	readonly row: number
	/** Free-text console name as typed by the curator */
	readonly system: string
	readonly title: string
	readonly category?: string | undefined
	readonly reason?: string | undefined
	/** Curator-written description, preferred over the scraped one */
	readonly descriptionOverride?: string | undefined
	readonly notes?: string | undefined
	/** Local path or http(s) URL of the ROM to use instead of matching */
	readonly romOverride?: string | undefined
}

export interface SkippedRow {
	row: number
	reason: string
}

export interface Catalog {
	entries: CatalogEntry[]
	skipped: SkippedRow[]
}

// ─────────────────────────────────────────────────────────────────────────────
// Platforms
// ─────────────────────────────────────────────────────────────────────────────

export interface ArtworkSize {
	width: number
	height: number
}

/** Combined firmware + scraper descriptor for one console */
export interface PlatformDescriptor {
	/** muOS ROM folder (FC, SFC, N64, ...) */
	folderCode: string
	/** Skyscraper platform id (nes, snes, n64, ...) */
	scraperPlatform: string
	/** muOS catalogue directory name; must match the firmware's assign table */
	catalogueName: string
	screenscraperId: number
	/** Spellings curators use for this console */
	aliases: string[]
	/** Directory names that identify this console inside ROM source trees */
	pathTokens: string[]
	/** Accepted ROM file extensions, lowercase with leading dot */
	extensions: string[]
	/** Directory on the remote archive, unencoded (e.g. "No-Intro/Nintendo - Game Boy") */
	archivePath?: string | undefined
	/** BIOS filenames the firmware looks for in BIOS/ */
	bios: string[]
}

export interface PlatformBucket {
	platform: PlatformDescriptor
	/** Roms/<folderCode> inside the output tree */
	romDir: string
	entries: CatalogEntry[]
}

// ─────────────────────────────────────────────────────────────────────────────
// Resolution
// ─────────────────────────────────────────────────────────────────────────────

export type Provenance = "matched-local" | "downloaded" | "user-override"

export interface ResolvedRom {
	entry: CatalogEntry
	/** Absolute path of the ROM file (source or placed copy) */
	path: string
	filename: string
	/** Filename without extension; every artwork and text file is named after it */
	baseName: string
	provenance: Provenance
	/** Match score for fuzzy matches */
	score?: number | undefined
}

export type UnresolvedReason =
	| "unmapped-platform"
	| "override-missing"
	| "no-match"
	| "download-failed"
	| "invalid-extension"
	| "copy-failed"

export interface UnresolvedEntry {
	entry: CatalogEntry
	reason: UnresolvedReason
	detail: string
}

export type LocateResult =
	| { ok: true; rom: ResolvedRom }
	| { ok: false; unresolved: UnresolvedEntry }

// ─────────────────────────────────────────────────────────────────────────────
// Scraping
// ─────────────────────────────────────────────────────────────────────────────

export type ArtworkKind = "box" | "preview"

/** One game from the scraper's structured export */
export interface ScrapeRecord {
	/** ROM filename without extension */
	romBaseName: string
	/** Path as written by the scraper */
	path: string
	name?: string | undefined
	description?: string | undefined
	developer?: string | undefined
	publisher?: string | undefined
	genre?: string | undefined
	/** YYYYMMDD or YYYYMMDDTHHMMSS */
	releaseDate?: string | undefined
	players?: string | undefined
	/** 0.0 - 1.0 */
	rating?: number | undefined
	/** Image references resolved against the export's directory */
	images: {
		thumbnail?: string | undefined
		image?: string | undefined
		marquee?: string | undefined
	}
}

export type ScrapeResult = Map<string, ScrapeRecord>

// ─────────────────────────────────────────────────────────────────────────────
// Build
// ─────────────────────────────────────────────────────────────────────────────

export interface PlatformSummary {
	folderCode: string
	catalogueName: string
	resolved: number
	unresolved: number
	downloaded: number
	texts: number
	boxes: number
	previews: number
	failedPasses: string[]
	skipped?: string | undefined
}

export interface BuildSummary {
	entries: number
	skippedRows: SkippedRow[]
	platforms: PlatformSummary[]
	unresolved: UnresolvedEntry[]
	biosCopied: string[]
	cancelled: boolean
}
