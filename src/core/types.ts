/**
 * Core types for the build engine
 *
 * These types define the event-based interface between the build generator
 * and whatever renders progress (the CLI's spinner and ui helpers, tests).
 */

import type { Dispatcher } from "undici"
import type { ImageResizer } from "../artwork.js"
import type { BiosCopy } from "../bios.js"
import type { Config } from "../config.js"
import type { MatchScorer } from "../match.js"
import type { PlatformRegistry } from "../platforms.js"
import type {
	ArtworkKind,
	ResolvedRom,
	ScrapeResult,
	SkippedRow,
	UnresolvedEntry,
} from "../types.js"
import type { ExclusiveResource } from "./scraper/lease.js"
import type { ToolRunner } from "./scraper/skyscraper.js"

// ─────────────────────────────────────────────────────────────────────────────
// Scrape Events
// ─────────────────────────────────────────────────────────────────────────────

export type ScrapePassName = "cache" | "box" | "preview"

/** Emitted when a scraper pass starts and when it ends */
export interface ScrapePassEvent {
	type: "scrape-pass"
	folderCode: string
	pass: ScrapePassName
	status: "start" | "ok" | "failed"
	error?: string
	durationMs?: number
}

export type ScrapeEvent = ScrapePassEvent

export type ScrapeOutcome =
	| { status: "skipped"; reason: string }
	| {
			status: "scraped"
			/** Export parsed after the box pass (box images) */
			box: ScrapeResult | null
			/** Export parsed after the preview pass (preview images) */
			preview: ScrapeResult | null
			/** Last successfully parsed export (text fields) */
			text: ScrapeResult | null
			failedPasses: ScrapePassName[]
			/** Export parse problems after otherwise successful passes */
			parseErrors: string[]
	  }

// ─────────────────────────────────────────────────────────────────────────────
// Build Events
// ─────────────────────────────────────────────────────────────────────────────

export type BuildEvent =
	| BuildCatalogEvent
	| BuildUnmappedEvent
	| PlatformStartEvent
	| ResolvedEvent
	| UnresolvedEvent
	| PlatformSkippedEvent
	| ScrapePassEvent
	| TextEvent
	| ArtworkEvent
	| ArtworkErrorEvent
	| PlatformCompleteEvent
	| BiosEvent
	| CancelledEvent
	| BuildDoneEvent

/** Emitted once the catalog is loaded */
export interface BuildCatalogEvent {
	type: "catalog"
	entries: number
	skipped: SkippedRow[]
}

/** Emitted for each entry whose system is not in the registry */
export interface BuildUnmappedEvent {
	type: "unmapped"
	unresolved: UnresolvedEntry
}

export interface PlatformStartEvent {
	type: "platform-start"
	folderCode: string
	catalogueName: string
	entries: number
}

export interface ResolvedEvent {
	type: "resolved"
	folderCode: string
	rom: ResolvedRom
}

export interface UnresolvedEvent {
	type: "unresolved"
	folderCode: string
	unresolved: UnresolvedEntry
}

export interface PlatformSkippedEvent {
	type: "platform-skipped"
	folderCode: string
	catalogueName: string
	reason: string
}

/** Description files written for a platform */
export interface TextEvent {
	type: "text"
	folderCode: string
	written: number
	/** Set when the export could not be used */
	error?: string
}

export interface ArtworkEvent {
	type: "artwork"
	folderCode: string
	kind: ArtworkKind
	written: number
}

export interface ArtworkErrorEvent {
	type: "artwork-error"
	folderCode: string
	kind: ArtworkKind
	baseName: string
	error: string
}

export interface PlatformCompleteEvent {
	type: "platform-complete"
	folderCode: string
	catalogueName: string
}

export interface BiosEvent {
	type: "bios"
	copies: BiosCopy[]
}

/** Emitted when the abort signal fires between platforms */
export interface CancelledEvent {
	type: "cancelled"
	remaining: string[]
}

export interface BuildDoneEvent {
	type: "done"
	durationMs: number
}

// ─────────────────────────────────────────────────────────────────────────────
// Build Options
// ─────────────────────────────────────────────────────────────────────────────

export interface BuildOptions {
	catalogPath: string
	romDirs: string[]
	outputDir: string
	config: Config
	/** Fetch missing ROMs from the remote archive */
	download: boolean
	/** Run the scraper and produce artwork and text */
	artwork: boolean
	/** Copy ROMs into Roms/<folder>; otherwise scrape through symlinks */
	copy: boolean
	registry?: PlatformRegistry
	runner?: ToolRunner
	/** Scraper availability check (defaults to `which`) */
	toolCheck?: (command: string) => Promise<boolean>
	resizer?: ImageResizer
	scorer?: MatchScorer
	dispatcher?: Dispatcher
	/** Lease guarding the scraper cache; defaults to the process-wide one */
	cacheLease?: ExclusiveResource
	signal?: AbortSignal
}
