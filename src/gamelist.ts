/**
 * EmulationStation gamelist.xml parsing and muOS text files
 */

import { renameSync, rmSync, writeFileSync } from "node:fs"
import { readFile } from "node:fs/promises"
import { basename, isAbsolute, join, resolve } from "node:path"
import { load } from "cheerio"
import { GamelistParseError, errorMessage } from "./errors.js"
import { log } from "./logger.js"
import { stripExtension } from "./romname.js"
import type { ResolvedRom, ScrapeRecord, ScrapeResult } from "./types.js"

export const GAMELIST_FILENAME = "gamelist.xml"

const PLACEHOLDER = "No description available."
const DESCRIPTION_RULE = "------------"

function optionalText(value: string): string | undefined {
	const trimmed = value.trim()
	return trimmed.length > 0 ? trimmed : undefined
}

function resolveReference(baseDir: string, value: string | undefined): string | undefined {
	if (!value) return undefined
	return isAbsolute(value) ? value : resolve(baseDir, value)
}

function parseRating(value: string | undefined): number | undefined {
	if (value === undefined) return undefined
	const rating = parseFloat(value)
	return Number.isFinite(rating) ? rating : undefined
}

/**
 * Parse a gamelist export into records keyed by ROM base filename.
 * Image references are resolved against `baseDir`.
 */
export function parseGamelist(xml: string, baseDir: string): ScrapeResult {
	const $ = load(xml, { xml: true })
	const root = $("gameList")
	if (root.length === 0) {
		throw new GamelistParseError("export has no <gameList> element")
	}

	const records: ScrapeResult = new Map()
	root.children("game").each((_, element) => {
		const game = $(element)
		const field = (name: string): string | undefined =>
			optionalText(game.children(name).first().text())

		const path = field("path")
		if (!path) return
		const romBaseName = stripExtension(basename(path))

		const name = field("name")
		const description = field("desc")
		const developer = field("developer")
		const publisher = field("publisher")
		const genre = field("genre")
		const releaseDate = field("releasedate")
		const players = field("players")
		const rating = parseRating(field("rating"))
		const thumbnail = resolveReference(baseDir, field("thumbnail"))
		const image = resolveReference(baseDir, field("image"))
		const marquee = resolveReference(baseDir, field("marquee"))

		const record: ScrapeRecord = {
			romBaseName,
			path,
			...(name ? { name } : {}),
			...(description ? { description } : {}),
			...(developer ? { developer } : {}),
			...(publisher ? { publisher } : {}),
			...(genre ? { genre } : {}),
			...(releaseDate ? { releaseDate } : {}),
			...(players ? { players } : {}),
			...(rating !== undefined ? { rating } : {}),
			images: {
				...(thumbnail ? { thumbnail } : {}),
				...(image ? { image } : {}),
				...(marquee ? { marquee } : {}),
			},
		}
		records.set(romBaseName, record)
	})

	return records
}

/** Read and parse `<dir>/gamelist.xml` */
export async function readGamelist(dir: string): Promise<ScrapeResult> {
	const path = join(dir, GAMELIST_FILENAME)
	let xml: string
	try {
		xml = await readFile(path, "utf-8")
	} catch (err) {
		throw new GamelistParseError(`cannot read ${path}: ${errorMessage(err)}`, {
			cause: err,
		})
	}
	return parseGamelist(xml, dir)
}

export function removeGamelist(dir: string): void {
	rmSync(join(dir, GAMELIST_FILENAME), { force: true })
}

// ─────────────────────────────────────────────────────────────────────────────
// Text layout
// ─────────────────────────────────────────────────────────────────────────────

/** 0.8 → ★★★★☆ */
export function ratingBar(rating: number): string {
	const filled = Math.round(Math.min(Math.max(rating, 0), 1) * 5)
	return "★".repeat(filled) + "☆".repeat(5 - filled)
}

export function releaseYear(releaseDate: string | undefined): string | undefined {
	return releaseDate?.match(/\d{4}/)?.[0]
}

function metadataLines(record: ScrapeRecord): string[] {
	const year = releaseYear(record.releaseDate)
	return [
		record.developer ? `Developer: ${record.developer}` : null,
		record.publisher ? `Publisher: ${record.publisher}` : null,
		record.genre ? `Genre: ${record.genre}` : null,
		year ? `Year: ${year}` : null,
		record.players ? `Players: ${record.players}` : null,
		record.rating !== undefined ? `Rating: ${ratingBar(record.rating)}` : null,
	].filter((line): line is string => line !== null)
}

/**
 * Render the muOS description text for one game.
 * `descriptionOverride` replaces the scraped description when given.
 */
export function formatDescription(
	record: ScrapeRecord,
	descriptionOverride?: string,
): string {
	const lines: string[] = []
	if (record.name) {
		lines.push(record.name, "=".repeat([...record.name].length), "")
	}

	const meta = metadataLines(record)
	const description = optionalText(descriptionOverride ?? record.description ?? "")

	if (!description && meta.length === 0) {
		lines.push(PLACEHOLDER)
		return lines.join("\n")
	}

	// Metadata is always closed by a blank line
	if (meta.length > 0) lines.push(...meta, "")
	if (description) lines.push("Description:", DESCRIPTION_RULE, description)
	return lines.join("\n")
}

function writeAtomic(path: string, content: string): void {
	const tmp = `${path}.tmp`
	writeFileSync(tmp, content, "utf-8")
	renameSync(tmp, path)
}

/**
 * Write `<romBaseName>.txt` for every bucket ROM present in the export.
 * Returns the base names written.
 */
export function writeTextFiles(
	records: ScrapeResult,
	roms: readonly ResolvedRom[],
	textDir: string,
): string[] {
	const written: string[] = []
	for (const rom of roms) {
		const record = records.get(rom.baseName)
		if (!record) continue
		writeAtomic(
			join(textDir, `${rom.baseName}.txt`),
			formatDescription(record, rom.entry.descriptionOverride),
		)
		written.push(rom.baseName)
	}
	if (written.length > 0) {
		log.scrape.debug({ textDir, count: written.length }, "wrote description files")
	}
	return written
}
