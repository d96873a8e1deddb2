/**
 * Catalog loading: the curator's spreadsheet export (CSV or TSV)
 *
 * Header: System, Game Name, Category, Reason, Description, Notes, rom_path.
 * Extra trailing columns are ignored; a handful of alternative header
 * spellings are accepted.
 */

import { readFileSync } from "node:fs"
import { parse } from "csv-parse/sync"
import { CatalogReadError, MalformedCatalogError } from "./errors.js"
import { log } from "./logger.js"
import type { Catalog, CatalogEntry, SkippedRow } from "./types.js"

type Field =
	| "system"
	| "title"
	| "category"
	| "reason"
	| "descriptionOverride"
	| "notes"
	| "romOverride"

const HEADER_ALIASES: Record<string, Field> = {
	system: "system",
	"game name": "title",
	game: "title",
	name: "title",
	category: "category",
	"category/set": "category",
	reason: "reason",
	description: "descriptionOverride",
	notes: "notes",
	rom_path: "romOverride",
	"rom path": "romOverride",
}

function headerField(header: string): Field | undefined {
	return HEADER_ALIASES[header.trim().toLowerCase()]
}

function cleanValue(value: string | undefined): string | undefined {
	if (value === undefined) return undefined
	const trimmed = value.trim()
	return trimmed.length > 0 ? trimmed : undefined
}

function detectDelimiter(text: string): "\t" | "," {
	const newline = text.indexOf("\n")
	const headerLine = newline === -1 ? text : text.slice(0, newline)
	return headerLine.includes("\t") ? "\t" : ","
}

/** Parse catalog text; throws MalformedCatalogError on a bad header */
export function parseCatalog(text: string): Catalog {
	const content = text.startsWith("\uFEFF") ? text.slice(1) : text
	const rows: string[][] = parse(content, {
		delimiter: detectDelimiter(content),
		relax_column_count: true,
		relax_quotes: true,
		skip_empty_lines: true,
	})

	const header = rows[0] ?? []
	const columns = new Map<Field, number>()
	header.forEach((name, index) => {
		const field = headerField(name)
		if (field && !columns.has(field)) columns.set(field, index)
	})

	const missing = [
		columns.has("system") ? null : "System",
		columns.has("title") ? null : "Game Name",
	].filter((c): c is string => c !== null)
	if (missing.length > 0) throw new MalformedCatalogError(missing)

	const entries: CatalogEntry[] = []
	const skipped: SkippedRow[] = []

	rows.slice(1).forEach((cells, index) => {
		const row = index + 1
		const get = (field: Field): string | undefined => {
			const column = columns.get(field)
			return column === undefined ? undefined : cleanValue(cells[column])
		}
		if (cells.every(cell => cell.trim() === "")) return

		const system = get("system")
		const title = get("title")
		if (!system || !title) {
			const reason = !system ? "missing System" : "missing Game Name"
			log.catalog.warn({ row }, `skipping catalog row: ${reason}`)
			skipped.push({ row, reason })
			return
		}

		const category = get("category")
		const reason = get("reason")
		const descriptionOverride = get("descriptionOverride")
		const notes = get("notes")
		const romOverride = get("romOverride")
		entries.push(
			Object.freeze({
				row,
				system,
				title,
				...(category ? { category } : {}),
				...(reason ? { reason } : {}),
				...(descriptionOverride ? { descriptionOverride } : {}),
				...(notes ? { notes } : {}),
				...(romOverride ? { romOverride } : {}),
			}),
		)
	})

	log.catalog.info(
		{ entries: entries.length, skipped: skipped.length },
		"catalog parsed",
	)
	return { entries, skipped }
}

export function loadCatalog(path: string): Catalog {
	let text: string
	try {
		text = readFileSync(path, "utf-8")
	} catch (err) {
		throw new CatalogReadError(path, err)
	}
	return parseCatalog(text)
}
