/**
 * build_report.txt: a plain-text record of the library the last build left.
 * Holds no timestamps and no per-run counts such as downloads, so a re-run
 * over the same inputs writes the same report.
 */

import { mkdirSync, renameSync, writeFileSync } from "node:fs"
import { join } from "node:path"
import { REPORT_FILENAME } from "./paths.js"
import type { BuildSummary, PlatformSummary } from "./types.js"

function heading(title: string): string[] {
	return [title, "-".repeat(title.length)]
}

function platformLine(p: PlatformSummary): string {
	const label = `${p.folderCode} (${p.catalogueName})`
	if (p.skipped) {
		return `${label}: skipped, ${p.skipped}`
	}
	const line = `${label}: ${p.resolved} resolved, ${p.unresolved} unresolved; text ${p.texts}, box ${p.boxes}, preview ${p.previews}`
	return p.failedPasses.length > 0
		? `${line}; failed passes: ${p.failedPasses.join(", ")}`
		: line
}

export function formatReport(summary: BuildSummary): string {
	const resolved = summary.platforms.reduce((total, p) => total + p.resolved, 0)
	const lines: string[] = [
		"muOS library build report",
		"",
		`Catalog entries: ${summary.entries}`,
		`Resolved: ${resolved}`,
		`Unresolved: ${summary.unresolved.length}`,
	]
	if (summary.skippedRows.length > 0) {
		lines.push(`Skipped rows: ${summary.skippedRows.length}`)
	}
	if (summary.cancelled) {
		lines.push("Build interrupted before all platforms were processed")
	}

	lines.push("", ...heading("Platforms"))
	for (const platform of summary.platforms) lines.push(platformLine(platform))

	if (summary.unresolved.length > 0) {
		lines.push("", ...heading("Unresolved"))
		for (const { entry, reason, detail } of summary.unresolved) {
			lines.push(`row ${entry.row}: ${entry.title} [${entry.system}] ${reason}: ${detail}`)
		}
	}

	if (summary.skippedRows.length > 0) {
		lines.push("", ...heading("Skipped rows"))
		for (const row of summary.skippedRows) lines.push(`row ${row.row}: ${row.reason}`)
	}

	if (summary.biosCopied.length > 0) {
		lines.push("", ...heading("BIOS"))
		lines.push(...summary.biosCopied)
	}

	return `${lines.join("\n")}\n`
}

/** Write the report atomically; returns its path */
export function writeReport(outputDir: string, summary: BuildSummary): string {
	const path = join(outputDir, REPORT_FILENAME)
	const tmp = `${path}.tmp`
	mkdirSync(outputDir, { recursive: true })
	writeFileSync(tmp, formatReport(summary), "utf-8")
	renameSync(tmp, path)
	return path
}
