/**
 * BIOS collection: copies the firmware files each platform needs from the
 * ROM source directories into a flat BIOS/ folder.
 */

import { copyFileSync, mkdirSync, renameSync, rmSync, statSync } from "node:fs"
import { basename, join } from "node:path"
import { errorMessage } from "./errors.js"
import { log } from "./logger.js"
import type { PlatformRegistry } from "./platforms.js"
import { SOURCE_SCAN_DEPTH, walkFiles } from "./scan.js"

export interface BiosCopy {
	filename: string
	source: string
	status: "copied" | "unchanged" | "failed"
	error?: string
}

/** First file per BIOS name across the sources, in sorted walk order */
export function findBiosFiles(
	sourceDirs: readonly string[],
	wanted: ReadonlySet<string>,
): Map<string, string> {
	const found = new Map<string, string>()
	for (const sourceDir of sourceDirs) {
		for (const path of walkFiles(sourceDir, SOURCE_SCAN_DEPTH)) {
			const name = basename(path)
			if (wanted.has(name) && !found.has(name)) found.set(name, path)
		}
	}
	return found
}

export function collectBios(
	sourceDirs: readonly string[],
	destDir: string,
	registry: PlatformRegistry,
): BiosCopy[] {
	const wanted = new Set(registry.platforms.flatMap(p => p.bios))
	const found = findBiosFiles(sourceDirs, wanted)
	const results: BiosCopy[] = []

	for (const filename of [...found.keys()].sort()) {
		const source = found.get(filename)
		if (!source) continue
		const dest = join(destDir, filename)
		try {
			const sourceSize = statSync(source).size
			let destSize: number | null = null
			try {
				destSize = statSync(dest).size
			} catch {
				destSize = null
			}
			if (destSize === sourceSize) {
				results.push({ filename, source, status: "unchanged" })
				continue
			}
			mkdirSync(destDir, { recursive: true })
			const tmp = `${dest}.tmp`
			copyFileSync(source, tmp)
			renameSync(tmp, dest)
			results.push({ filename, source, status: "copied" })
		} catch (err) {
			rmSync(`${dest}.tmp`, { force: true })
			const error = errorMessage(err)
			log.tree.warn({ filename, source, error }, "BIOS copy failed")
			results.push({ filename, source, status: "failed", error })
		}
	}

	return results
}
