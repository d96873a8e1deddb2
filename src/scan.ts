/**
 * Local ROM index: every ROM file found in the source directories and in the
 * output's own Roms/ tree, grouped by muOS folder code.
 */

import { existsSync, readdirSync, realpathSync, statSync, type Dirent } from "node:fs"
import { basename, extname, join } from "node:path"
import { log } from "./logger.js"
import type { PlatformRegistry } from "./platforms.js"

export interface LocalRom {
	path: string
	filename: string
	size: number
}

function listDir(dir: string): Dirent[] {
	try {
		return readdirSync(dir, { withFileTypes: true }).sort((a, b) =>
			a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
		)
	} catch (err) {
		log.locator.warn({ dir, err }, "cannot read directory")
		return []
	}
}

/** Directory levels searched below each ROM source */
export const SOURCE_SCAN_DEPTH = 6

function realDir(dir: string): string | null {
	try {
		return realpathSync(dir)
	} catch {
		return null
	}
}

/**
 * Recursively list regular files (symlinks followed), skipping dot entries.
 * A directory reached a second time through a link is not entered again.
 */
export function walkFiles(root: string, maxDepth = Infinity): string[] {
	const out: string[] = []
	const seen = new Set<string>()
	const visit = (dir: string, depth: number): void => {
		const real = realDir(dir)
		if (real === null || seen.has(real)) return
		seen.add(real)
		for (const dirent of listDir(dir)) {
			if (dirent.name.startsWith(".")) continue
			const path = join(dir, dirent.name)
			let isDir = dirent.isDirectory()
			let isFile = dirent.isFile()
			if (dirent.isSymbolicLink()) {
				try {
					const stat = statSync(path)
					isDir = stat.isDirectory()
					isFile = stat.isFile()
				} catch {
					// Dangling link
					continue
				}
			}
			if (isDir && depth < maxDepth) visit(path, depth + 1)
			else if (isFile) out.push(path)
		}
	}
	if (existsSync(root)) visit(root, 1)
	return out
}

export class LocalRomIndex {
	private readonly byFolder = new Map<string, LocalRom[]>()

	/** Add a ROM unless a file with the same name is already indexed for the folder */
	add(folderCode: string, rom: LocalRom): boolean {
		const list = this.byFolder.get(folderCode) ?? []
		if (list.some(existing => existing.filename === rom.filename)) return false
		list.push(rom)
		this.byFolder.set(folderCode, list)
		return true
	}

	candidates(folderCode: string): readonly LocalRom[] {
		return this.byFolder.get(folderCode) ?? []
	}

	find(folderCode: string, filename: string): LocalRom | undefined {
		return this.candidates(folderCode).find(rom => rom.filename === filename)
	}

	get size(): number {
		let total = 0
		for (const list of this.byFolder.values()) total += list.length
		return total
	}
}

function toLocalRom(path: string): LocalRom | null {
	try {
		const stat = statSync(path)
		if (!stat.isFile() || stat.size === 0) return null
		const filename = basename(path)
		return { path, filename, size: stat.size }
	} catch {
		return null
	}
}

/**
 * Build the index. ROMs already placed in `<romsRoot>/<folder>` come first,
 * so a re-run prefers them over identical names in the sources.
 */
export function buildLocalIndex(
	registry: PlatformRegistry,
	sourceDirs: readonly string[],
	romsRoot?: string,
): LocalRomIndex {
	const index = new LocalRomIndex()
	const romExtensions = registry.allRomExtensions()

	if (romsRoot) {
		for (const platform of registry.platforms) {
			const accepted = registry.acceptedExtensions(platform)
			for (const path of walkFiles(join(romsRoot, platform.folderCode), 1)) {
				if (!accepted.has(extname(path).toLowerCase())) continue
				if (registry.isBiosFilename(path)) continue
				const rom = toLocalRom(path)
				if (rom) index.add(platform.folderCode, rom)
			}
		}
	}

	for (const sourceDir of sourceDirs) {
		let found = 0
		for (const path of walkFiles(sourceDir, SOURCE_SCAN_DEPTH)) {
			if (!romExtensions.has(extname(path).toLowerCase())) continue
			if (registry.isBiosFilename(path)) continue
			const platform = registry.detectFromPath(path)
			if (!platform) continue
			const rom = toLocalRom(path)
			if (rom && index.add(platform.folderCode, rom)) found++
		}
		log.locator.debug({ sourceDir, found }, "scanned ROM source")
	}

	return index
}
