/**
 * Output tree layout and file placement
 *
 * Roms/<folder>/…, BIOS/…, MUOS/info/catalogue/<catalogue name>/{box,preview,text}/…
 * Every file is written to a temp path first and renamed into place.
 */

import { copyFileSync, mkdirSync, renameSync, rmSync, statSync, symlinkSync } from "node:fs"
import { join, resolve } from "node:path"
import { errorMessage } from "./errors.js"
import { GAMELIST_FILENAME } from "./gamelist.js"
import { log } from "./logger.js"
import { WORK_DIR_NAME } from "./paths.js"
import type { PlatformDescriptor, ResolvedRom } from "./types.js"

export interface CatalogueLayout {
	root: string
	box: string
	preview: string
	text: string
}

/** Scraper leftovers that must never reach the firmware's tree */
const LEFTOVER_DIRS = ["media", "covers", "screenshots", "marquees", "wheels", "videos"]

export function romsRoot(outputDir: string): string {
	return join(outputDir, "Roms")
}

export function biosDir(outputDir: string): string {
	return join(outputDir, "BIOS")
}

export function workDir(outputDir: string): string {
	return join(outputDir, WORK_DIR_NAME)
}

export function catalogueLayout(
	outputDir: string,
	platform: PlatformDescriptor,
): CatalogueLayout {
	const root = join(outputDir, "MUOS", "info", "catalogue", platform.catalogueName)
	return {
		root,
		box: join(root, "box"),
		preview: join(root, "preview"),
		text: join(root, "text"),
	}
}

export function ensureCatalogueDirs(layout: CatalogueLayout): void {
	for (const dir of [layout.box, layout.preview, layout.text]) {
		mkdirSync(dir, { recursive: true })
	}
}

function fileSize(path: string): number | null {
	try {
		const stat = statSync(path)
		return stat.isFile() ? stat.size : null
	} catch {
		return null
	}
}

export type PlaceResult =
	| { success: true; path: string; copied: boolean; linked?: true }
	| { success: false; error: string }

/** ROMs this large are linked into the tree instead of copied */
export const LARGE_ROM_BYTES = 1_000_000_000

/**
 * Copy a resolved ROM into its Roms/<folder> directory, or symlink it when
 * it is at least `linkThreshold` bytes.
 * Already in place, or a same-size file with that name exists → no copy.
 */
export function placeRom(
	rom: ResolvedRom,
	romDir: string,
	scratchDir: string,
	linkThreshold = LARGE_ROM_BYTES,
): PlaceResult {
	const dest = join(romDir, rom.filename)
	if (resolve(rom.path) === resolve(dest)) {
		return { success: true, path: dest, copied: false }
	}
	const sourceSize = fileSize(rom.path)
	if (sourceSize === null) {
		return { success: false, error: `${rom.path} is missing` }
	}
	if (fileSize(dest) === sourceSize) {
		return { success: true, path: dest, copied: false }
	}

	const link = sourceSize >= linkThreshold
	const tmp = join(scratchDir, "copy", `${rom.filename}.tmp`)
	try {
		mkdirSync(romDir, { recursive: true })
		mkdirSync(join(scratchDir, "copy"), { recursive: true })
		rmSync(tmp, { force: true })
		if (link) symlinkSync(resolve(rom.path), tmp)
		else copyFileSync(rom.path, tmp)
		renameSync(tmp, dest)
	} catch (err) {
		rmSync(tmp, { force: true })
		return { success: false, error: errorMessage(err) }
	}
	log.tree.debug({ source: rom.path, dest, link }, "placed ROM")
	return link
		? { success: true, path: dest, copied: true, linked: true }
		: { success: true, path: dest, copied: true }
}

/**
 * Build a directory of symlinks to the resolved ROMs, for scraping without
 * copying them into the output tree.
 */
export function linkRoms(roms: readonly ResolvedRom[], linkDir: string): void {
	rmSync(linkDir, { recursive: true, force: true })
	mkdirSync(linkDir, { recursive: true })
	for (const rom of roms) {
		try {
			symlinkSync(resolve(rom.path), join(linkDir, rom.filename))
		} catch (err) {
			log.tree.warn({ path: rom.path, error: errorMessage(err) }, "cannot link ROM")
		}
	}
}

/** Remove scraper artifacts from a catalogue directory */
export function cleanupCatalogue(catalogueDir: string): void {
	rmSync(join(catalogueDir, GAMELIST_FILENAME), { force: true })
	for (const name of LEFTOVER_DIRS) {
		rmSync(join(catalogueDir, name), { recursive: true, force: true })
	}
}

/** Start a build with an empty scratch directory */
export function resetWorkDir(dir: string): void {
	rmSync(dir, { recursive: true, force: true })
	mkdirSync(dir, { recursive: true })
}

export function removeWorkDir(dir: string): void {
	rmSync(dir, { recursive: true, force: true })
}
