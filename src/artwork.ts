/**
 * Artwork normalization: crop-to-fit resize of scraped images to the muOS
 * box and preview resolutions, named after the ROM.
 */

import { existsSync, renameSync, rmSync } from "node:fs"
import { extname, join } from "node:path"
import sharp from "sharp"
import { errorMessage } from "./errors.js"
import { log } from "./logger.js"
import type { ArtworkKind, ArtworkSize, ResolvedRom, ScrapeResult } from "./types.js"

/** Resize `input` into `output` at exactly `target` */
export type ImageResizer = (input: string, output: string, target: ArtworkSize) => Promise<void>

const IMAGE_EXTENSIONS = [".png", ".jpg", ".jpeg", ".webp"] as const

/** Subdirectories of a pass output searched when the export has no reference */
const FALLBACK_SUBDIRS = ["", "covers", "screenshots", "media/covers", "media/screenshots"]

export const sharpResizer: ImageResizer = async (input, output, target) => {
	const tmp = `${output}.tmp${extname(output)}`
	try {
		await sharp(input)
			.resize(target.width, target.height, { fit: "cover", position: "centre" })
			.toFile(tmp)
		renameSync(tmp, output)
	} catch (err) {
		rmSync(tmp, { force: true })
		throw err
	}
}

export interface ArtworkOptions {
	size: ArtworkSize
	/** Pass output directory searched when the export gives no image */
	searchDir?: string | undefined
	resizer?: ImageResizer | undefined
}

export interface ArtworkFailure {
	baseName: string
	source: string
	error: string
}

export interface ArtworkResult {
	written: string[]
	failed: ArtworkFailure[]
}

/** Preferred export references per artwork kind */
function referencedImage(
	records: ScrapeResult,
	baseName: string,
	kind: ArtworkKind,
): string | undefined {
	const images = records.get(baseName)?.images
	if (!images) return undefined
	const ordered = kind === "box"
		? [images.thumbnail, images.image]
		: [images.image, images.thumbnail]
	return ordered.find((path): path is string => path !== undefined && existsSync(path))
}

/** `<baseName>.(png|jpg|jpeg|webp)` in the pass output or its media subfolders */
export function findImageByName(searchDir: string, baseName: string): string | undefined {
	for (const subdir of FALLBACK_SUBDIRS) {
		for (const ext of IMAGE_EXTENSIONS) {
			const candidate = join(searchDir, subdir, `${baseName}${ext}`)
			if (existsSync(candidate)) return candidate
		}
	}
	return undefined
}

/**
 * Normalize one artwork kind for every ROM of a platform into `destDir`.
 * A failing image is recorded and the others continue.
 */
export async function normalizeArtwork(
	roms: readonly ResolvedRom[],
	records: ScrapeResult,
	kind: ArtworkKind,
	destDir: string,
	options: ArtworkOptions,
): Promise<ArtworkResult> {
	const resizer = options.resizer ?? sharpResizer
	const written: string[] = []
	const failed: ArtworkFailure[] = []

	for (const rom of roms) {
		const source =
			referencedImage(records, rom.baseName, kind) ??
			(options.searchDir ? findImageByName(options.searchDir, rom.baseName) : undefined)
		if (!source) continue

		const output = join(destDir, `${rom.baseName}${extname(source)}`)
		try {
			await resizer(source, output, options.size)
			written.push(rom.baseName)
		} catch (err) {
			const error = errorMessage(err)
			log.artwork.warn({ source, kind, error }, "image resize failed")
			failed.push({ baseName: rom.baseName, source, error })
		}
	}

	return { written, failed }
}
