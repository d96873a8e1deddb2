/**
 * Platform registry: maps curator-typed console names onto muOS folder
 * codes, Skyscraper platform ids and catalogue directory names.
 */

import { readFileSync } from "node:fs"
import { basename, extname, join, sep } from "node:path"
import { z } from "zod"
import { RegistryError, errorMessage } from "./errors.js"
import { log } from "./logger.js"
import { PLATFORMS_FILE } from "./paths.js"
import type {
	CatalogEntry,
	PlatformBucket,
	PlatformDescriptor,
	UnresolvedEntry,
} from "./types.js"

const PlatformSchema = z.object({
	folderCode: z.string().min(1),
	scraperPlatform: z.string().min(1),
	catalogueName: z.string().min(1),
	screenscraperId: z.number().int().positive(),
	aliases: z.array(z.string().min(1)),
	pathTokens: z.array(z.string().min(1)),
	extensions: z.array(z.string().regex(/^\.[a-z0-9]+$/)),
	archivePath: z.string().min(1).optional(),
	bios: z.array(z.string().min(1)),
})

const RegistrySchema = z.array(PlatformSchema).min(1)

/** Archive formats every platform accepts alongside its own extensions */
export const ARCHIVE_EXTENSIONS = [".zip", ".7z"] as const

/** Case- and whitespace-insensitive lookup key */
export function platformKey(value: string): string {
	return value.trim().toLowerCase().replace(/\s+/g, " ")
}

export interface RouteResult {
	buckets: PlatformBucket[]
	unmapped: UnresolvedEntry[]
}

export class PlatformRegistry {
	private readonly byKey = new Map<string, PlatformDescriptor>()
	private readonly byToken = new Map<string, PlatformDescriptor>()
	private readonly biosNames: Set<string>

	constructor(readonly platforms: readonly PlatformDescriptor[]) {
		const folders = new Set<string>()
		for (const platform of platforms) {
			if (folders.has(platform.folderCode)) {
				throw new RegistryError(`duplicate folder code ${platform.folderCode}`)
			}
			folders.add(platform.folderCode)

			const keys = new Set(
				[platform.folderCode, platform.catalogueName, ...platform.aliases].map(
					platformKey,
				),
			)
			for (const key of keys) {
				const owner = this.byKey.get(key)
				if (owner) {
					throw new RegistryError(
						`alias "${key}" used by both ${owner.folderCode} and ${platform.folderCode}`,
					)
				}
				this.byKey.set(key, platform)
			}

			for (const token of platform.pathTokens) {
				const upper = token.toUpperCase()
				const owner = this.byToken.get(upper)
				if (owner && owner !== platform) {
					throw new RegistryError(
						`path token ${upper} used by both ${owner.folderCode} and ${platform.folderCode}`,
					)
				}
				this.byToken.set(upper, platform)
			}
		}
		this.biosNames = new Set(platforms.flatMap(p => p.bios.map(b => b.toLowerCase())))
	}

	/** Load and validate a registry file (defaults to the bundled one) */
	static load(path: string = PLATFORMS_FILE): PlatformRegistry {
		let raw: unknown
		try {
			raw = JSON.parse(readFileSync(path, "utf-8"))
		} catch (err) {
			throw new RegistryError(`cannot read ${path}: ${errorMessage(err)}`)
		}
		const parsed = RegistrySchema.safeParse(raw)
		if (!parsed.success) {
			const issue = parsed.error.issues[0]
			throw new RegistryError(
				issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid registry",
			)
		}
		return new PlatformRegistry(
			parsed.data.map(p => ({
				folderCode: p.folderCode,
				scraperPlatform: p.scraperPlatform,
				catalogueName: p.catalogueName,
				screenscraperId: p.screenscraperId,
				aliases: p.aliases,
				pathTokens: p.pathTokens,
				extensions: p.extensions,
				...(p.archivePath ? { archivePath: p.archivePath } : {}),
				bios: p.bios,
			})),
		)
	}

	resolve(system: string): PlatformDescriptor | undefined {
		return this.byKey.get(platformKey(system))
	}

	byFolder(folderCode: string): PlatformDescriptor | undefined {
		return this.platforms.find(p => p.folderCode === folderCode)
	}

	/**
	 * Group entries by platform in order of first appearance.
	 * Entries whose system is unknown come back as unmapped.
	 */
	route(entries: readonly CatalogEntry[], romsRoot: string): RouteResult {
		const buckets = new Map<string, PlatformBucket>()
		const unmapped: UnresolvedEntry[] = []

		for (const entry of entries) {
			const platform = this.resolve(entry.system)
			if (!platform) {
				log.catalog.warn({ row: entry.row, system: entry.system }, "unmapped platform")
				unmapped.push({
					entry,
					reason: "unmapped-platform",
					detail: `unknown system "${entry.system}"`,
				})
				continue
			}
			let bucket = buckets.get(platform.folderCode)
			if (!bucket) {
				bucket = {
					platform,
					romDir: join(romsRoot, platform.folderCode),
					entries: [],
				}
				buckets.set(platform.folderCode, bucket)
			}
			bucket.entries.push(entry)
		}

		return { buckets: [...buckets.values()], unmapped }
	}

	/**
	 * Guess the platform of a file inside a ROM source tree: the deepest
	 * directory named after a platform wins, then an extension that only one
	 * platform uses.
	 */
	detectFromPath(path: string): PlatformDescriptor | undefined {
		const segments = path.split(sep).slice(0, -1)
		for (let i = segments.length - 1; i >= 0; i--) {
			const platform = this.byToken.get((segments[i] ?? "").toUpperCase())
			if (platform) return platform
		}

		const ext = extname(path).toLowerCase()
		if (!ext) return undefined
		const owners = this.platforms.filter(p => p.extensions.includes(ext))
		return owners.length === 1 ? owners[0] : undefined
	}

	/** Extensions accepted in a platform's ROM folder */
	acceptedExtensions(platform: PlatformDescriptor): Set<string> {
		return new Set([...platform.extensions, ...ARCHIVE_EXTENSIONS])
	}

	/** Every extension any platform accepts */
	allRomExtensions(): Set<string> {
		return new Set([
			...this.platforms.flatMap(p => p.extensions),
			...ARCHIVE_EXTENSIONS,
		])
	}

	/** BIOS images are never treated as ROMs */
	isBiosFilename(path: string): boolean {
		const name = basename(path).toLowerCase()
		return this.biosNames.has(name) || name.startsWith("bios")
	}
}
