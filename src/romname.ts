/**
 * ROM filename parsing helpers.
 * Splits No-Intro / Redump style names into a title and the tags that
 * matter when choosing between dumps: regions, release status and disc.
 */

export interface ParsedRomName {
	/** Filename without extension */
	baseName: string
	/** Title with trailing tags removed */
	title: string
	/** Region labels in the order they appear (e.g. USA, Europe) */
	regions: string[]
	flags: {
		prerelease: boolean
		unlicensed: boolean
		hack: boolean
	}
	/** 1-based disc number when the dump is one disc of several */
	disc?: number
}

const REGION_LABELS: Record<string, string> = {
	usa: "USA",
	us: "USA",
	u: "USA",
	world: "World",
	w: "World",
	europe: "Europe",
	eu: "Europe",
	e: "Europe",
	japan: "Japan",
	j: "Japan",
	uk: "United Kingdom",
	australia: "Australia",
	germany: "Germany",
	france: "France",
	spain: "Spain",
	italy: "Italy",
	korea: "Korea",
	brazil: "Brazil",
	asia: "Asia",
	canada: "Canada",
}

const PRERELEASE = /^(beta|demo|proto|prototype|sample|preview|alpha|pre-?release)\b/i
const UNLICENSED = /^(unl|unlicensed|pirate|bootleg)\b/i
const HACK = /^(hack|hacked|romhack)\b/i
const DISC = /^(?:disc|disk|cd|gd)\s*(\d+)(?:\s*of\s*\d+)?$/i

function stripTrailingTags(value: string): string {
	let output = value
	const trailingTag = /\s*(\([^)]*\)|\[[^\]]*\])\s*$/
	while (trailingTag.test(output)) {
		output = output.replace(trailingTag, "")
	}
	return output.trim()
}

export function stripExtension(filename: string): string {
	return filename.replace(/\.[^.]+$/, "")
}

export function parseRomFilename(filename: string): ParsedRomName {
	const baseName = stripExtension(filename)
	const title = stripTrailingTags(baseName)
	const regions: string[] = []
	const flags = { prerelease: false, unlicensed: false, hack: false }
	let disc: number | undefined

	const tagRegex = /\(([^)]+)\)|\[([^\]]+)\]/g
	let match: RegExpExecArray | null
	while ((match = tagRegex.exec(baseName)) !== null) {
		const group = match[1] ?? match[2] ?? ""
		for (const rawToken of group.split(",")) {
			const token = rawToken.trim()
			if (!token) continue

			const label = REGION_LABELS[token.toLowerCase()]
			if (label) {
				if (!regions.includes(label)) regions.push(label)
				continue
			}
			const discMatch = DISC.exec(token)
			if (discMatch && disc === undefined) {
				disc = parseInt(discMatch[1] ?? "", 10)
				continue
			}
			if (PRERELEASE.test(token)) flags.prerelease = true
			else if (UNLICENSED.test(token)) flags.unlicensed = true
			else if (HACK.test(token)) flags.hack = true
		}
	}

	return {
		baseName,
		title: title || baseName,
		regions,
		flags,
		...(disc !== undefined && Number.isFinite(disc) ? { disc } : {}),
	}
}

/** Multiplier applied to a match score for preferred regions */
export const REGION_BONUS: Readonly<Record<string, number>> = {
	USA: 1.2,
	World: 1.1,
	Europe: 1.05,
}

/**
 * Region preference bonus for a filename: the best bonus among its regions,
 * reduced for prerelease, unlicensed or hacked dumps.
 */
export function regionBonus(filename: string): number {
	const parsed = parseRomFilename(filename)
	let bonus = 1
	for (const region of parsed.regions) {
		bonus = Math.max(bonus, REGION_BONUS[region] ?? 1)
	}
	if (parsed.flags.prerelease || parsed.flags.unlicensed || parsed.flags.hack) {
		bonus *= 0.5
	}
	return bonus
}
