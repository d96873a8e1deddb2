/**
 * Fuzzy title matching between catalog titles and ROM filenames
 *
 * Scoring is pluggable through MatchScorer; the default tokenSetScorer works
 * on normalized word sets. Selection is deterministic: equal scores are
 * broken by the shorter filename, then by plain string order.
 */

import { stripExtension } from "./romname.js"

/** Scores two normalized titles in [0, 1] */
export type MatchScorer = (a: string, b: string) => number

export interface MatchOptions {
	threshold?: number
	scorer?: MatchScorer
	/** Per-candidate multiplier (region preference) applied before the threshold */
	bonus?: (filename: string) => number
}

export interface MatchResult {
	filename: string
	score: number
}

const STOP_WORDS = new Set(["the", "a", "an", "of", "in", "on", "at", "to", "for"])

export function normalizeTitle(value: string): string {
	const folded = value.normalize("NFKD").replace(/[\u0300-\u036f]/g, "")
	return folded
		.replace(/\([^)]*\)|\[[^\]]*\]|\{[^}]*\}/g, " ")
		.replace(/&/g, " and ")
		.replace(/['’]/g, "")
		.replace(/[^A-Za-z0-9]+/g, " ")
		.toLowerCase()
		.split(" ")
		.filter(word => word.length > 0 && !STOP_WORDS.has(word))
		.join(" ")
}

/**
 * "Pokemon Red/Blue" → ["Pokemon Red", "Pokemon Blue", "Pokemon Red/Blue"].
 * Titles without a slash in their last word are returned unchanged.
 */
export function titleVariants(title: string): string[] {
	const trimmed = title.trim()
	const lastSpace = trimmed.lastIndexOf(" ")
	const base = lastSpace === -1 ? "" : trimmed.slice(0, lastSpace)
	const last = lastSpace === -1 ? trimmed : trimmed.slice(lastSpace + 1)
	if (!last.includes("/")) return [trimmed]

	const variants = last
		.split("/")
		.filter(part => part.length > 0)
		.map(part => (base ? `${base} ${part}` : part))
	return [...variants, trimmed]
}

export const tokenSetScorer: MatchScorer = (a, b) => {
	if (!a || !b) return 0
	if (a === b) return 1
	if (a.startsWith(`${b} `) || b.startsWith(`${a} `)) return 0.9

	const wordsA = new Set(a.split(" "))
	const wordsB = new Set(b.split(" "))
	let common = 0
	for (const word of wordsA) {
		if (wordsB.has(word)) common++
	}
	return (0.85 * common) / Math.max(wordsA.size, wordsB.size)
}

function compareCandidates(a: MatchResult, b: MatchResult): number {
	if (a.score !== b.score) return b.score - a.score
	if (a.filename.length !== b.filename.length) {
		return a.filename.length - b.filename.length
	}
	return a.filename < b.filename ? -1 : a.filename > b.filename ? 1 : 0
}

/** Score one filename against every variant of a title */
export function scoreCandidate(
	title: string,
	filename: string,
	scorer: MatchScorer = tokenSetScorer,
): number {
	const candidate = normalizeTitle(stripExtension(filename))
	let best = 0
	for (const variant of titleVariants(title)) {
		best = Math.max(best, scorer(normalizeTitle(variant), candidate))
	}
	return best
}

/**
 * Pick the best-scoring filename for a title, or null when nothing reaches
 * the threshold.
 */
export function selectBestMatch(
	title: string,
	candidates: readonly string[],
	options: MatchOptions = {},
): MatchResult | null {
	const { threshold = 0.5, scorer = tokenSetScorer, bonus } = options
	let best: MatchResult | null = null

	for (const filename of candidates) {
		let score = scoreCandidate(title, filename, scorer)
		if (score === 0) continue
		if (bonus) score *= bonus(filename)
		if (score < threshold) continue

		const result = { filename, score }
		if (!best || compareCandidates(result, best) < 0) best = result
	}

	return best
}
