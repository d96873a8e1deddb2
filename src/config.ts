/**
 * Configuration management with Zod validation
 */

import { existsSync, readFileSync } from "node:fs"
import { homedir } from "node:os"
import { join } from "node:path"
import { z } from "zod"
import { log } from "./logger.js"
import { DEFAULT_BOX_PROFILE, DEFAULT_PREVIEW_PROFILE } from "./paths.js"

const SizeSchema = z.object({
	width: z.number().int().min(1),
	height: z.number().int().min(1),
})

const ConfigSchema = z.object({
	jobs: z.number().int().min(1).max(16).default(4),
	retryCount: z.number().int().min(0).max(10).default(3),
	retryDelay: z.number().min(0).default(2),
	matchThreshold: z.number().min(0).max(1).default(0.5),
	remoteMatchThreshold: z.number().min(0).max(1).default(0.6),
	archiveBaseUrl: z.string().url().default("https://myrient.erista.me/files/"),
	// Skyscraper
	scraperPath: z.string().min(1).default("Skyscraper"),
	scraperCacheDir: z.string().optional(),
	maxFails: z.number().int().min(1).default(3),
	cacheTimeoutSec: z.number().int().min(1).default(300),
	generateTimeoutSec: z.number().int().min(1).default(180),
	boxProfile: z.string().default(DEFAULT_BOX_PROFILE),
	previewProfile: z.string().default(DEFAULT_PREVIEW_PROFILE),
	boxSize: SizeSchema.default({ width: 320, height: 240 }),
	previewSize: SizeSchema.default({ width: 515, height: 275 }),
	// ScreenScraper credentials
	screenscraperUser: z.string().optional(),
	screenscraperPassword: z.string().optional(),
})

export type Config = z.infer<typeof ConfigSchema>

const DEFAULT_CONFIG: Config = ConfigSchema.parse({})

export function configPaths(cwd = process.cwd(), home = homedir()): string[] {
	return [
		join(cwd, ".muoscuratorrc"),
		join(cwd, ".muoscuratorrc.json"),
		join(home, ".muoscuratorrc"),
		join(home, ".muoscuratorrc.json"),
	]
}

/** Validate a raw config object; returns the issues instead of throwing */
export function parseConfig(
	raw: unknown,
): { success: true; config: Config } | { success: false; error: string } {
	const result = ConfigSchema.safeParse(raw)
	if (result.success) return { success: true, config: result.data }
	const error = result.error.issues
		.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
		.join("; ")
	return { success: false, error }
}

/**
 * Load configuration from .muoscuratorrc (JSON format)
 * Checks current directory first, then home directory.
 * Credentials from SCREENSCRAPER_USER / SCREENSCRAPER_PASSWORD fill in
 * whatever the file leaves out.
 */
export function loadConfig(
	paths: string[] = configPaths(),
	env: NodeJS.ProcessEnv = process.env,
): Config {
	let config = DEFAULT_CONFIG

	for (const path of paths) {
		if (!existsSync(path)) continue
		let raw: unknown
		try {
			raw = JSON.parse(readFileSync(path, "utf-8"))
		} catch (err) {
			log.cli.warn({ path, err }, "config file is not valid JSON, ignoring")
			continue
		}
		const parsed = parseConfig(raw)
		if (parsed.success) {
			config = parsed.config
			log.cli.debug({ path }, "loaded config")
			break
		}
		log.cli.warn({ path, error: parsed.error }, "invalid config file, ignoring")
	}

	const user = config.screenscraperUser ?? env["SCREENSCRAPER_USER"]
	const password = config.screenscraperPassword ?? env["SCREENSCRAPER_PASSWORD"]
	return {
		...config,
		...(user ? { screenscraperUser: user } : {}),
		...(password ? { screenscraperPassword: password } : {}),
	}
}

export interface ConfigOverrides {
	jobs?: number | undefined
	scraperPath?: string | undefined
	screenscraperUser?: string | undefined
	screenscraperPassword?: string | undefined
}

/** CLI flags override the config file, which overrides the defaults */
export function applyOverrides(config: Config, overrides: ConfigOverrides): Config {
	return {
		...config,
		...(overrides.jobs !== undefined ? { jobs: overrides.jobs } : {}),
		...(overrides.scraperPath ? { scraperPath: overrides.scraperPath } : {}),
		...(overrides.screenscraperUser
			? { screenscraperUser: overrides.screenscraperUser }
			: {}),
		...(overrides.screenscraperPassword
			? { screenscraperPassword: overrides.screenscraperPassword }
			: {}),
	}
}

export { DEFAULT_CONFIG }
