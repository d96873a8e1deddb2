/**
 * Skyscraper subprocess wrapper
 *
 * Only the exit status and the timeout are observed; output is kept for
 * logging. Tests swap the runner for a fake.
 */

import { spawn } from "node:child_process"
import { join } from "node:path"
import { MissingToolError } from "../../errors.js"
import type { ArtworkKind } from "../../types.js"

export interface ToolRunResult {
	/** null when the process never started or was killed */
	exitCode: number | null
	timedOut: boolean
	stdout: string
	stderr: string
	/** Spawn failure message */
	error?: string
}

export type ToolRunner = (
	command: string,
	args: readonly string[],
	options: { timeoutMs: number },
) => Promise<ToolRunResult>

const OUTPUT_LIMIT = 64 * 1024
const KILL_GRACE_MS = 5_000

function appendCapped(current: string, chunk: Buffer): string {
	const next = current + chunk.toString("utf-8")
	return next.length > OUTPUT_LIMIT ? next.slice(-OUTPUT_LIMIT) : next
}

/**
 * Spawn-based runner: SIGTERM on timeout, SIGKILL if the process ignores it.
 */
export const spawnRunner: ToolRunner = (command, args, { timeoutMs }) =>
	new Promise(resolve => {
		let stdout = ""
		let stderr = ""
		let timedOut = false
		let settled = false
		let killTimer: NodeJS.Timeout | undefined

		const proc = spawn(command, [...args], { stdio: ["ignore", "pipe", "pipe"] })

		const timer = setTimeout(() => {
			timedOut = true
			proc.kill("SIGTERM")
			killTimer = setTimeout(() => proc.kill("SIGKILL"), KILL_GRACE_MS)
		}, timeoutMs)

		const finish = (result: ToolRunResult): void => {
			if (settled) return
			settled = true
			clearTimeout(timer)
			if (killTimer) clearTimeout(killTimer)
			resolve(result)
		}

		proc.stdout.on("data", (chunk: Buffer) => {
			stdout = appendCapped(stdout, chunk)
		})
		proc.stderr.on("data", (chunk: Buffer) => {
			stderr = appendCapped(stderr, chunk)
		})

		proc.on("close", code => {
			finish({ exitCode: timedOut ? null : code, timedOut, stdout, stderr })
		})

		proc.on("error", err => {
			finish({ exitCode: null, timedOut, stdout, stderr, error: err.message })
		})
	})

/**
 * Check if a command-line tool is available
 */
export async function hasCommand(command: string): Promise<boolean> {
	return new Promise(resolve => {
		const proc = spawn("which", [command], { stdio: "ignore" })
		proc.on("close", code => {
			resolve(code === 0)
		})
		proc.on("error", () => resolve(false))
	})
}

export function skyscraperInstallHint(): string {
	return "Install Skyscraper (https://github.com/Gemba/skyscraper) or point --scraper at the binary."
}

/** Throws MissingToolError when the scraper binary cannot be found */
export async function ensureScraper(
	command: string,
	check: (command: string) => Promise<boolean> = hasCommand,
): Promise<void> {
	if (!(await check(command))) {
		throw new MissingToolError(command, skyscraperInstallHint())
	}
}

export interface ScraperInvocation {
	platform: string
	romDir: string
	cacheDir?: string | undefined
}

/** Online pass: fills the scraper cache from ScreenScraper */
export function cachePassArgs(
	invocation: ScraperInvocation,
	options: { user?: string | undefined; password?: string | undefined; maxFails: number },
): string[] {
	return [
		"-p",
		invocation.platform,
		"-s",
		"screenscraper",
		...(options.user && options.password
			? ["-u", `${options.user}:${options.password}`]
			: []),
		"-i",
		invocation.romDir,
		...(invocation.cacheDir ? ["-d", invocation.cacheDir] : []),
		"--flags",
		"unattend,skipped,nobrackets",
		"--verbosity",
		"1",
		"--maxfails",
		String(options.maxFails),
	]
}

/** Offline pass: renders artwork and the gamelist export from the cache */
export function generatePassArgs(
	invocation: ScraperInvocation,
	options: { workDir: string; kind: ArtworkKind; profile: string },
): string[] {
	return [
		"-p",
		invocation.platform,
		"-i",
		invocation.romDir,
		...(invocation.cacheDir ? ["-d", invocation.cacheDir] : []),
		"-g",
		options.workDir,
		"-o",
		join(options.workDir, options.kind),
		"-a",
		options.profile,
		"-f",
		"emulationstation",
		"--flags",
		"unattend,nobrackets,nosubdirs",
		"--verbosity",
		"1",
	]
}

/** Redact credentials before logging an argument list */
export function redactArgs(args: readonly string[]): string[] {
	return args.map((arg, index) => (args[index - 1] === "-u" ? "<credentials>" : arg))
}
