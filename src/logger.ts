/**
 * Centralized logging with pino
 *
 * Design: Dual-output architecture
 * - Pino handles structured JSON logging for debugging/files
 * - UI module (ui.ts) handles user-facing CLI output
 *
 * Log levels:
 * - fatal: Setup error, build aborted
 * - error: Platform pass or download failed
 * - warn: Recoverable issue (skipped row, unmapped system)
 * - info: Key milestones (default for production)
 * - debug: Detailed operation info (--verbose)
 * - trace: Match scoring details
 */

import { existsSync, mkdirSync } from "node:fs"
import { dirname } from "node:path"
import pino from "pino"

// Determine log level from environment or use sensible default
const level =
	process.env["LOG_LEVEL"] || (process.env["DEBUG"] ? "debug" : "info")

// Use pino-pretty for development, raw JSON for production/CI
const isDev = process.stdout.isTTY && !process.env["CI"]

export interface ConfigureLoggingOptions {
	/** When set, structured logs go to this file instead of the console */
	logFilePath?: string | undefined
	/** Raise the console level to debug */
	verbose?: boolean | undefined
}

let currentLogFilePath: string | null = null

function ensureDirExists(path: string): void {
	const dir = dirname(path)
	if (!existsSync(dir)) {
		mkdirSync(dir, { recursive: true })
	}
}

function createConsoleLogger(consoleLevel: string) {
	return isDev
		? pino({
				level: consoleLevel,
				transport: {
					target: "pino-pretty",
					options: {
						colorize: true,
						translateTime: "HH:MM:ss",
						ignore: "pid,hostname",
						messageFormat: "{module}: {msg}",
					},
				},
			})
		: pino({
				level: consoleLevel,
				base: { pid: undefined, hostname: undefined },
			})
}

function createFileLogger(path: string) {
	ensureDirExists(path)
	// process.exitCode is set right after a fatal error; keep writes synchronous
	// so the last lines reach the file.
	const destination = pino.destination({ dest: path, sync: true })
	const fileLevel = process.env["LOG_LEVEL_FILE"] ?? "debug"
	return pino(
		{
			level: fileLevel,
			base: { pid: undefined, hostname: undefined },
		},
		destination,
	)
}

/**
 * Root logger instance
 * In most cases, use createLogger() to get a module-specific child logger
 */
export let logger = createConsoleLogger(level)

/** Configure logging for a CLI run. */
export function configureLogging(options: ConfigureLoggingOptions): {
	logFilePath: string | null
} {
	if (options.logFilePath) {
		if (currentLogFilePath !== options.logFilePath) {
			currentLogFilePath = options.logFilePath
			logger = createFileLogger(options.logFilePath)
		}
		return { logFilePath: currentLogFilePath }
	}

	if (options.verbose && !process.env["LOG_LEVEL"]) {
		logger = createConsoleLogger("debug")
	}
	return { logFilePath: currentLogFilePath }
}

/** Returns the current log file path if file logging is enabled. */
export function getLogFilePath(): string | null {
	return currentLogFilePath
}

/**
 * Create a child logger for a specific module
 * @example
 * const log = createLogger("locator")
 * log.debug({ title, candidate }, "fuzzy match")
 */
export function createLogger(module: string) {
	return logger.child({ module })
}

/**
 * Flush pending log writes (call before process exit)
 */
export function flushLogs(): Promise<void> {
	return new Promise(resolve => {
		logger.flush(() => resolve())
	})
}

// Pre-created loggers for common modules (getters so they follow reconfiguration)
export const log = {
	get catalog() {
		return createLogger("catalog")
	},
	get locator() {
		return createLogger("locator")
	},
	get download() {
		return createLogger("download")
	},
	get scrape() {
		return createLogger("scrape")
	},
	get artwork() {
		return createLogger("artwork")
	},
	get tree() {
		return createLogger("tree")
	},
	get cli() {
		return createLogger("cli")
	},
} as const
