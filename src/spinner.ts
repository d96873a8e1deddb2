/**
 * Spinner handling for long-running steps (scraper passes, ROM downloads)
 *
 * Only one spinner is active at a time; all terminal output goes through
 * spinnerSafeLog() so messages don't get overwritten by spinner frames.
 */

import ora, { type Ora } from "ora"
import { log } from "./logger.js"

let activeSpinner: Ora | null = null
let spinnerText = ""

// Mutex for serializing log operations to prevent race conditions
let logLock = Promise.resolve()

/**
 * Log a message while a spinner may be active.
 * Stops the spinner, prints the message, then restarts it.
 */
export function spinnerSafeLog(message: string): void {
	// Also log to pino for structured logging
	log.cli.debug(message)

	if (activeSpinner) {
		logLock = logLock.then(
			() =>
				new Promise<void>(resolve => {
					if (activeSpinner) {
						activeSpinner.stop()
						console.log(message)
						activeSpinner.start(spinnerText)
					} else {
						console.log(message)
					}
					// Small delay to let terminal render
					setImmediate(resolve)
				}),
		)
	} else {
		console.log(message)
	}
}

/**
 * Start the shared spinner. Returns null in quiet mode or when stdout is not
 * a terminal.
 */
export function startSpinner(text: string, quiet: boolean): Ora | null {
	if (quiet || !process.stdout.isTTY) return null
	stopSpinner()
	spinnerText = text
	activeSpinner = ora({ text, prefixText: "" }).start()
	return activeSpinner
}

/** Stop the shared spinner, optionally leaving a final status line */
export function stopSpinner(
	final?: { status: "succeed" | "warn" | "fail"; text: string },
): void {
	const spinner = activeSpinner
	activeSpinner = null
	if (!spinner) return
	if (!final) {
		spinner.stop()
		return
	}
	spinner[final.status](final.text)
}

/** Wait for queued spinner-safe log lines to be printed */
export function drainSpinnerLog(): Promise<void> {
	return logLock
}
