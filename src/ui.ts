/**
 * Terminal output helpers with consistent styling
 *
 * Spinner-aware: when an ora spinner is active, all output goes through
 * spinnerSafeLog() to avoid conflicts (flickering, line overwrites).
 */

import chalk from "chalk"
import { spinnerSafeLog } from "./spinner.js"
import type { BuildSummary } from "./types.js"

export const ui = {
	/** Section header with decorative border */
	header(text: string): void {
		spinnerSafeLog(chalk.cyan.bold(`\n═══ ${text} ═══\n`))
	},

	/** Success message with checkmark */
	success(text: string): void {
		spinnerSafeLog(chalk.green("✓") + " " + text)
	},

	/** Error message with X mark */
	error(text: string): void {
		spinnerSafeLog(chalk.red("✗") + " " + text)
	},

	/** Warning message */
	warn(text: string): void {
		spinnerSafeLog(chalk.yellow("⚠") + " " + text)
	},

	/** Info message */
	info(text: string): void {
		spinnerSafeLog(chalk.blue("ℹ") + " " + text)
	},

	/** Debug message (only shown if verbose) */
	debug(text: string, verbose: boolean): void {
		if (verbose) {
			spinnerSafeLog(chalk.dim("  → " + text))
		}
	},

	/** Banner for startup */
	banner(
		version: string,
		catalogPath: string,
		outputDir: string,
		options: { download: boolean; artwork: boolean; copy: boolean },
	): void {
		console.log(chalk.bold("muOS Catalogue Curator") + ` v${version}`)
		console.log(`Catalog: ${chalk.cyan(catalogPath)}`)
		console.log(`Output: ${chalk.cyan(outputDir)}`)
		const flags = [
			options.download ? "download missing" : null,
			options.artwork ? null : "no artwork",
			options.copy ? null : "no copy",
		].filter((f): f is string => f !== null)
		if (flags.length > 0) {
			console.log(`Mode: ${chalk.cyan(flags.join(", "))}`)
		}
		console.log()
	},

	/** Format a list of results for summary */
	summarySection(title: string, items: string[], color: "green" | "red"): void {
		if (items.length === 0) return
		const colorFn = color === "green" ? chalk.green : chalk.red
		const symbol = color === "green" ? "✓" : "✗"
		console.log(colorFn(`${title} (${items.length}):`))
		for (const item of items) {
			console.log(`  ${symbol} ${item}`)
		}
	},

	/** Per-platform table printed at the end of a build */
	buildSummary(summary: BuildSummary): void {
		console.log()
		console.log(chalk.bold(`Summary (${summary.entries} catalog entries)`))
		for (const p of summary.platforms) {
			const label = `${p.folderCode.padEnd(7)} ${p.catalogueName}`
			if (p.skipped) {
				console.log(`  ${chalk.yellow("○")} ${label}: skipped (${p.skipped})`)
				continue
			}
			const counts = `${p.resolved} resolved, ${p.unresolved} unresolved, ${p.downloaded} downloaded | text ${p.texts}, box ${p.boxes}, preview ${p.previews}`
			const symbol = p.unresolved > 0 || p.failedPasses.length > 0
				? chalk.yellow("⚠")
				: chalk.green("✓")
			console.log(`  ${symbol} ${label}: ${counts}`)
			if (p.failedPasses.length > 0) {
				console.log(chalk.dim(`      failed passes: ${p.failedPasses.join(", ")}`))
			}
		}
		ui.summarySection(
			"Unresolved",
			summary.unresolved.map(
				u => `${u.entry.title} (${u.entry.system}) – ${u.reason}: ${u.detail}`,
			),
			"red",
		)
		if (summary.biosCopied.length > 0) {
			console.log(chalk.dim(`BIOS copied: ${summary.biosCopied.join(", ")}`))
		}
	},

	/** Final status line */
	finalStatus(allSuccess: boolean, cancelled: boolean): void {
		console.log()
		if (cancelled) {
			console.log(chalk.yellow.bold("⚠ Build interrupted. Re-run to continue."))
		} else if (allSuccess) {
			console.log(chalk.green.bold("✓ Library built successfully!"))
		} else {
			console.log(
				chalk.yellow.bold("⚠ Library built with gaps. Fix the catalog and re-run."),
			)
		}
		console.log()
	},
}
