#!/usr/bin/env node
/**
 * muos-curator CLI
 * Builds a muOS game library (ROMs, BIOS, box art, previews, descriptions)
 * from a curated spreadsheet of titles.
 */

import { readFileSync } from "node:fs"
import { join, resolve } from "node:path"
import { Command, InvalidArgumentError } from "commander"
import { applyOverrides, loadConfig } from "../config.js"
import { buildLibrary } from "../core/builder.js"
import { BuildSummaryCollector, isCleanBuild } from "../core/summary.js"
import type { BuildEvent } from "../core/types.js"
import { closeHttpAgent } from "../download.js"
import { errorMessage, isFatalError } from "../errors.js"
import { configureLogging, flushLogs, log } from "../logger.js"
import { PACKAGE_ROOT } from "../paths.js"
import { writeReport } from "../report.js"
import { drainSpinnerLog, startSpinner, stopSpinner } from "../spinner.js"
import { ui } from "../ui.js"

interface CliOptions {
	romDirs: string[]
	output: string
	ssUser?: string
	ssPass?: string
	downloadMissing: boolean
	artwork: boolean
	copy: boolean
	jobs?: number
	scraper?: string
	logFile?: string
	quiet: boolean
	verbose: boolean
}

function readVersion(): string {
	try {
		const raw: unknown = JSON.parse(readFileSync(join(PACKAGE_ROOT, "package.json"), "utf-8"))
		if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
			return raw.version
		}
	} catch (err) {
		log.cli.debug({ err }, "cannot read package version")
	}
	return "0.0.0"
}

function parseJobs(value: string): number {
	const jobs = parseInt(value, 10)
	if (!Number.isInteger(jobs) || jobs < 1 || jobs > 16) {
		throw new InvalidArgumentError("jobs must be an integer between 1 and 16")
	}
	return jobs
}

async function exitWithCode(code: number): Promise<void> {
	if (code === 0) return
	try {
		await flushLogs()
	} catch (err) {
		// Never block exiting on log flush failures
		console.error(errorMessage(err))
	}
	process.exitCode = code
}

function renderEvent(event: BuildEvent, options: CliOptions): void {
	const { quiet, verbose } = options
	switch (event.type) {
		case "catalog": {
			if (!quiet) ui.info(`Catalog: ${event.entries} entries`)
			for (const row of event.skipped) {
				ui.warn(`Catalog row ${row.row} skipped: ${row.reason}`)
			}
			break
		}
		case "unmapped": {
			const { entry, detail } = event.unresolved
			ui.warn(`Row ${entry.row} "${entry.title}": ${detail}`)
			break
		}
		case "platform-start": {
			if (!quiet) ui.header(`${event.catalogueName} (${event.folderCode})`)
			break
		}
		case "resolved": {
			ui.debug(
				`${event.rom.entry.title} → ${event.rom.filename} (${event.rom.provenance})`,
				verbose,
			)
			break
		}
		case "unresolved": {
			const { entry, reason, detail } = event.unresolved
			ui.warn(`${entry.title}: ${reason} (${detail})`)
			break
		}
		case "platform-skipped": {
			ui.warn(`${event.catalogueName}: skipped, ${event.reason}`)
			break
		}
		case "scrape-pass": {
			const label = `${event.folderCode}: ${event.pass} pass`
			if (event.status === "start") {
				startSpinner(`${label}…`, quiet)
			} else if (event.status === "ok") {
				stopSpinner({ status: "succeed", text: label })
			} else {
				stopSpinner({ status: "fail", text: `${label} failed: ${event.error ?? "unknown error"}` })
				if (quiet) ui.error(`${label} failed: ${event.error ?? "unknown error"}`)
			}
			break
		}
		case "text": {
			if (event.error) ui.warn(`${event.folderCode}: no descriptions (${event.error})`)
			else ui.debug(`${event.folderCode}: ${event.written} descriptions`, verbose)
			break
		}
		case "artwork": {
			ui.debug(`${event.folderCode}: ${event.written} ${event.kind} images`, verbose)
			break
		}
		case "artwork-error": {
			ui.warn(`${event.folderCode}: ${event.kind} image for ${event.baseName} failed: ${event.error}`)
			break
		}
		case "platform-complete": {
			if (!quiet) ui.success(`${event.catalogueName} done`)
			break
		}
		case "bios": {
			const copied = event.copies.filter(c => c.status === "copied").length
			if (!quiet && event.copies.length > 0) {
				ui.info(`BIOS: ${copied} copied, ${event.copies.length - copied} already present`)
			}
			break
		}
		case "cancelled": {
			ui.warn(
				event.remaining.length > 0
					? `Interrupted; not processed: ${event.remaining.join(", ")}`
					: "Interrupted",
			)
			break
		}
		case "done":
			break
	}
}

async function run(catalog: string, options: CliOptions): Promise<void> {
	configureLogging({ logFilePath: options.logFile, verbose: options.verbose })
	const config = applyOverrides(loadConfig(), {
		jobs: options.jobs,
		scraperPath: options.scraper,
		screenscraperUser: options.ssUser,
		screenscraperPassword: options.ssPass,
	})
	const outputDir = resolve(options.output)

	if (!options.quiet) {
		ui.banner(VERSION, catalog, outputDir, {
			download: options.downloadMissing,
			artwork: options.artwork,
			copy: options.copy,
		})
	}

	const controller = new AbortController()
	const onInterrupt = (): void => {
		if (controller.signal.aborted) process.exit(130)
		stopSpinner()
		ui.warn("Interrupt received; stopping after the current platform (Ctrl+C again to quit)")
		controller.abort()
	}
	process.on("SIGINT", onInterrupt)

	const collector = new BuildSummaryCollector()
	try {
		for await (const event of buildLibrary({
			catalogPath: resolve(catalog),
			romDirs: options.romDirs.map(dir => resolve(dir)),
			outputDir,
			config,
			download: options.downloadMissing,
			artwork: options.artwork,
			copy: options.copy,
			signal: controller.signal,
		})) {
			collector.add(event)
			renderEvent(event, options)
		}
	} catch (err) {
		stopSpinner()
		if (isFatalError(err)) {
			log.cli.fatal({ code: err.code }, err.message)
			ui.error(err.message)
			await exitWithCode(1)
			return
		}
		throw err
	} finally {
		process.off("SIGINT", onInterrupt)
		stopSpinner()
		await drainSpinnerLog()
		await closeHttpAgent()
	}

	const summary = collector.summary()
	const reportPath = writeReport(outputDir, summary)
	if (!options.quiet) {
		ui.buildSummary(summary)
		ui.info(`Report: ${reportPath}`)
	}
	ui.finalStatus(isCleanBuild(summary), summary.cancelled)
}

const VERSION = readVersion()

const program = new Command()

program
	.name("muos-curator")
	.description("Build a curated muOS game library from a catalog spreadsheet")
	.version(VERSION)
	.argument("<catalog>", "Catalog CSV/TSV (System, Game Name, Category, Reason, Description, Notes, rom_path)")
	.requiredOption("--rom-dirs <dirs...>", "Directories to search for ROMs and BIOS files")
	.option("-o, --output <dir>", "Output directory", "muOS_Complete")
	.option("--ss-user <user>", "ScreenScraper username")
	.option("--ss-pass <pass>", "ScreenScraper password")
	.option("--download-missing", "Fetch ROMs not found locally from the archive", false)
	.option("--no-artwork", "Skip scraping (no box art, previews or descriptions)")
	.option("--no-copy", "Leave ROMs where they are; scrape through links")
	.option("-j, --jobs <n>", "Parallel downloads", parseJobs)
	.option("--scraper <path>", "Skyscraper binary")
	.option("--log-file <path>", "Write structured logs to a file")
	.option("-q, --quiet", "Minimal output", false)
	.option("--verbose", "Show every match and file written", false)
	.action(run)

// ─────────────────────────────────────────────────────────────────────────────
// Entry Point
// ─────────────────────────────────────────────────────────────────────────────

program.parseAsync().catch(async (err: unknown) => {
	stopSpinner()
	ui.error(errorMessage(err))
	log.cli.fatal({ err }, "unexpected error")
	await exitWithCode(1)
})
