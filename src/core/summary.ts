/**
 * Folds build events into the end-of-run summary
 */

import type { BuildSummary, PlatformSummary } from "../types.js"
import type { BuildEvent } from "./types.js"

export class BuildSummaryCollector {
	private entries = 0
	private readonly skippedRows: BuildSummary["skippedRows"] = []
	private readonly platforms = new Map<string, PlatformSummary>()
	private readonly unresolved: BuildSummary["unresolved"] = []
	private readonly bios = new Set<string>()
	private cancelled = false

	private platform(folderCode: string, catalogueName = folderCode): PlatformSummary {
		let summary = this.platforms.get(folderCode)
		if (!summary) {
			summary = {
				folderCode,
				catalogueName,
				resolved: 0,
				unresolved: 0,
				downloaded: 0,
				texts: 0,
				boxes: 0,
				previews: 0,
				failedPasses: [],
			}
			this.platforms.set(folderCode, summary)
		}
		return summary
	}

	add(event: BuildEvent): void {
		switch (event.type) {
			case "catalog":
				this.entries = event.entries
				this.skippedRows.push(...event.skipped)
				break
			case "unmapped":
				this.unresolved.push(event.unresolved)
				break
			case "platform-start":
				this.platform(event.folderCode, event.catalogueName)
				break
			case "resolved": {
				const summary = this.platform(event.folderCode)
				summary.resolved++
				if (event.rom.provenance === "downloaded") summary.downloaded++
				break
			}
			case "unresolved":
				this.platform(event.folderCode).unresolved++
				this.unresolved.push(event.unresolved)
				break
			case "platform-skipped":
				this.platform(event.folderCode, event.catalogueName).skipped = event.reason
				break
			case "scrape-pass":
				if (event.status === "failed") {
					this.platform(event.folderCode).failedPasses.push(event.pass)
				}
				break
			case "text":
				this.platform(event.folderCode).texts += event.written
				break
			case "artwork": {
				const summary = this.platform(event.folderCode)
				if (event.kind === "box") summary.boxes += event.written
				else summary.previews += event.written
				break
			}
			case "bios":
				for (const copy of event.copies) {
					if (copy.status !== "failed") this.bios.add(copy.filename)
				}
				break
			case "cancelled":
				this.cancelled = true
				break
			case "artwork-error":
			case "platform-complete":
			case "done":
				break
		}
	}

	summary(): BuildSummary {
		return {
			entries: this.entries,
			skippedRows: [...this.skippedRows],
			platforms: [...this.platforms.values()].map(p => ({
				...p,
				failedPasses: [...p.failedPasses],
			})),
			unresolved: [...this.unresolved].sort((a, b) => a.entry.row - b.entry.row),
			biosCopied: [...this.bios].sort(),
			cancelled: this.cancelled,
		}
	}
}

export function summarizeBuild(events: Iterable<BuildEvent>): BuildSummary {
	const collector = new BuildSummaryCollector()
	for (const event of events) collector.add(event)
	return collector.summary()
}

/** True when every entry resolved and no platform lost a pass */
export function isCleanBuild(summary: BuildSummary): boolean {
	return (
		!summary.cancelled &&
		summary.unresolved.length === 0 &&
		summary.platforms.every(p => p.failedPasses.length === 0 && !p.skipped)
	)
}
