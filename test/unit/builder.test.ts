/**
 * Integration tests for the build engine (fake scraper and resizer)
 */

import { copyFileSync, existsSync, readFileSync, readdirSync } from "node:fs"
import { join } from "node:path"
import { MockAgent } from "undici"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { DEFAULT_CONFIG } from "../../src/config.js"
import { buildLibrary } from "../../src/core/builder.js"
import { ExclusiveResource } from "../../src/core/scraper/lease.js"
import { summarizeBuild } from "../../src/core/summary.js"
import type { BuildEvent, BuildOptions } from "../../src/core/types.js"
import type { ImageResizer } from "../../src/artwork.js"
import { MissingToolError } from "../../src/errors.js"
import { formatReport } from "../../src/report.js"
import { argAfter, fakeRunner, withTempDir, writeTree } from "../helpers/index.js"

const CATALOG = [
	"System,Game Name,Category,Reason,Description,Notes,rom_path",
	"Game Boy Advance,Metroid Fusion,Action,,,,",
	"Game Boy Advance,Golden Sun,RPG,,A curated pick.,,",
	"Game Boy Advance,Advance Wars,Strategy,,,,",
	"Magnavox,Pong,,,,,",
	"Nintendo 64,Super Mario 64,,,,,",
].join("\n")

const ARCHIVE = "https://archive.test"
const GBA_LISTING = "/files/No-Intro/Nintendo%20-%20Game%20Boy%20Advance/"
const N64_LISTING = "/files/No-Intro/Nintendo%20-%20Nintendo%2064%20%28BigEndian%29/"

const GBA_CATALOGUE = join("MUOS", "info", "catalogue", "Nintendo Game Boy Advance")

function gameXml(baseName: string, kind: string): string {
	const title = baseName.replace(/ \(.*\)$/, "")
	const image = kind === "box" ? "thumbnail" : "image"
	return `<game><path>./${baseName}.gba</path><name>${title}</name><desc>Scraped.</desc><${image}>./${kind}/${baseName}.png</${image}></game>`
}

/** Behaves like Skyscraper's generation passes: export plus one image per ROM */
function scraper() {
	return fakeRunner(call => {
		const inputDir = argAfter(call.args, "-i")
		const exportDir = argAfter(call.args, "-g")
		const outDir = argAfter(call.args, "-o")
		if (!inputDir || !exportDir || !outDir) return
		const kind = outDir.endsWith("box") ? "box" : "preview"
		const baseNames = readdirSync(inputDir)
			.filter(name => name.endsWith(".gba"))
			.map(name => name.slice(0, -".gba".length))
		const files: Record<string, string> = {
			"gamelist.xml": `<gameList>${baseNames.map(name => gameXml(name, kind)).join("")}</gameList>`,
		}
		for (const name of baseNames) files[join(kind, `${name}.png`)] = "PNG"
		writeTree(exportDir, files)
	})
}

const copyResizer: ImageResizer = async (input, output) => {
	copyFileSync(input, output)
}

function setup(dir: string): void {
	writeTree(dir, {
		"catalog.csv": CATALOG,
		"src/GBA/Metroid Fusion (USA).gba": 8,
		"src/GBA/Golden Sun (USA).gba": 12,
		"src/gba_bios.bin": 16,
	})
}

function buildOptions(dir: string, overrides: Partial<BuildOptions> = {}): BuildOptions {
	return {
		catalogPath: join(dir, "catalog.csv"),
		romDirs: [join(dir, "src")],
		outputDir: join(dir, "out"),
		config: { ...DEFAULT_CONFIG, jobs: 2 },
		download: false,
		artwork: true,
		copy: true,
		runner: scraper().runner,
		toolCheck: async () => true,
		resizer: copyResizer,
		cacheLease: new ExclusiveResource("test-cache"),
		...overrides,
	}
}

async function collect(options: BuildOptions): Promise<BuildEvent[]> {
	const events: BuildEvent[] = []
	for await (const event of buildLibrary(options)) events.push(event)
	return events
}

describe("buildLibrary", () => {
	let agent: MockAgent

	beforeEach(() => {
		agent = new MockAgent()
		agent.disableNetConnect()
	})

	afterEach(async () => {
		await agent.close()
	})

	it("builds ROMs, text, artwork and BIOS for resolved platforms", async () => {
		await withTempDir(async dir => {
			setup(dir)
			const out = join(dir, "out")

			const events = await collect(buildOptions(dir))

			expect(events[0]).toEqual({ type: "catalog", entries: 5, skipped: [] })
			expect(events.map(e => e.type)).toContain("done")
			expect(readdirSync(join(out, "Roms", "GBA")).sort()).toEqual([
				"Golden Sun (USA).gba",
				"Metroid Fusion (USA).gba",
			])
			expect(readdirSync(join(out, GBA_CATALOGUE, "box")).sort()).toEqual([
				"Golden Sun (USA).png",
				"Metroid Fusion (USA).png",
			])
			expect(readdirSync(join(out, GBA_CATALOGUE, "preview"))).toHaveLength(2)
			expect(readFileSync(join(out, GBA_CATALOGUE, "text", "Metroid Fusion (USA).txt"), "utf-8")).toBe(
				"Metroid Fusion\n==============\n\nDescription:\n------------\nScraped.",
			)
			expect(readFileSync(join(out, GBA_CATALOGUE, "text", "Golden Sun (USA).txt"), "utf-8")).toBe(
				"Golden Sun\n==========\n\nDescription:\n------------\nA curated pick.",
			)
			expect(readdirSync(join(out, GBA_CATALOGUE)).sort()).toEqual(["box", "preview", "text"])
			expect(readFileSync(join(out, "BIOS", "gba_bios.bin"))).toHaveLength(16)
			expect(existsSync(join(out, ".muos-work"))).toBe(false)
		})
	})

	it("reports unmapped and unmatched entries and skips platforms with nothing resolved", async () => {
		await withTempDir(async dir => {
			setup(dir)

			const summary = summarizeBuild(await collect(buildOptions(dir)))

			expect(summary.unresolved.map(u => [u.entry.row, u.reason, u.detail])).toEqual([
				[3, "no-match", 'no local ROM matches "Advance Wars" (downloads disabled)'],
				[4, "unmapped-platform", 'unknown system "Magnavox"'],
				[5, "no-match", 'no local ROM matches "Super Mario 64" (downloads disabled)'],
			])
			expect(summary.platforms).toEqual([
				{
					folderCode: "GBA",
					catalogueName: "Nintendo Game Boy Advance",
					resolved: 2,
					unresolved: 1,
					downloaded: 0,
					texts: 2,
					boxes: 2,
					previews: 2,
					failedPasses: [],
				},
				{
					folderCode: "N64",
					catalogueName: "Nintendo N64",
					resolved: 0,
					unresolved: 1,
					downloaded: 0,
					texts: 0,
					boxes: 0,
					previews: 0,
					failedPasses: [],
					skipped: "no ROMs resolved",
				},
			])
			expect(summary.biosCopied).toEqual(["gba_bios.bin"])
			expect(existsSync(join(dir, "out", "MUOS", "info", "catalogue", "Nintendo N64"))).toBe(false)
		})
	})

	it("produces the same tree and report when run twice", async () => {
		await withTempDir(async dir => {
			setup(dir)
			const out = join(dir, "out")

			const first = formatReport(summarizeBuild(await collect(buildOptions(dir))))
			const secondEvents = await collect(buildOptions(dir))
			const second = formatReport(summarizeBuild(secondEvents))

			expect(second).toBe(first)
			expect(readdirSync(join(out, "Roms", "GBA"))).toHaveLength(2)
			expect(readdirSync(join(out, GBA_CATALOGUE, "text"))).toHaveLength(2)
			const resolvedPaths = secondEvents.flatMap(e => (e.type === "resolved" ? [e.rom.path] : []))
			expect(resolvedPaths.every(path => path.startsWith(join(out, "Roms", "GBA")))).toBe(true)
		})
	})

	it("writes the same report after a run that downloaded a ROM", async () => {
		await withTempDir(async dir => {
			setup(dir)
			const pool = agent.get(ARCHIVE)
			pool
				.intercept({ path: GBA_LISTING, method: "GET" })
				.reply(200, `<a href="Advance%20Wars%20%28USA%29.gba">Advance Wars (USA).gba</a>`)
				.persist()
			pool.intercept({ path: N64_LISTING, method: "GET" }).reply(200, "").persist()
			pool.intercept({ path: `${GBA_LISTING}Advance%20Wars%20(USA).gba`, method: "GET" }).reply(200, "ROMDATA")
			const options = (): BuildOptions =>
				buildOptions(dir, {
					config: {
						...DEFAULT_CONFIG,
						jobs: 2,
						archiveBaseUrl: `${ARCHIVE}/files/`,
						retryCount: 0,
						retryDelay: 0,
					},
					download: true,
					dispatcher: agent,
				})

			const firstSummary = summarizeBuild(await collect(options()))
			const secondSummary = summarizeBuild(await collect(options()))

			expect(firstSummary.platforms[0]).toMatchObject({ folderCode: "GBA", resolved: 3, downloaded: 1 })
			expect(secondSummary.platforms[0]).toMatchObject({ folderCode: "GBA", resolved: 3, downloaded: 0 })
			expect(formatReport(secondSummary)).toBe(formatReport(firstSummary))
			expect(readFileSync(join(dir, "out", "Roms", "GBA", "Advance Wars (USA).gba"), "utf-8")).toBe("ROMDATA")
		})
	})

	it("leaves ROMs in place and scrapes through links with copying disabled", async () => {
		await withTempDir(async dir => {
			setup(dir)
			const { runner, calls } = scraper()
			const out = join(dir, "out")

			await collect(buildOptions(dir, { copy: false, runner }))

			expect(existsSync(join(out, "Roms", "GBA"))).toBe(false)
			expect(argAfter(calls[0]?.args ?? [], "-i")).toBe(join(out, ".muos-work", "links", "GBA"))
			expect(readdirSync(join(out, GBA_CATALOGUE, "box"))).toHaveLength(2)
		})
	})

	it("skips scraping when artwork is disabled", async () => {
		await withTempDir(async dir => {
			setup(dir)
			const { runner, calls } = scraper()
			const out = join(dir, "out")

			const events = await collect(buildOptions(dir, { artwork: false, runner }))

			expect(calls).toHaveLength(0)
			expect(events.some(e => e.type === "scrape-pass")).toBe(false)
			expect(readdirSync(join(out, GBA_CATALOGUE, "box"))).toEqual([])
			expect(readdirSync(join(out, "Roms", "GBA"))).toHaveLength(2)
		})
	})

	it("stops before writing anything when the scraper is missing", async () => {
		await withTempDir(async dir => {
			setup(dir)

			await expect(collect(buildOptions(dir, { toolCheck: async () => false }))).rejects.toBeInstanceOf(
				MissingToolError,
			)
			expect(existsSync(join(dir, "out"))).toBe(false)
		})
	})

	it("stops between platforms when aborted", async () => {
		await withTempDir(async dir => {
			setup(dir)
			const controller = new AbortController()
			controller.abort()

			const events = await collect(buildOptions(dir, { signal: controller.signal }))

			expect(events.map(e => e.type)).toEqual(["catalog", "unmapped", "cancelled"])
			expect(events[2]).toEqual({ type: "cancelled", remaining: ["GBA", "N64"] })
			expect(existsSync(join(dir, "out", ".muos-work"))).toBe(false)
		})
	})
})
