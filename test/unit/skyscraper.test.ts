/**
 * Unit tests for Skyscraper argument building and tool checks
 */

import { describe, expect, it } from "vitest"
import {
	cachePassArgs,
	ensureScraper,
	generatePassArgs,
	redactArgs,
} from "../../src/core/scraper/skyscraper.js"
import { MissingToolError } from "../../src/errors.js"

const invocation = { platform: "gba", romDir: "/out/Roms/GBA" }

describe("cachePassArgs", () => {
	it("adds credentials only when both are set", () => {
		expect(cachePassArgs(invocation, { user: "tester", password: "test-secret", maxFails: 3 })).toEqual([
			"-p", "gba",
			"-s", "screenscraper",
			"-u", "tester:test-secret",
			"-i", "/out/Roms/GBA",
			"--flags", "unattend,skipped,nobrackets",
			"--verbosity", "1",
			"--maxfails", "3",
		])
		expect(cachePassArgs(invocation, { user: "tester", maxFails: 3 })).not.toContain("-u")
	})

	it("passes a cache directory", () => {
		const args = cachePassArgs({ ...invocation, cacheDir: "/cache" }, { maxFails: 1 })
		expect(args.slice(args.indexOf("-d"), args.indexOf("-d") + 2)).toEqual(["-d", "/cache"])
	})
})

describe("generatePassArgs", () => {
	it("writes the export to the work directory and art to a kind subfolder", () => {
		expect(generatePassArgs(invocation, { workDir: "/work/GBA", kind: "preview", profile: "/assets/preview.xml" })).toEqual([
			"-p", "gba",
			"-i", "/out/Roms/GBA",
			"-g", "/work/GBA",
			"-o", "/work/GBA/preview",
			"-a", "/assets/preview.xml",
			"-f", "emulationstation",
			"--flags", "unattend,nobrackets,nosubdirs",
			"--verbosity", "1",
		])
	})
})

describe("redactArgs", () => {
	it("hides the credentials value", () => {
		expect(redactArgs(["-p", "gba", "-u", "tester:test-secret"])).toEqual([
			"-p", "gba", "-u", "<credentials>",
		])
	})
})

describe("ensureScraper", () => {
	it("throws a fatal error when the tool is missing", async () => {
		await expect(ensureScraper("Skyscraper", async () => false)).rejects.toBeInstanceOf(MissingToolError)
		await expect(ensureScraper("Skyscraper", async () => true)).resolves.toBeUndefined()
	})
})
