/**
 * Unit tests for catalog loading
 */

import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { loadCatalog, parseCatalog } from "../../src/catalog.js"
import { CatalogReadError, MalformedCatalogError } from "../../src/errors.js"
import { withTempDir, writeTree } from "../helpers/index.js"

const HEADER = "System,Game Name,Category,Reason,Description,Notes,rom_path"

describe("parseCatalog", () => {
	it("parses rows in order with optional fields", () => {
		const catalog = parseCatalog(
			[
				HEADER,
				"SNES,Chrono Trigger,RPG,Classic,,,",
				'N64,"Mario Kart 64",Racing,"Fun, with friends",A kart racer.,,/roms/mk64.z64',
			].join("\n"),
		)

		expect(catalog.skipped).toEqual([])
		expect(catalog.entries).toEqual([
			{ row: 1, system: "SNES", title: "Chrono Trigger", category: "RPG", reason: "Classic" },
			{
				row: 2,
				system: "N64",
				title: "Mario Kart 64",
				category: "Racing",
				reason: "Fun, with friends",
				descriptionOverride: "A kart racer.",
				romOverride: "/roms/mk64.z64",
			},
		])
	})

	it("turns whitespace-only fields into absent values", () => {
		const { entries } = parseCatalog(`${HEADER}\nGBA,Golden Sun,   ,\t,  ,,  `)
		expect(entries[0]).toEqual({ row: 1, system: "GBA", title: "Golden Sun" })
		expect(entries[0]).not.toHaveProperty("category")
	})

	it("skips rows missing System or Game Name", () => {
		const catalog = parseCatalog(
			[HEADER, ",Tetris,,,,,", "GB,,,,,,", "GB,Tetris,,,,,"].join("\n"),
		)

		expect(catalog.entries.map(e => e.title)).toEqual(["Tetris"])
		expect(catalog.entries[0]?.row).toBe(3)
		expect(catalog.skipped).toEqual([
			{ row: 1, reason: "missing System" },
			{ row: 2, reason: "missing Game Name" },
		])
	})

	it("tolerates extra trailing columns and short rows", () => {
		const { entries } = parseCatalog(
			`${HEADER},Priority\nGBC,Link's Awakening DX,,,,,,High\nGB,Tetris`,
		)
		expect(entries.map(e => e.title)).toEqual(["Link's Awakening DX", "Tetris"])
	})

	it("detects tab-separated exports and strips a BOM", () => {
		const text = "\uFEFFSystem\tGame Name\tNotes\nMD\tSonic the Hedgehog\tfast\n"
		expect(parseCatalog(text).entries).toEqual([
			{ row: 1, system: "MD", title: "Sonic the Hedgehog", notes: "fast" },
		])
	})

	it("accepts alternative header spellings", () => {
		const text = "system,Name,Category/Set,ROM Path\nPS,Vagrant Story,RPG,~/vs.chd\n"
		expect(parseCatalog(text).entries).toEqual([
			{ row: 1, system: "PS", title: "Vagrant Story", category: "RPG", romOverride: "~/vs.chd" },
		])
	})

	it("freezes entries", () => {
		const { entries } = parseCatalog(`${HEADER}\nGB,Tetris,,,,,`)
		expect(Object.isFrozen(entries[0])).toBe(true)
	})

	it("rejects a header without Game Name", () => {
		expect(() => parseCatalog("System,Category\nGB,Puzzle\n")).toThrow(MalformedCatalogError)
		const error = (() => {
			try {
				parseCatalog("Console,Title\n")
			} catch (err) {
				return err
			}
			return null
		})()
		expect(error).toBeInstanceOf(MalformedCatalogError)
		expect(error).toMatchObject({
			code: "CATALOG_MALFORMED",
			missingColumns: ["System", "Game Name"],
		})
	})
})

describe("loadCatalog", () => {
	it("reads a catalog file", async () => {
		await withTempDir(async dir => {
			writeTree(dir, { "games.csv": `${HEADER}\nGB,Tetris,,,,,\n` })
			const catalog = loadCatalog(join(dir, "games.csv"))
			expect(catalog.entries).toHaveLength(1)
		})
	})

	it("raises CatalogReadError for a missing file", () => {
		expect(() => loadCatalog("/nonexistent/catalog.csv")).toThrow(CatalogReadError)
	})
})
