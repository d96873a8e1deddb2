/**
 * Unit tests for output layout, ROM placement and BIOS collection
 */

import { existsSync, lstatSync, readFileSync, readlinkSync } from "node:fs"
import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { collectBios } from "../../src/bios.js"
import { PlatformRegistry } from "../../src/platforms.js"
import {
	catalogueLayout,
	cleanupCatalogue,
	linkRoms,
	placeRom,
} from "../../src/tree.js"
import type { ResolvedRom } from "../../src/types.js"
import { entry, platform, withTempDir, writeTree } from "../helpers/index.js"

function rom(path: string, filename: string): ResolvedRom {
	return {
		entry: entry("Tetris", "GB"),
		path,
		filename,
		baseName: filename.replace(/\.[^.]+$/, ""),
		provenance: "matched-local",
	}
}

describe("catalogueLayout", () => {
	it("uses the catalogue name under MUOS/info/catalogue", () => {
		expect(catalogueLayout("/out", platform())).toEqual({
			root: "/out/MUOS/info/catalogue/Nintendo Game Boy Advance",
			box: "/out/MUOS/info/catalogue/Nintendo Game Boy Advance/box",
			preview: "/out/MUOS/info/catalogue/Nintendo Game Boy Advance/preview",
			text: "/out/MUOS/info/catalogue/Nintendo Game Boy Advance/text",
		})
	})
})

describe("placeRom", () => {
	it("copies a ROM and skips an identical second copy", async () => {
		await withTempDir(async dir => {
			writeTree(dir, { "src/Tetris.gb": "TETRIS" })
			const romDir = join(dir, "Roms", "GB")
			const source = rom(join(dir, "src", "Tetris.gb"), "Tetris.gb")

			const first = placeRom(source, romDir, join(dir, "work"))
			const second = placeRom(source, romDir, join(dir, "work"))

			expect(first).toEqual({ success: true, path: join(romDir, "Tetris.gb"), copied: true })
			expect(second).toEqual({ success: true, path: join(romDir, "Tetris.gb"), copied: false })
			expect(readFileSync(join(romDir, "Tetris.gb"), "utf-8")).toBe("TETRIS")
			expect(existsSync(join(dir, "work", "copy", "Tetris.gb.tmp"))).toBe(false)
		})
	})

	it("links a ROM at or above the size limit instead of copying it", async () => {
		await withTempDir(async dir => {
			writeTree(dir, { "src/Disc.iso": "DISCIMAGE" })
			const romDir = join(dir, "Roms", "PS")
			const source = rom(join(dir, "src", "Disc.iso"), "Disc.iso")

			const first = placeRom(source, romDir, join(dir, "work"), 9)
			const second = placeRom(source, romDir, join(dir, "work"), 9)

			expect(first).toEqual({ success: true, path: join(romDir, "Disc.iso"), copied: true, linked: true })
			expect(second).toEqual({ success: true, path: join(romDir, "Disc.iso"), copied: false })
			expect(lstatSync(join(romDir, "Disc.iso")).isSymbolicLink()).toBe(true)
			expect(readlinkSync(join(romDir, "Disc.iso"))).toBe(join(dir, "src", "Disc.iso"))
			expect(readFileSync(join(romDir, "Disc.iso"), "utf-8")).toBe("DISCIMAGE")
		})
	})

	it("copies a ROM below the size limit", async () => {
		await withTempDir(async dir => {
			writeTree(dir, { "src/Tetris.gb": "TETRIS" })
			const romDir = join(dir, "Roms", "GB")

			placeRom(rom(join(dir, "src", "Tetris.gb"), "Tetris.gb"), romDir, join(dir, "work"), 7)

			expect(lstatSync(join(romDir, "Tetris.gb")).isSymbolicLink()).toBe(false)
		})
	})

	it("leaves a ROM already in place", async () => {
		await withTempDir(async dir => {
			writeTree(dir, { "Roms/GB/Tetris.gb": "TETRIS" })
			const romDir = join(dir, "Roms", "GB")

			expect(placeRom(rom(join(romDir, "Tetris.gb"), "Tetris.gb"), romDir, join(dir, "work"))).toEqual({
				success: true,
				path: join(romDir, "Tetris.gb"),
				copied: false,
			})
		})
	})

	it("reports a missing source", async () => {
		await withTempDir(async dir => {
			const missing = join(dir, "gone.gb")
			expect(placeRom(rom(missing, "gone.gb"), join(dir, "Roms", "GB"), join(dir, "work"))).toEqual({
				success: false,
				error: `${missing} is missing`,
			})
		})
	})
})

describe("linkRoms", () => {
	it("replaces the link directory with symlinks", async () => {
		await withTempDir(async dir => {
			writeTree(dir, { "src/Tetris.gb": "TETRIS", "links/stale.gb": "old" })
			const linkDir = join(dir, "links")

			linkRoms([rom(join(dir, "src", "Tetris.gb"), "Tetris.gb")], linkDir)

			expect(existsSync(join(linkDir, "stale.gb"))).toBe(false)
			expect(lstatSync(join(linkDir, "Tetris.gb")).isSymbolicLink()).toBe(true)
			expect(readlinkSync(join(linkDir, "Tetris.gb"))).toBe(join(dir, "src", "Tetris.gb"))
		})
	})
})

describe("cleanupCatalogue", () => {
	it("removes scraper leftovers only", async () => {
		await withTempDir(async dir => {
			writeTree(dir, {
				"gamelist.xml": "<gameList/>",
				"media/covers/a.png": "x",
				"screenshots/a.png": "x",
				"box/Tetris.png": "x",
			})

			cleanupCatalogue(dir)

			expect(existsSync(join(dir, "gamelist.xml"))).toBe(false)
			expect(existsSync(join(dir, "media"))).toBe(false)
			expect(existsSync(join(dir, "screenshots"))).toBe(false)
			expect(existsSync(join(dir, "box", "Tetris.png"))).toBe(true)
		})
	})
})

describe("collectBios", () => {
	const registry = new PlatformRegistry([
		platform({ bios: ["gba_bios.bin"] }),
		platform({
			folderCode: "PS",
			scraperPlatform: "psx",
			catalogueName: "Sony PlayStation",
			aliases: ["PlayStation"],
			pathTokens: ["PS1"],
			extensions: [".chd"],
			bios: ["scph1001.bin"],
		}),
	])

	it("copies each BIOS file once and reports unchanged files on re-run", async () => {
		await withTempDir(async dir => {
			writeTree(dir, {
				"a/bios/scph1001.bin": 64,
				"a/gba_bios.bin": 16,
				"b/gba_bios.bin": 99,
				"a/readme.txt": "x",
			})
			const sources = [join(dir, "a"), join(dir, "b")]
			const dest = join(dir, "out", "BIOS")

			const first = collectBios(sources, dest, registry)
			const second = collectBios(sources, dest, registry)

			expect(first).toEqual([
				{ filename: "gba_bios.bin", source: join(dir, "a", "gba_bios.bin"), status: "copied" },
				{ filename: "scph1001.bin", source: join(dir, "a", "bios", "scph1001.bin"), status: "copied" },
			])
			expect(second.map(copy => copy.status)).toEqual(["unchanged", "unchanged"])
			expect(lstatSync(join(dest, "gba_bios.bin")).size).toBe(16)
			expect(existsSync(join(dest, "readme.txt"))).toBe(false)
		})
	})

	it("returns nothing when no BIOS is present", async () => {
		await withTempDir(async dir => {
			writeTree(dir, { "a/game.gba": 4 })
			expect(collectBios([join(dir, "a")], join(dir, "BIOS"), registry)).toEqual([])
			expect(existsSync(join(dir, "BIOS"))).toBe(false)
		})
	})
})
