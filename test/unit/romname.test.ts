/**
 * Unit tests for ROM filename parsing
 */

import { describe, expect, it } from "vitest"
import { parseRomFilename, regionBonus, stripExtension } from "../../src/romname.js"

describe("stripExtension", () => {
	it("drops only the last extension", () => {
		expect(stripExtension("Tetris (World).gb")).toBe("Tetris (World)")
		expect(stripExtension("Game.v1.1.zip")).toBe("Game.v1.1")
		expect(stripExtension("README")).toBe("README")
	})
})

describe("parseRomFilename", () => {
	it("extracts title, regions, flags and disc", () => {
		expect(parseRomFilename("Final Fantasy VII (USA) (Disc 2).chd")).toEqual({
			baseName: "Final Fantasy VII (USA) (Disc 2)",
			title: "Final Fantasy VII",
			regions: ["USA"],
			flags: { prerelease: false, unlicensed: false, hack: false },
			disc: 2,
		})
	})

	it("flags prerelease dumps", () => {
		const parsed = parseRomFilename("Star Fox 2 (Japan) (Beta).sfc")
		expect(parsed.regions).toEqual(["Japan"])
		expect(parsed.flags.prerelease).toBe(true)
	})
})

describe("regionBonus", () => {
	it("rewards preferred regions", () => {
		expect(regionBonus("Game (USA, Europe).gb")).toBe(1.2)
		expect(regionBonus("Game (World).gb")).toBe(1.1)
		expect(regionBonus("Game (Europe).gb")).toBe(1.05)
		expect(regionBonus("Game (Japan).gb")).toBe(1)
	})

	it("halves the bonus for prototypes", () => {
		expect(regionBonus("Game (USA) (Proto).gb")).toBe(0.6)
	})
})
