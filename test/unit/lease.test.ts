/**
 * Unit tests for the exclusive scraper-cache lease
 */

import { describe, expect, it } from "vitest"
import { ExclusiveResource } from "../../src/core/scraper/lease.js"

describe("ExclusiveResource", () => {
	it("grants immediately when free", async () => {
		const resource = new ExclusiveResource("cache")
		const lease = await resource.acquire("GBA")

		expect(resource.holder).toBe("GBA")
		lease.release()
		expect(resource.holder).toBeNull()
	})

	it("hands over in request order", async () => {
		const resource = new ExclusiveResource("cache")
		const order: string[] = []
		const first = await resource.acquire("GBA")

		const second = resource.acquire("PS").then(lease => {
			order.push(lease.holder)
			return lease
		})
		const third = resource.acquire("N64").then(lease => {
			order.push(lease.holder)
			return lease
		})
		expect(resource.waiting).toBe(2)

		first.release()
		const secondLease = await second
		expect(resource.holder).toBe("PS")
		secondLease.release()
		;(await third).release()

		expect(order).toEqual(["PS", "N64"])
		expect(resource.holder).toBeNull()
		expect(resource.waiting).toBe(0)
	})

	it("ignores a second release", async () => {
		const resource = new ExclusiveResource("cache")
		const first = await resource.acquire("GBA")
		const waiting = resource.acquire("PS")

		first.release()
		const second = await waiting
		first.release()

		expect(resource.holder).toBe("PS")
		second.release()
	})
})
