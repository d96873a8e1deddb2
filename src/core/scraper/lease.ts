/**
 * Exclusive lease over a shared resource (the scraper's on-disk cache)
 *
 * Usage:
 * ```ts
 * const lease = await cacheLease.acquire("GBA")
 * try {
 *   // run scraper passes
 * } finally {
 *   lease.release()
 * }
 * ```
 */

export interface Lease {
	readonly holder: string
	release(): void
}

interface Waiter {
	holder: string
	resolve: (lease: Lease) => void
}

export class ExclusiveResource {
	private current: string | null = null
	private readonly queue: Waiter[] = []

	constructor(readonly name: string) {}

	/** Current holder, or null when free */
	get holder(): string | null {
		return this.current
	}

	get waiting(): number {
		return this.queue.length
	}

	acquire(holder: string): Promise<Lease> {
		if (this.current === null) {
			return Promise.resolve(this.grant(holder))
		}
		return new Promise(resolve => {
			this.queue.push({ holder, resolve })
		})
	}

	private grant(holder: string): Lease {
		this.current = holder
		let released = false
		return {
			holder,
			release: () => {
				if (released) return
				released = true
				this.current = null
				const next = this.queue.shift()
				if (next) next.resolve(this.grant(next.holder))
			},
		}
	}
}
