/**
 * Download manager with retry logic, streaming, and Range resume
 *
 * - Streams to a .part file (kept between attempts for Range resume)
 * - Verifies a non-empty body and the advertised size
 * - Atomic rename on completion
 * - Exponential backoff for transient failures; 4xx answers are final
 */

import { createWriteStream, existsSync, renameSync, statSync, unlinkSync } from "node:fs"
import { mkdir } from "node:fs/promises"
import { dirname } from "node:path"
import { Readable } from "node:stream"
import { pipeline } from "node:stream/promises"
import { Agent, fetch, type Dispatcher } from "undici"
import { errorMessage } from "./errors.js"
import { log } from "./logger.js"

const USER_AGENT = "muos-curator/1.0.0"

/** Shared keep-alive agent for archive listings and ROM downloads */
export const HTTP_AGENT = new Agent({
	keepAliveTimeout: 30_000,
	connections: 8,
	headersTimeout: 60_000,
	bodyTimeout: 300_000,
})

const MAX_BACKOFF_MS = 30_000

export interface DownloadOptions {
	/** Retries after the first attempt */
	retries: number
	/** Initial backoff in seconds, doubled per retry */
	delay: number
	expectedSize?: number | undefined
	dispatcher?: Dispatcher | undefined
	signal?: AbortSignal | undefined
}

export interface DownloadResult {
	success: boolean
	bytesDownloaded: number
	/** HTTP status of the last response, when there was one */
	status?: number
	error?: string
}

/** Failure that retrying will not fix */
class PermanentDownloadError extends Error {
	constructor(
		message: string,
		readonly status: number,
	) {
		super(message)
		this.name = "PermanentDownloadError"
	}
}

function getPartialSize(partPath: string): number {
	try {
		return existsSync(partPath) ? statSync(partPath).size : 0
	} catch {
		return 0
	}
}

function cleanupPartFile(partPath: string): void {
	try {
		if (existsSync(partPath)) unlinkSync(partPath)
	} catch (err) {
		log.download.debug({ partPath, err }, "could not remove part file")
	}
}

function sleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms))
}

/** 4xx answers other than timeout and rate limiting */
function isPermanentStatus(status: number): boolean {
	return status >= 400 && status < 500 && status !== 408 && status !== 429
}

function parseTotalSize(
	status: number,
	headers: { get(name: string): string | null },
): number | undefined {
	if (status === 206) {
		const match = headers.get("content-range")?.match(/bytes \d+-\d+\/(\d+)/)
		return match?.[1] ? parseInt(match[1], 10) : undefined
	}
	const contentLength = headers.get("content-length")
	return contentLength ? parseInt(contentLength, 10) : undefined
}

async function attemptDownload(
	url: string,
	partPath: string,
	destPath: string,
	options: DownloadOptions,
): Promise<number> {
	const existingSize = getPartialSize(partPath)
	const headers: Record<string, string> = { "User-Agent": USER_AGENT }
	if (existingSize > 0) headers["Range"] = `bytes=${existingSize}-`

	const response = await fetch(url, {
		headers,
		dispatcher: options.dispatcher ?? HTTP_AGENT,
		...(options.signal ? { signal: options.signal } : {}),
	})

	if (response.status === 416) {
		// Part file no longer lines up with the remote; start over
		cleanupPartFile(partPath)
		throw new Error("Range not satisfiable")
	}
	if (isPermanentStatus(response.status)) {
		throw new PermanentDownloadError(
			response.status === 404 ? "Not found (404)" : `HTTP ${response.status}`,
			response.status,
		)
	}
	if (!response.ok) {
		throw new Error(`HTTP ${response.status}`)
	}
	if (!response.body) {
		throw new Error("No response body")
	}

	const isResume = response.status === 206
	const totalSize = parseTotalSize(response.status, response.headers) ?? options.expectedSize

	const fileStream = createWriteStream(partPath, {
		flags: isResume ? "a" : "w",
		highWaterMark: 1024 * 1024,
	})
	await pipeline(Readable.fromWeb(response.body), fileStream)

	const finalSize = statSync(partPath).size
	if (finalSize === 0) {
		cleanupPartFile(partPath)
		throw new Error("Downloaded file is empty")
	}
	if (totalSize !== undefined && finalSize !== totalSize) {
		// Keep the part file; the next attempt resumes it
		throw new Error(`Size mismatch: expected ${totalSize}, got ${finalSize}`)
	}

	await mkdir(dirname(destPath), { recursive: true })
	renameSync(partPath, destPath)
	return isResume ? finalSize - existingSize : finalSize
}

/**
 * Download `url` into `destPath` through `partPath`.
 * The part file should live on the same filesystem as the destination.
 */
export async function downloadFile(
	url: string,
	partPath: string,
	destPath: string,
	options: DownloadOptions,
): Promise<DownloadResult> {
	await mkdir(dirname(partPath), { recursive: true })

	let currentDelay = options.delay * 1000
	let lastError = "Max retries exceeded"

	for (let attempt = 0; attempt <= options.retries; attempt++) {
		if (options.signal?.aborted) {
			lastError = "Aborted"
			break
		}
		try {
			const bytesDownloaded = await attemptDownload(url, partPath, destPath, options)
			log.download.debug({ url, destPath, bytesDownloaded }, "download complete")
			return { success: true, bytesDownloaded }
		} catch (err) {
			if (err instanceof PermanentDownloadError) {
				cleanupPartFile(partPath)
				log.download.warn({ url, status: err.status }, "download failed")
				return {
					success: false,
					bytesDownloaded: 0,
					status: err.status,
					error: err.message,
				}
			}
			lastError = errorMessage(err)
			log.download.debug({ url, attempt, error: lastError }, "download attempt failed")
			if (attempt < options.retries) {
				await sleep(Math.min(currentDelay, MAX_BACKOFF_MS))
				currentDelay *= 2
			}
		}
	}

	cleanupPartFile(partPath)
	log.download.warn({ url, error: lastError }, "download failed")
	return { success: false, bytesDownloaded: 0, error: lastError }
}

/** Fetch a small text resource (directory listings) */
export async function fetchText(
	url: string,
	options: { dispatcher?: Dispatcher | undefined; signal?: AbortSignal | undefined } = {},
): Promise<{ success: true; text: string } | { success: false; error: string }> {
	try {
		const response = await fetch(url, {
			headers: { "User-Agent": USER_AGENT },
			dispatcher: options.dispatcher ?? HTTP_AGENT,
			...(options.signal ? { signal: options.signal } : {}),
		})
		if (!response.ok) {
			await response.body?.cancel()
			return { success: false, error: `HTTP ${response.status}` }
		}
		return { success: true, text: await response.text() }
	} catch (err) {
		return { success: false, error: errorMessage(err) }
	}
}

/** Release pooled connections so the process can exit */
export async function closeHttpAgent(): Promise<void> {
	await HTTP_AGENT.close()
}
