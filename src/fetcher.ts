/**
 * ROM fetcher: validates the target name, then downloads into the
 * platform's ROM folder through a part file in the work directory.
 */

import { existsSync, statSync } from "node:fs"
import { extname, join } from "node:path"
import type { Dispatcher } from "undici"
import { downloadFile } from "./download.js"
import { log } from "./logger.js"

export interface FetchRequest {
	url: string
	/** Target filename; derived from the URL when absent */
	filename?: string | undefined
	/** Roms/<folder> directory */
	romDir: string
	/** Scratch directory on the same filesystem as romDir */
	workDir: string
	accepted: ReadonlySet<string>
}

export interface FetchSettings {
	retryCount: number
	retryDelay: number
	dispatcher?: Dispatcher | undefined
	signal?: AbortSignal | undefined
}

export type FetchResult =
	| { success: true; path: string; filename: string; reused: boolean }
	| {
			success: false
			reason: "invalid-extension" | "download-failed"
			error: string
	  }

/** Last path segment of a URL, percent-decoded */
export function filenameFromUrl(url: string): string {
	let pathname: string
	try {
		pathname = new URL(url).pathname
	} catch {
		pathname = url.split(/[?#]/)[0] ?? url
	}
	const last = pathname.split("/").filter(Boolean).pop() ?? ""
	try {
		return decodeURIComponent(last)
	} catch {
		return last
	}
}

function nonEmptyFile(path: string): boolean {
	try {
		const stat = statSync(path)
		return stat.isFile() && stat.size > 0
	} catch {
		return false
	}
}

export async function fetchRom(
	request: FetchRequest,
	settings: FetchSettings,
): Promise<FetchResult> {
	const filename = request.filename ?? filenameFromUrl(request.url)
	const ext = extname(filename).toLowerCase()
	if (!filename || filename.includes("/") || !request.accepted.has(ext)) {
		return {
			success: false,
			reason: "invalid-extension",
			error: `"${filename || request.url}" is not an accepted ROM file (${[...request.accepted].join(" ")})`,
		}
	}

	const destPath = join(request.romDir, filename)
	if (nonEmptyFile(destPath)) {
		log.download.debug({ destPath }, "ROM already present")
		return { success: true, path: destPath, filename, reused: true }
	}

	const partPath = join(request.workDir, "downloads", `${filename}.part`)
	const result = await downloadFile(request.url, partPath, destPath, {
		retries: settings.retryCount,
		delay: settings.retryDelay,
		dispatcher: settings.dispatcher,
		signal: settings.signal,
	})
	if (!result.success || !existsSync(destPath)) {
		return {
			success: false,
			reason: "download-failed",
			error: result.error ?? "download failed",
		}
	}
	return { success: true, path: destPath, filename, reused: false }
}
