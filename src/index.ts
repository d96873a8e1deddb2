// This module is a library entry point
// For CLI usage, run: npx muos-curator <catalog> --rom-dirs <dirs...>
// Or: npm run cli -- <catalog> --rom-dirs <dirs...>

export type * from "./types.js"
export * from "./errors.js"
export * from "./config.js"
export * from "./catalog.js"
export * from "./platforms.js"
export * from "./match.js"
export * from "./romname.js"
export * from "./scan.js"
export * from "./locator.js"
export * from "./archive.js"
export * from "./fetcher.js"
export {
	HTTP_AGENT,
	closeHttpAgent,
	downloadFile,
	fetchText,
	type DownloadOptions as FileDownloadOptions,
	type DownloadResult as FileDownloadResult,
} from "./download.js"
export * from "./gamelist.js"
export * from "./artwork.js"
export * from "./tree.js"
export * from "./bios.js"
export * from "./report.js"
export * from "./core/index.js"
