import { fileURLToPath } from "node:url"
import { join } from "node:path"

/** Package root (one level above src/ or dist/) */
export const PACKAGE_ROOT = fileURLToPath(new URL("..", import.meta.url))

export const PLATFORMS_FILE = join(PACKAGE_ROOT, "data", "platforms.json")
export const DEFAULT_BOX_PROFILE = join(PACKAGE_ROOT, "assets", "artwork", "box.xml")
export const DEFAULT_PREVIEW_PROFILE = join(
	PACKAGE_ROOT,
	"assets",
	"artwork",
	"preview.xml",
)

/** Scratch directory inside the output tree (same filesystem, atomic renames) */
export const WORK_DIR_NAME = ".muos-work"
export const REPORT_FILENAME = "build_report.txt"
