/**
 * Fatal error types
 *
 * Only setup problems are thrown: everything that can go wrong for a single
 * catalog entry or a single platform travels as a result object or a build
 * event instead, so one bad title never stops the run.
 */

export type FatalErrorCode =
	| "CATALOG_UNREADABLE"
	| "CATALOG_MALFORMED"
	| "TOOL_MISSING"
	| "REGISTRY_INVALID"

export class FatalError extends Error {
	constructor(
		readonly code: FatalErrorCode,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options)
		this.name = new.target.name
	}
}

export class CatalogReadError extends FatalError {
	constructor(
		readonly path: string,
		cause: unknown,
	) {
		super(
			"CATALOG_UNREADABLE",
			`Cannot read catalog ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
			{ cause },
		)
	}
}

export class MalformedCatalogError extends FatalError {
	constructor(readonly missingColumns: string[]) {
		super(
			"CATALOG_MALFORMED",
			`Catalog header is missing required column(s): ${missingColumns.join(", ")}`,
		)
	}
}

export class MissingToolError extends FatalError {
	constructor(
		readonly tool: string,
		hint: string,
	) {
		super("TOOL_MISSING", `${tool} not found. ${hint}`)
	}
}

export class RegistryError extends FatalError {
	constructor(message: string) {
		super("REGISTRY_INVALID", `Invalid platform registry: ${message}`)
	}
}

/** Raised by the export parser; the orchestrator turns it into a platform warning */
export class GamelistParseError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = "GamelistParseError"
	}
}

export function isFatalError(err: unknown): err is FatalError {
	return err instanceof FatalError
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
