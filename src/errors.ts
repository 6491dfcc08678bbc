/**
 * Error types surfaced by the backend
 *
 * Each class carries a `kind` so callers can switch on the failure without
 * matching message strings.
 */

export type ContentInstallErrorKind =
	| "wrong-hash"
	| "wrong-filesize"
	| "not-ok"
	| "invalid-hash"
	| "io"
	| "invalid-path"
	| "request"

export class ContentInstallError extends Error {
	readonly kind: ContentInstallErrorKind
	/** HTTP status for "not-ok" failures */
	readonly status: number | null

	private constructor(
		kind: ContentInstallErrorKind,
		message: string,
		options: { status?: number; cause?: unknown } = {},
	) {
		super(message, { cause: options.cause })
		this.name = "ContentInstallError"
		this.kind = kind
		this.status = options.status ?? null
	}

	static wrongHash(expected: string, actual: string): ContentInstallError {
		return new ContentInstallError(
			"wrong-hash",
			`Downloaded file had the wrong hash (expected ${expected}, got ${actual})`,
		)
	}

	static wrongFilesize(expected: number, actual: number): ContentInstallError {
		return new ContentInstallError(
			"wrong-filesize",
			`Downloaded file had the wrong size (expected ${expected}, got ${actual})`,
		)
	}

	static notOk(status: number, url: string): ContentInstallError {
		return new ContentInstallError(
			"not-ok",
			`Remote server returned non-200 status code ${status} for ${url}`,
			{ status },
		)
	}

	static invalidHash(hash: string): ContentInstallError {
		return new ContentInstallError(
			"invalid-hash",
			`Hash isn't a valid sha1 hash: ${hash}`,
		)
	}

	static io(err: unknown, context: string): ContentInstallError {
		const message = err instanceof Error ? err.message : String(err)
		return new ContentInstallError(
			"io",
			`Failed to perform I/O operation (${context}): ${message}`,
			{ cause: err },
		)
	}

	static invalidPath(path: string): ContentInstallError {
		return new ContentInstallError("invalid-path", `Invalid filename: ${path}`)
	}

	static request(err: unknown, url: string): ContentInstallError {
		const message = err instanceof Error ? err.message : String(err)
		return new ContentInstallError(
			"request",
			`Failed to download ${url}: ${message}`,
			{ cause: err },
		)
	}

	/** Wrap anything thrown during an install into a ContentInstallError */
	static from(err: unknown, context: string): ContentInstallError {
		if (err instanceof ContentInstallError) return err
		return ContentInstallError.io(err, context)
	}
}

export type InstanceLoadErrorKind = "not-a-directory" | "io" | "invalid-info"

export class InstanceLoadError extends Error {
	readonly kind: InstanceLoadErrorKind
	readonly path: string

	constructor(
		kind: InstanceLoadErrorKind,
		path: string,
		message: string,
		cause?: unknown,
	) {
		super(message, { cause })
		this.name = "InstanceLoadError"
		this.kind = kind
		this.path = path
	}
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}

/** Node error code of a failed fs call, if any */
export function errorCode(err: unknown): string | undefined {
	if (err instanceof Error && "code" in err && typeof err.code === "string") {
		return err.code
	}
	return undefined
}

/** ENOENT, or ENOTDIR when a path component is a file */
export function isNotFound(err: unknown): boolean {
	const code = errorCode(err)
	return code === "ENOENT" || code === "ENOTDIR"
}
