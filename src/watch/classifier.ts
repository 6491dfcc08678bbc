/**
 * Filesystem event classification
 *
 * Watch backends report a wide, platform-dependent set of notification kinds.
 * The router only understands three shapes, so everything is reduced here:
 *
 * - Changed: something at `path` appeared or its content changed. The file and
 *   folder hints say what it might be; both are set when the backend could
 *   not tell.
 * - Remove: `path` is gone.
 * - Rename: a move where both endpoints are known.
 *
 * Events that carry no actionable information (metadata-only modifications,
 * access, unclassifiable kinds) are dropped.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Raw events
// ─────────────────────────────────────────────────────────────────────────────

export type RawEventKind =
	| { type: "create"; subtype: "file" | "folder" | "any" | "other" }
	| { type: "modify-any" }
	| { type: "modify-data"; subtype: "content" | "size" | "any" | "other" }
	| { type: "modify-metadata" }
	| { type: "modify-name"; mode: "to" | "from" | "both" | "any" | "other" }
	| { type: "modify-other" }
	| { type: "remove"; subtype: "file" | "folder" | "any" | "other" }
	| { type: "access" }
	| { type: "any" }
	| { type: "other" }

export interface RawFsEvent {
	kind: RawEventKind
	/** Absolute paths; a "both" rename carries [from, to] */
	paths: string[]
}

// ─────────────────────────────────────────────────────────────────────────────
// Classified events
// ─────────────────────────────────────────────────────────────────────────────

export type FilesystemEvent =
	| {
			type: "changed"
			path: string
			maybeFile: boolean
			maybeFolder: boolean
	  }
	| { type: "remove"; path: string }
	| { type: "rename"; from: string; to: string }

/** The path a Changed or Remove event is about; null for renames */
export function changeOrRemovePath(event: FilesystemEvent): string | null {
	switch (event.type) {
		case "changed":
		case "remove":
			return event.path
		case "rename":
			return null
	}
}

function changed(
	path: string,
	maybeFile: boolean,
	maybeFolder: boolean,
): FilesystemEvent {
	return { type: "changed", path, maybeFile, maybeFolder }
}

function renameEvent(
	mode: Extract<RawEventKind, { type: "modify-name" }>["mode"],
	first: string,
	second: string | undefined,
): FilesystemEvent | null {
	switch (mode) {
		case "to":
			return changed(first, true, true)
		case "from":
			return { type: "remove", path: first }
		case "both":
			if (second === undefined) return null
			return { type: "rename", from: first, to: second }
		case "any":
		case "other":
			return null
	}
}

/**
 * Reduce one raw notification to the canonical alphabet.
 * Returns null for notifications that should be ignored.
 */
export function classifyEvent(raw: RawFsEvent): FilesystemEvent | null {
	const [first, second] = raw.paths
	if (first === undefined) return null

	const kind = raw.kind
	switch (kind.type) {
		case "create":
			if (kind.subtype === "other") return null
			return changed(
				first,
				kind.subtype === "file" || kind.subtype === "any",
				kind.subtype === "folder" || kind.subtype === "any",
			)
		case "modify-any":
			return changed(first, true, true)
		case "modify-data":
			if (kind.subtype === "content" || kind.subtype === "any") {
				return changed(first, true, false)
			}
			return null
		case "modify-name":
			return renameEvent(kind.mode, first, second)
		case "remove":
			if (kind.subtype === "other") return null
			return { type: "remove", path: first }
		case "modify-metadata":
		case "modify-other":
		case "access":
		case "any":
		case "other":
			return null
	}
}

/**
 * Classify a delivered batch and coalesce adjacent events about the same
 * path, keeping the later one. Renames are never merged: dropping either of
 * two renames would lose an endpoint.
 */
export function coalesceEvents(batch: readonly RawFsEvent[]): FilesystemEvent[] {
	const result: FilesystemEvent[] = []
	let pending: FilesystemEvent | null = null

	for (const raw of batch) {
		const next = classifyEvent(raw)
		if (!next) continue

		if (pending) {
			const pendingPath = changeOrRemovePath(pending)
			const nextPath = changeOrRemovePath(next)
			const samePath = pendingPath !== null && pendingPath === nextPath
			if (!samePath) {
				result.push(pending)
			}
		}
		pending = next
	}

	if (pending) result.push(pending)
	return result
}
