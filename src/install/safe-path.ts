/**
 * Relative paths that are safe to join onto an install root
 *
 * A safe path is relative, never climbs with `..`, and every component is a
 * portable file name (checked with sanitize-filename's Windows rules).
 */

import { join } from "node:path"
import sanitize from "sanitize-filename"

export class SafePath {
	private constructor(private readonly components: readonly string[]) {}

	/** Validate and normalize a `/`-separated relative path; null if unsafe */
	static parse(path: string): SafePath | null {
		if (path.startsWith("/")) return null

		const components: string[] = []
		for (const component of path.split("/")) {
			if (component === "" || component === ".") continue
			if (component === "..") return null
			if (sanitize(component) !== component) return null
			components.push(component)
		}

		if (components.length === 0) return null
		return new SafePath(components)
	}

	get fileName(): string {
		return this.components[this.components.length - 1] ?? ""
	}

	/** Extension of the file name without the dot, or null */
	get extension(): string | null {
		const name = this.fileName
		const dot = name.lastIndexOf(".")
		if (dot <= 0 || dot === name.length - 1) return null
		return name.slice(dot + 1)
	}

	toPath(base: string): string {
		return join(base, ...this.components)
	}

	toString(): string {
		return this.components.join("/")
	}
}
