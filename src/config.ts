/**
 * Configuration management with Zod validation
 */

import { existsSync, readFileSync } from "node:fs"
import { homedir } from "node:os"
import { join, resolve } from "node:path"
import { z } from "zod"
import { log } from "./logger.js"

const ConfigSchema = z.object({
	/** Root directory holding instances/, contentlibrary/ and contentmeta/ */
	launcherDir: z.string().min(1).default(join(homedir(), ".cairn")),
	/** Quiescence window before a batch of filesystem events is delivered */
	debounceMs: z.number().int().min(0).max(10_000).default(200),
	maxConcurrentDownloads: z.number().int().min(1).max(32).default(8),
	maxBytesInFlight: z
		.number()
		.int()
		.min(1024 * 1024)
		.default(256 * 1024 * 1024),
	/** Start reloads automatically for loaded resources that became dirty */
	autoReload: z.boolean().default(true),
	/** Upper bound on the control loop's sleep between ticks */
	tickIntervalMs: z.number().int().min(10).max(60_000).default(1000),
	userAgent: z.string().default("cairn-launcher-core/0.1.0"),
})

export type Config = z.infer<typeof ConfigSchema>

export type ConfigInput = z.input<typeof ConfigSchema>

const DEFAULT_CONFIG: Config = ConfigSchema.parse({})

/**
 * Validate a partial config and fill in defaults
 */
export function resolveConfig(input: ConfigInput = {}): Config {
	const config = ConfigSchema.parse(input)
	return { ...config, launcherDir: resolve(config.launcherDir) }
}

/**
 * Load configuration from .cairnrc (JSON format)
 * Checks current directory first, then home directory.
 * CAIRN_DIR overrides the launcher directory from any file.
 */
export function loadConfig(): Config {
	const paths = [
		join(process.cwd(), ".cairnrc"),
		join(process.cwd(), ".cairnrc.json"),
		join(homedir(), ".cairnrc"),
		join(homedir(), ".cairnrc.json"),
	]

	const envDir = process.env["CAIRN_DIR"]
	const overrides: ConfigInput = envDir ? { launcherDir: envDir } : {}

	for (const path of paths) {
		if (existsSync(path)) {
			try {
				const raw = readFileSync(path, "utf-8")
				const parsed = ConfigSchema.partial().parse(JSON.parse(raw))
				return resolveConfig({ ...parsed, ...overrides })
			} catch (err) {
				// Continue to next path if invalid
				log.cli.warn({ err, path }, "ignoring invalid config file")
			}
		}
	}

	return resolveConfig(overrides)
}

export { DEFAULT_CONFIG, ConfigSchema }
