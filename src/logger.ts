/**
 * Centralized logging with pino
 *
 * Design: Dual-output architecture
 * - Pino handles structured JSON logging for debugging/files
 * - UI module (ui.ts) handles user-facing CLI output
 *
 * Log levels:
 * - fatal: System crash
 * - error: Operation failed
 * - warn: Recoverable issue (skipped scan entry, failed watch)
 * - info: Key milestones (default for production)
 * - debug: Detailed operation info (--verbose)
 * - trace: Raw filesystem events
 */

import { existsSync, mkdirSync } from "node:fs"
import { dirname, join } from "node:path"
import pino from "pino"

// Determine log level from environment or use sensible default
const level =
	process.env["LOG_LEVEL"] || (process.env["DEBUG"] ? "debug" : "info")

// Use pino-pretty for development, raw JSON for production/CI
const isDev = process.stdout.isTTY && !process.env["CI"]

export interface ConfigureLoggingOptions {
	/** When true, logs are redirected to a file (long-running watch sessions). */
	toFile: boolean
	/** Optional explicit log file path. If omitted, a per-run file is created under the launcher dir. */
	logFilePath?: string | undefined
	/** Directory used for the default per-run log file. */
	logDir?: string | undefined
}

let currentMode: "console" | "file" = "console"
let currentLogFilePath: string | null = null

function ensureDirExists(path: string): void {
	const dir = dirname(path)
	if (!existsSync(dir)) {
		mkdirSync(dir, { recursive: true })
	}
}

function defaultLogFilePath(logDir: string): string {
	const stamp = new Date().toISOString().replace(/[:.]/g, "-")
	return join(logDir, `cairn-${stamp}-${process.pid}.log`)
}

function createConsoleLogger() {
	return isDev
		? pino({
				level,
				transport: {
					target: "pino-pretty",
					options: {
						colorize: true,
						translateTime: "HH:MM:ss",
						ignore: "pid,hostname",
						messageFormat: "{module}: {msg}",
					},
				},
			})
		: pino({
				level,
				base: { pid: undefined, hostname: undefined },
			})
}

function createFileLogger(path: string) {
	ensureDirExists(path)
	// The CLI exits through process.exitCode after flushLogs(); sync writes keep
	// the tail of the log when a watch session is interrupted.
	const destination = pino.destination({ dest: path, sync: true })
	const fileLevel =
		process.env["LOG_LEVEL_FILE"] ??
		(process.env["LOG_LEVEL"] || process.env["DEBUG"] ? level : "debug")
	return pino(
		{
			level: fileLevel,
			base: { pid: undefined, hostname: undefined },
		},
		destination,
	)
}

/**
 * Root logger instance
 * In most cases, use createLogger() to get a module-specific child logger
 */
export let logger = createConsoleLogger()

/** Configure logging. File mode keeps console output for the user-facing UI only. */
export function configureLogging(options: ConfigureLoggingOptions): {
	logFilePath: string | null
} {
	if (options.toFile) {
		const nextPath =
			options.logFilePath ??
			currentLogFilePath ??
			defaultLogFilePath(options.logDir ?? join(process.cwd(), ".log"))
		if (currentMode === "file" && currentLogFilePath === nextPath) {
			return { logFilePath: currentLogFilePath }
		}
		currentMode = "file"
		currentLogFilePath = nextPath
		logger = createFileLogger(nextPath)
		return { logFilePath: currentLogFilePath }
	}

	if (currentMode !== "console") {
		currentMode = "console"
		currentLogFilePath = null
		logger = createConsoleLogger()
	}

	return { logFilePath: currentLogFilePath }
}

/**
 * Create a child logger for a specific module
 * @example
 * const log = createLogger("router")
 * log.debug({ path }, "no watch target for path or parent")
 */
export function createLogger(module: string) {
	return logger.child({ module })
}

/**
 * Flush pending log writes (call before process exit)
 */
export function flushLogs(): Promise<void> {
	return new Promise(resolve => {
		logger.flush(() => resolve())
	})
}

// Pre-created loggers for common modules (getters so they follow reconfiguration)
export const log = {
	get watch() {
		return createLogger("watch")
	},
	get router() {
		return createLogger("router")
	},
	get instance() {
		return createLogger("instance")
	},
	get loader() {
		return createLogger("loader")
	},
	get install() {
		return createLogger("install")
	},
	get backend() {
		return createLogger("backend")
	},
	get cli() {
		return createLogger("cli")
	},
	get db() {
		return createLogger("db")
	},
} as const
