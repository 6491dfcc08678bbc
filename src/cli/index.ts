#!/usr/bin/env node
/**
 * Cairn CLI
 * Watches a launcher directory and installs content into instances
 */

import { join, resolve } from "node:path"
import { Command } from "commander"
import { z } from "zod"
import { Backend } from "../backend.js"
import { loadConfig, resolveConfig, type Config } from "../config.js"
import { errorMessage } from "../errors.js"
import { configureLogging, flushLogs, log } from "../logger.js"
import {
	CONTENT_SOURCES,
	LOADERS,
	type BackendMessage,
	type ContentDownload,
	type InstallTarget,
	type InstanceResource,
} from "../types.js"
import { startSpinner, stopSpinner, ui } from "../ui.js"
import type { WatchSubscriber } from "../watch/registry.js"

const VERSION = "0.1.0"

const RESOURCES: readonly InstanceResource[] = ["worlds", "servers", "mods"]

/** One-shot commands read the folder once and never watch it */
const NO_WATCH: WatchSubscriber = {
	watch: () => {},
	unwatch: () => {},
}

interface GlobalOptions {
	dir?: string | undefined
	verbose: boolean
	quiet: boolean
}

function configFor(options: GlobalOptions): Config {
	const config = loadConfig()
	if (!options.dir) return config
	return resolveConfig({ ...config, launcherDir: resolve(options.dir) })
}

async function exitWithCode(code: number): Promise<void> {
	if (code === 0) return
	try {
		await flushLogs()
	} catch (err) {
		console.error(errorMessage(err))
	}
	process.exitCode = code
}

// ─────────────────────────────────────────────────────────────────────────────
// CLI Definition
// ─────────────────────────────────────────────────────────────────────────────

const program = new Command()

program.enablePositionalOptions()

program
	.name("cairn")
	.version(VERSION)
	.description("Instance watcher and content installer for a block-game launcher")
	.option("-d, --dir <path>", "Launcher directory (default: ~/.cairn)")
	.option("-q, --quiet", "Minimal output", false)
	.option("--verbose", "Debug output", false)

// ─────────────────────────────────────────────────────────────────────────────
// watch
// ─────────────────────────────────────────────────────────────────────────────

program
	.command("watch")
	.description("Load every instance and print changes as they happen")
	.option("--log-file <path>", "Write logs to this file")
	.action(async (options: { logFile?: string | undefined }) => {
		const globals = program.opts<GlobalOptions>()
		const config = configFor(globals)

		const { logFilePath } = configureLogging({
			toFile: true,
			logFilePath: options.logFile,
			logDir: join(config.launcherDir, "logs"),
		})

		if (!globals.quiet) {
			ui.banner(VERSION, config.launcherDir)
			if (logFilePath) ui.info(`Logging to ${logFilePath}`)
		}

		const send = (message: BackendMessage): void => {
			if (globals.quiet && message.type !== "error") return
			ui.message(message, globals.verbose)
		}

		let backend: Backend
		try {
			backend = await Backend.start({ config, send })
		} catch (err) {
			ui.error(`Failed to start: ${errorMessage(err)}`)
			await exitWithCode(1)
			return
		}

		for (const instance of backend.listInstances()) {
			for (const resource of RESOURCES) {
				backend.requestLoad(instance.id, resource)
			}
		}

		await new Promise<void>(done => {
			const stop = (): void => {
				process.off("SIGINT", stop)
				process.off("SIGTERM", stop)
				done()
			}
			process.on("SIGINT", stop)
			process.on("SIGTERM", stop)
		})

		log.cli.info("shutting down")
		await backend.close()
		await flushLogs()
	})

// ─────────────────────────────────────────────────────────────────────────────
// list
// ─────────────────────────────────────────────────────────────────────────────

program
	.command("list")
	.description("List the instances of the launcher directory")
	.action(async () => {
		const globals = program.opts<GlobalOptions>()
		const backend = await Backend.start({
			config: configFor(globals),
			send: () => {},
			subscriber: NO_WATCH,
			provenance: false,
		})
		try {
			const instances = backend.listInstances()
			if (instances.length === 0) {
				ui.info("No instances")
			}
			for (const instance of instances) {
				console.log(`${ui.instanceLine(instance)}  ${instance.rootPath}`)
			}
		} finally {
			await backend.close()
		}
	})

// ─────────────────────────────────────────────────────────────────────────────
// create
// ─────────────────────────────────────────────────────────────────────────────

program
	.command("create")
	.description("Create a new instance")
	.argument("<name>", "Instance name")
	.requiredOption("--game-version <version>", "Game version, e.g. 1.20.1")
	.option("--loader <loader>", `Mod loader: ${LOADERS.join(", ")}`, "vanilla")
	.action(
		async (name: string, options: { gameVersion: string; loader: string }) => {
			const globals = program.opts<GlobalOptions>()
			const loader = z.enum(LOADERS).safeParse(options.loader)
			if (!loader.success) {
				ui.error(`Unknown loader: ${options.loader}`)
				await exitWithCode(1)
				return
			}

			const backend = await Backend.start({
				config: configFor(globals),
				send: () => {},
				subscriber: NO_WATCH,
				provenance: false,
			})
			try {
				const id = await backend.createInstance(
					name,
					options.gameVersion,
					loader.data,
				)
				const path = backend.instanceDotMinecraft(id)
				ui.success(`Created ${name}${path ? ` at ${path}` : ""}`)
			} catch (err) {
				ui.error(errorMessage(err))
				await exitWithCode(1)
			} finally {
				await backend.close()
			}
		},
	)

// ─────────────────────────────────────────────────────────────────────────────
// install
// ─────────────────────────────────────────────────────────────────────────────

interface InstallOptions {
	url?: string | undefined
	sha1?: string | undefined
	size?: string | undefined
	file?: string | undefined
	instance?: string | undefined
	source: string
}

function downloadFromOptions(options: InstallOptions): ContentDownload | null {
	if (options.file) {
		return { type: "file", path: resolve(options.file) }
	}
	if (!options.url || !options.sha1 || !options.size) return null
	const size = Number.parseInt(options.size, 10)
	if (!Number.isSafeInteger(size) || size < 0) return null
	return { type: "url", url: options.url, sha1: options.sha1, size }
}

program
	.command("install")
	.description(
		"Install one file into an instance, or only into the content library",
	)
	.argument("<path>", "Destination relative to .minecraft, e.g. mods/foo.jar")
	.option("--url <url>", "Download URL")
	.option("--sha1 <hash>", "Expected SHA-1 of the download")
	.option("--size <bytes>", "Expected size of the download")
	.option("--file <path>", "Install a local file instead of downloading")
	.option("--instance <name>", "Target instance (default: library only)")
	.option(
		"--source <source>",
		`Content source: ${CONTENT_SOURCES.join(", ")}`,
		"url",
	)
	.action(async (path: string, options: InstallOptions) => {
		const globals = program.opts<GlobalOptions>()

		const download = downloadFromOptions(options)
		if (!download) {
			ui.error("Pass --file, or all of --url, --sha1 and --size")
			await exitWithCode(1)
			return
		}
		const source = z.enum(CONTENT_SOURCES).safeParse(options.source)
		if (!source.success) {
			ui.error(`Unknown source: ${options.source}`)
			await exitWithCode(1)
			return
		}

		const backend = await Backend.start({
			config: configFor(globals),
			send: message => {
				if (message.type === "progress") ui.message(message, globals.verbose)
			},
			subscriber: NO_WATCH,
		})

		try {
			let target: InstallTarget = { type: "library" }
			if (options.instance !== undefined) {
				const wanted = options.instance
				const instance = backend
					.listInstances()
					.find(i => i.name === wanted)
				if (!instance) {
					ui.error(`No instance named ${wanted}`)
					await exitWithCode(1)
					return
				}
				target = { type: "instance", id: instance.id }
			}

			startSpinner(`Installing ${path}`, globals.quiet)
			const result = await backend.install({
				target,
				files: [{ path, download, source: source.data }],
			})
			stopSpinner()

			for (const file of result.files) {
				const where = file.installedPath ?? file.storePath
				ui.success(`${file.path} ${file.cached ? "(cached) " : ""}→ ${where}`)
				ui.debug(`sha1 ${file.sha1}`, globals.verbose)
			}
		} catch (err) {
			stopSpinner()
			ui.error(errorMessage(err))
			await exitWithCode(1)
		} finally {
			await backend.close()
		}
	})

// ─────────────────────────────────────────────────────────────────────────────
// Entry Point
// ─────────────────────────────────────────────────────────────────────────────

program.parseAsync().catch(async (err: unknown) => {
	ui.error(errorMessage(err))
	await exitWithCode(1)
})
