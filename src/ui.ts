/**
 * Terminal output helpers with consistent styling
 *
 * Spinner-aware: when an ora spinner is active, all output goes through
 * spinnerSafeLog() to avoid conflicts (flickering, line overwrites).
 */

import chalk from "chalk"
import ora, { type Ora } from "ora"
import type {
	BackendMessage,
	InstanceDescription,
	ProgressSnapshot,
} from "./types.js"
import { formatBytes } from "./progress.js"

let activeSpinner: Ora | null = null

/**
 * Print a line, pausing the active spinner around it when there is one.
 */
export function spinnerSafeLog(message: string): void {
	if (activeSpinner) {
		const text = activeSpinner.text
		activeSpinner.stop()
		console.log(message)
		activeSpinner.start(text)
	} else {
		console.log(message)
	}
}

/** Start the shared spinner; quiet mode gets none */
export function startSpinner(text: string, quiet: boolean): Ora | null {
	if (quiet || !process.stdout.isTTY) return null
	activeSpinner = ora({ text }).start()
	return activeSpinner
}

export function stopSpinner(): void {
	activeSpinner?.stop()
	activeSpinner = null
}

export function setSpinnerText(text: string): void {
	if (activeSpinner) activeSpinner.text = text
}

export const ui = {
	success(text: string): void {
		spinnerSafeLog(chalk.green("✓") + " " + text)
	},

	error(text: string): void {
		spinnerSafeLog(chalk.red("✗") + " " + text)
	},

	warn(text: string): void {
		spinnerSafeLog(chalk.yellow("⚠") + " " + text)
	},

	info(text: string): void {
		spinnerSafeLog(chalk.blue("ℹ") + " " + text)
	},

	/** Only shown if verbose */
	debug(text: string, verbose: boolean): void {
		if (verbose) {
			spinnerSafeLog(chalk.dim("  → " + text))
		}
	},

	banner(version: string, launcherDir: string): void {
		console.log(chalk.bold("Cairn launcher") + ` v${version}`)
		console.log(`Launcher dir: ${chalk.cyan(launcherDir)}`)
		console.log()
	},

	instanceLine(instance: InstanceDescription): string {
		return `${chalk.bold(instance.name)} ${chalk.dim(
			`${instance.version} ${instance.loader}`,
		)}`
	},

	progressLine(tracker: ProgressSnapshot): string {
		if (tracker.total > 1024) {
			return `${tracker.title} ${formatBytes(tracker.count)}/${formatBytes(tracker.total)}`
		}
		return `${tracker.title} ${tracker.count}/${tracker.total}`
	},

	/** Render one backend message for the watch command */
	message(message: BackendMessage, verbose: boolean): void {
		switch (message.type) {
			case "instance-added":
				ui.success(`Instance added: ${ui.instanceLine(message)}`)
				return
			case "instance-modified":
				ui.info(`Instance changed: ${ui.instanceLine(message)}`)
				return
			case "instance-removed":
				ui.warn(`Instance removed (slot ${message.id.index})`)
				return
			case "load-state":
				ui.debug(
					`${message.resource} of slot ${message.id.index}: ${message.state}`,
					verbose,
				)
				return
			case "worlds-updated":
				ui.info(`${message.worlds.length} worlds`)
				for (const world of message.worlds) {
					ui.debug(`${world.title} ${chalk.dim(world.subtitle)}`, verbose)
				}
				return
			case "servers-updated":
				ui.info(`${message.servers.length} servers`)
				for (const server of message.servers) {
					ui.debug(`${server.name} ${chalk.dim(server.address)}`, verbose)
				}
				return
			case "mods-updated":
				ui.info(`${message.mods.length} mods`)
				for (const mod of message.mods) {
					const name = mod.enabled
						? mod.summary.name
						: chalk.dim(mod.summary.name)
					ui.debug(`${name} ${chalk.dim(mod.fileName)}`, verbose)
				}
				return
			case "progress":
				if (message.tracker.error) {
					ui.error(`${message.tracker.title} failed`)
				} else if (message.tracker.finished !== null) {
					ui.debug(`${message.tracker.title} done`, verbose)
				} else {
					setSpinnerText(ui.progressLine(message.tracker))
				}
				return
			case "info":
				ui.info(message.message)
				return
			case "error":
				ui.error(message.message)
				return
		}
	},
}
