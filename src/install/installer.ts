/**
 * Content installer
 *
 * Resolves every file of an install request into the content library
 * (downloading or copying as needed, all through one shared backpressure
 * controller), records provenance, then hard-links the stored files into
 * the target instance.
 */

import { copyFile, link, mkdir, rm } from "node:fs/promises"
import { basename, dirname } from "node:path"
import type { Dispatcher } from "undici"
import type { InstanceId } from "../arena.js"
import type { BackpressureController } from "../backpressure.js"
import type { ProvenanceStore } from "../db/index.js"
import { ContentInstallError, errorCode, errorMessage } from "../errors.js"
import { parseSha1 } from "../hash.js"
import { log } from "../logger.js"
import type { ModMetadataReader } from "../mod-metadata.js"
import type { ProgressReporter } from "../progress.js"
import type {
	ContentInstall,
	ContentInstallFile,
	ContentSource,
	Loader,
	ModpackFile,
} from "../types.js"
import { isZipArchive } from "../zip.js"
import type { ContentLibrary } from "./content-library.js"
import { downloadIntoLibrary } from "./download.js"
import { SafePath } from "./safe-path.js"

/** What the installer needs from the backend */
export interface InstallHost {
	/** .minecraft folder of a loaded instance, or null if it is gone */
	instanceDotMinecraft(id: InstanceId): string | null
	createInstance(
		name: string,
		version: string,
		loader: Loader,
	): Promise<InstanceId>
	setReloadModsImmediately(id: InstanceId): void
}

export interface ContentInstallerOptions {
	library: ContentLibrary
	gate: BackpressureController
	metadata: ModMetadataReader
	progress: ProgressReporter
	userAgent: string
	provenance?: ProvenanceStore | null | undefined
	dispatcher?: Dispatcher | undefined
}

export interface InstalledFile {
	/** Relative install path */
	path: string
	sha1: string
	/** Physical path in the content library */
	storePath: string
	/** Path inside the instance, null for library-only installs */
	installedPath: string | null
	/** True when the library already held a valid copy */
	cached: boolean
}

export interface InstallResult {
	instanceId: InstanceId | null
	files: InstalledFile[]
}

interface ResolvedFile {
	file: ContentInstallFile
	safePath: SafePath
	sha1: string
	storePath: string
	cached: boolean
}

interface RemoteFile {
	url: string
	sha1: string
	size: number
	safePath: SafePath
}

export class ContentInstaller {
	constructor(private readonly options: ContentInstallerOptions) {}

	/**
	 * Install every file of the request. The first failing file fails the
	 * whole request; files already stored stay in the library.
	 */
	async install(
		request: ContentInstall,
		host: InstallHost,
	): Promise<InstallResult> {
		const safePaths = request.files.map(file => {
			const safePath = SafePath.parse(file.path)
			if (safePath === null) throw ContentInstallError.invalidPath(file.path)
			return safePath
		})

		const resolved = await Promise.all(
			request.files.map((file, i) => {
				const safePath = safePaths[i]
				if (!safePath) throw ContentInstallError.invalidPath(file.path)
				return this.resolveFile(file, safePath)
			}),
		)

		this.recordProvenance(resolved)

		let instanceId: InstanceId | null = null
		let dotMinecraft: string | null = null
		switch (request.target.type) {
			case "instance":
				instanceId = request.target.id
				dotMinecraft = host.instanceDotMinecraft(instanceId)
				if (dotMinecraft === null) {
					throw ContentInstallError.io(
						new Error("instance no longer exists"),
						"resolve install target",
					)
				}
				break
			case "new-instance": {
				const { name, version, loader } = request.target
				instanceId = await host.createInstance(name, version, loader)
				dotMinecraft = host.instanceDotMinecraft(instanceId)
				break
			}
			case "library":
				break
		}

		const files: InstalledFile[] = []
		for (const entry of resolved) {
			let installedPath: string | null = null
			if (dotMinecraft !== null) {
				installedPath = entry.safePath.toPath(dotMinecraft)
				await this.linkIntoInstance(entry, installedPath)
			}
			files.push({
				path: entry.safePath.toString(),
				sha1: entry.sha1,
				storePath: entry.storePath,
				installedPath,
				cached: entry.cached,
			})
		}

		if (instanceId !== null && dotMinecraft !== null) {
			host.setReloadModsImmediately(instanceId)
		}

		log.install.info(
			{ files: files.length, target: request.target.type },
			"install complete",
		)
		return { instanceId, files }
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Resolving into the library
	// ─────────────────────────────────────────────────────────────────────────

	private async resolveFile(
		file: ContentInstallFile,
		safePath: SafePath,
	): Promise<ResolvedFile> {
		const download = file.download
		switch (download.type) {
			case "url": {
				const remote: RemoteFile = {
					url: download.url,
					sha1: download.sha1,
					size: download.size,
					safePath,
				}
				const stored = await this.options.gate.run(download.size, () =>
					this.fetchIntoLibrary(remote),
				)
				await this.expandModpack(stored.storePath)
				return { file, safePath, ...stored }
			}
			case "file": {
				const tracker = this.options.progress.create(
					`Copying ${basename(download.path)}`,
					1,
				)
				try {
					const stored = await this.options.library.ingestFile(
						download.path,
						safePath.extension,
					)
					tracker.finish(stored.copied ? "slow" : "fast")
					return {
						file,
						safePath,
						sha1: stored.sha1,
						storePath: stored.path,
						cached: !stored.copied,
					}
				} catch (err) {
					tracker.fail()
					throw err
				}
			}
		}
	}

	/** Download one remote file into the library, or reuse a valid copy */
	private async fetchIntoLibrary(
		remote: RemoteFile,
	): Promise<{ sha1: string; storePath: string; cached: boolean }> {
		const { library } = this.options
		const sha1 = parseSha1(remote.sha1)
		if (sha1 === null) throw ContentInstallError.invalidHash(remote.sha1)

		const storePath = library.pathFor(sha1, remote.safePath.extension)
		const tracker = this.options.progress.create(
			`Downloading ${remote.safePath.fileName}`,
			remote.size,
		)

		if (await library.hasValid(storePath, sha1)) {
			log.install.debug({ sha1, storePath }, "library hit")
			tracker.finish("fast")
			return { sha1, storePath, cached: true }
		}

		try {
			await downloadIntoLibrary(
				{ url: remote.url, sha1, size: remote.size, dest: storePath },
				{
					library,
					userAgent: this.options.userAgent,
					dispatcher: this.options.dispatcher,
					onBytes: bytes => tracker.addCount(bytes),
				},
			)
		} catch (err) {
			tracker.fail()
			log.install.warn(
				{ err, url: remote.url, sha1 },
				`download failed: ${errorMessage(err)}`,
			)
			throw ContentInstallError.from(err, `download ${remote.url}`)
		}

		tracker.finish("slow")
		return { sha1, storePath, cached: false }
	}

	/**
	 * If the stored file is a Modrinth modpack, fetch every file it lists into
	 * the library. Runs after the parent released its permit; failures are
	 * logged and flagged on their trackers only.
	 */
	private async expandModpack(storePath: string): Promise<void> {
		if (!isZipArchive(storePath)) return
		const summary = await this.options.metadata.read(storePath)
		if (summary?.kind !== "modrinth-modpack") return

		const children = summary.packFiles.flatMap(file => {
			const remote = this.modpackChild(file)
			return remote ? [remote] : []
		})

		const results = await Promise.allSettled(
			children.map(child =>
				this.options.gate.run(child.size, () => this.fetchIntoLibrary(child)),
			),
		)

		let failed = 0
		for (const [i, result] of results.entries()) {
			if (result.status === "rejected") {
				failed++
				log.install.warn(
					{ err: result.reason, path: children[i]?.safePath.toString() },
					"modpack file failed to download",
				)
			}
		}
		log.install.info(
			{ modpack: summary.name, files: children.length, failed },
			"modpack files fetched",
		)
	}

	private modpackChild(file: ModpackFile): RemoteFile | null {
		const safePath = SafePath.parse(file.path)
		const url = file.downloads[0]
		if (safePath === null || url === undefined) {
			log.install.warn({ path: file.path }, "skipping unusable modpack file")
			return null
		}
		return { url, sha1: file.sha1, size: file.size, safePath }
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Linking into the instance
	// ─────────────────────────────────────────────────────────────────────────

	private async linkIntoInstance(
		entry: ResolvedFile,
		installedPath: string,
	): Promise<void> {
		try {
			await mkdir(dirname(installedPath), { recursive: true })
			if (entry.file.replaceOld !== undefined) {
				await rm(entry.file.replaceOld, { force: true })
			}
			await rm(installedPath, { force: true })
			await linkOrCopy(entry.storePath, installedPath)
		} catch (err) {
			throw ContentInstallError.io(err, `install ${installedPath}`)
		}
	}

	private recordProvenance(resolved: readonly ResolvedFile[]): void {
		const provenance = this.options.provenance
		if (!provenance) return

		const entries: { sha1: string; source: ContentSource }[] = resolved.map(
			entry => ({ sha1: entry.sha1, source: entry.file.source }),
		)
		try {
			provenance.record(entries)
		} catch (err) {
			log.install.error({ err }, "failed to record content sources")
		}
	}
}

/** Hard link, or copy when the library is on another filesystem */
export async function linkOrCopy(from: string, to: string): Promise<void> {
	try {
		await link(from, to)
	} catch (err) {
		if (errorCode(err) !== "EXDEV") throw err
		log.install.debug({ from, to }, "cross-device link, copying instead")
		await copyFile(from, to)
	}
}
