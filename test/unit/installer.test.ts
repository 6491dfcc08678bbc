/**
 * Unit tests for the content installer
 *
 * HTTP is served by an undici MockAgent with net connect disabled, so every
 * request a test did not intercept fails.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest"
import { createHash } from "node:crypto"
import { mkdir, readFile, readdir, stat, writeFile } from "node:fs/promises"
import { dirname, join } from "node:path"
import { MockAgent } from "undici"
import { idKey, type InstanceId } from "../../src/arena.js"
import { BackpressureController } from "../../src/backpressure.js"
import { ProvenanceStore } from "../../src/db/index.js"
import { ContentLibrary } from "../../src/install/content-library.js"
import {
	ContentInstaller,
	type InstallHost,
} from "../../src/install/installer.js"
import { ModMetadataReader } from "../../src/mod-metadata.js"
import { ProgressReporter } from "../../src/progress.js"
import type {
	ContentInstallFile,
	Loader,
	ProgressSnapshot,
} from "../../src/types.js"
import { withTempDir, writeJar } from "../helpers/index.js"

const ORIGIN = "https://cdn.example.test"

function sha1(data: string | Buffer): string {
	return createHash("sha1").update(data).digest("hex")
}

class FakeHost implements InstallHost {
	private readonly dotMinecrafts = new Map<string, string>()
	readonly reloads: InstanceId[] = []
	readonly created: { name: string; version: string; loader: Loader }[] = []

	constructor(private readonly dir: string) {}

	add(folder: string): InstanceId {
		const id = { index: this.dotMinecrafts.size, generation: 0 }
		this.dotMinecrafts.set(idKey(id), join(this.dir, folder, ".minecraft"))
		return id
	}

	instanceDotMinecraft(id: InstanceId): string | null {
		return this.dotMinecrafts.get(idKey(id)) ?? null
	}

	async createInstance(
		name: string,
		version: string,
		loader: Loader,
	): Promise<InstanceId> {
		this.created.push({ name, version, loader })
		return this.add(name)
	}

	setReloadModsImmediately(id: InstanceId): void {
		this.reloads.push(id)
	}
}

interface Harness {
	dir: string
	library: ContentLibrary
	installer: ContentInstaller
	host: FakeHost
	progress: ProgressSnapshot[]
}

describe("ContentInstaller", () => {
	let agent: MockAgent

	beforeEach(() => {
		agent = new MockAgent()
		agent.disableNetConnect()
	})

	afterEach(async () => {
		await agent.close()
	})

	function withInstaller(
		fn: (h: Harness) => Promise<void>,
		provenance: ProvenanceStore | null = null,
	): Promise<void> {
		return withTempDir(async dir => {
			const library = new ContentLibrary(join(dir, "library"))
			const progress: ProgressSnapshot[] = []
			const installer = new ContentInstaller({
				library,
				gate: new BackpressureController({
					maxConcurrent: 8,
					maxBytesInFlight: 64 * 1024 * 1024,
				}),
				metadata: new ModMetadataReader(),
				progress: new ProgressReporter(s => progress.push(s), {
					throttleMs: 0,
				}),
				userAgent: "cairn-test",
				provenance,
				dispatcher: agent,
			})
			await fn({
				dir,
				library,
				installer,
				host: new FakeHost(join(dir, "instances")),
				progress,
			})
		})
	}

	function serve(path: string, body: string | Buffer, status = 200): void {
		agent.get(ORIGIN).intercept({ path, method: "GET" }).reply(status, body)
	}

	function remote(
		path: string,
		body: string | Buffer,
		overrides: { sha1?: string; size?: number } = {},
	): ContentInstallFile {
		return {
			path,
			download: {
				type: "url",
				url: `${ORIGIN}/${path}`,
				sha1: overrides.sha1 ?? sha1(body),
				size: overrides.size ?? Buffer.byteLength(body),
			},
			source: "modrinth",
		}
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Downloads
	// ─────────────────────────────────────────────────────────────────────────

	it("stores a verified download at its content address", () =>
		withInstaller(async ({ installer, host, library }) => {
			serve("/mods/a.jar", "jar bytes")

			const result = await installer.install(
				{ target: { type: "library" }, files: [remote("mods/a.jar", "jar bytes")] },
				host,
			)

			const expected = library.pathFor(sha1("jar bytes"), "jar")
			expect(result).toEqual({
				instanceId: null,
				files: [
					{
						path: "mods/a.jar",
						sha1: sha1("jar bytes"),
						storePath: expected,
						installedPath: null,
						cached: false,
					},
				],
			})
			expect(await readFile(expected, "utf-8")).toBe("jar bytes")
		}))

	it("deletes a download with the wrong hash", () =>
		withInstaller(async ({ installer, host, library }) => {
			serve("/mods/a.jar", "tampered")
			const declared = sha1("original")
			const file = remote("mods/a.jar", "tampered", {
				sha1: declared,
				size: Buffer.byteLength("tampered"),
			})

			await expect(
				installer.install({ target: { type: "library" }, files: [file] }, host),
			).rejects.toMatchObject({ kind: "wrong-hash" })

			const path = library.pathFor(declared, "jar")
			await expect(stat(path)).rejects.toMatchObject({ code: "ENOENT" })
			expect(await readdir(dirname(path))).toEqual([])
		}))

	it("deletes a download with the wrong size", () =>
		withInstaller(async ({ installer, host, library }) => {
			serve("/mods/a.jar", "short")
			const file = remote("mods/a.jar", "short", { size: 999 })

			await expect(
				installer.install({ target: { type: "library" }, files: [file] }, host),
			).rejects.toMatchObject({ kind: "wrong-filesize" })
			await expect(
				stat(library.pathFor(sha1("short"), "jar")),
			).rejects.toMatchObject({ code: "ENOENT" })
		}))

	it("skips the network when the library already has the file", () =>
		withInstaller(async ({ installer, host, progress }) => {
			// A single interceptor: a second request would fail
			serve("/mods/a.jar", "cached bytes")
			const file = remote("mods/a.jar", "cached bytes")

			const first = await installer.install(
				{ target: { type: "library" }, files: [file] },
				host,
			)
			agent.assertNoPendingInterceptors()

			const second = await installer.install(
				{ target: { type: "library" }, files: [file] },
				host,
			)

			expect(second.files[0]?.cached).toBe(true)
			expect(second.files[0]?.storePath).toBe(first.files[0]?.storePath)
			expect(progress.at(-1)).toMatchObject({
				finished: "fast",
				error: false,
				count: Buffer.byteLength("cached bytes"),
			})
		}))

	it("reports a non-200 status", () =>
		withInstaller(async ({ installer, host }) => {
			serve("/mods/a.jar", "missing", 404)
			await expect(
				installer.install(
					{ target: { type: "library" }, files: [remote("mods/a.jar", "x")] },
					host,
				),
			).rejects.toMatchObject({ kind: "not-ok", status: 404 })
		}))

	it("rejects an invalid hash before any request", () =>
		withInstaller(async ({ installer, host }) => {
			const file = remote("mods/a.jar", "x", { sha1: "not-a-hash" })
			await expect(
				installer.install({ target: { type: "library" }, files: [file] }, host),
			).rejects.toMatchObject({ kind: "invalid-hash" })
		}))

	it("rejects paths that escape the instance", () =>
		withInstaller(async ({ installer, host }) => {
			const file = remote("../escape.jar", "x")
			await expect(
				installer.install({ target: { type: "library" }, files: [file] }, host),
			).rejects.toMatchObject({ kind: "invalid-path" })
		}))

	it("flags the failed tracker", () =>
		withInstaller(async ({ installer, host, progress }) => {
			serve("/mods/a.jar", "gone", 500)
			await expect(
				installer.install(
					{ target: { type: "library" }, files: [remote("mods/a.jar", "x")] },
					host,
				),
			).rejects.toThrow()
			expect(progress.at(-1)).toMatchObject({
				title: "Downloading a.jar",
				error: true,
			})
		}))

	// ─────────────────────────────────────────────────────────────────────────
	// Linking into instances
	// ─────────────────────────────────────────────────────────────────────────

	it("hard-links a local file into an instance", () =>
		withInstaller(async ({ dir, installer, host }) => {
			const id = host.add("pack")
			const source = join(dir, "downloads", "local.jar")
			await mkdir(dirname(source), { recursive: true })
			await writeFile(source, "local bytes")

			const result = await installer.install(
				{
					target: { type: "instance", id },
					files: [
						{
							path: "mods/local.jar",
							download: { type: "file", path: source },
							source: "manual",
						},
					],
				},
				host,
			)

			const [file] = result.files
			expect(file?.installedPath).toBe(
				join(dir, "instances", "pack", ".minecraft", "mods", "local.jar"),
			)
			if (!file?.installedPath) return
			const installed = await stat(file.installedPath)
			const stored = await stat(file.storePath)
			expect(installed.ino).toBe(stored.ino)
			expect(stored.nlink).toBe(2)
			expect(host.reloads).toEqual([id])
		}))

	it("copies a local file into the library only once", () =>
		withInstaller(async ({ dir, installer, host }) => {
			const source = join(dir, "local.jar")
			await writeFile(source, "same bytes")
			const request = {
				target: { type: "library" as const },
				files: [
					{
						path: "mods/local.jar",
						download: { type: "file" as const, path: source },
						source: "manual" as const,
					},
				],
			}

			const first = await installer.install(request, host)
			const second = await installer.install(request, host)
			expect(first.files[0]?.cached).toBe(false)
			expect(second.files[0]?.cached).toBe(true)
		}))

	it("deletes the replaced file", () =>
		withInstaller(async ({ dir, installer, host }) => {
			const id = host.add("pack")
			const old = join(dir, "instances", "pack", ".minecraft", "mods", "a-1.0.jar")
			await mkdir(dirname(old), { recursive: true })
			await writeFile(old, "old version")
			serve("/mods/a-2.0.jar", "new version")

			await installer.install(
				{
					target: { type: "instance", id },
					files: [{ ...remote("mods/a-2.0.jar", "new version"), replaceOld: old }],
				},
				host,
			)

			await expect(stat(old)).rejects.toMatchObject({ code: "ENOENT" })
			expect(await readdir(dirname(old))).toEqual(["a-2.0.jar"])
		}))

	it("creates the instance for a new-instance target", () =>
		withInstaller(async ({ dir, installer, host }) => {
			serve("/mods/a.jar", "bytes")
			const result = await installer.install(
				{
					target: {
						type: "new-instance",
						name: "Fresh",
						version: "1.21",
						loader: "neoforge",
					},
					files: [remote("mods/a.jar", "bytes")],
				},
				host,
			)

			expect(host.created).toEqual([
				{ name: "Fresh", version: "1.21", loader: "neoforge" },
			])
			expect(result.files[0]?.installedPath).toBe(
				join(dir, "instances", "Fresh", ".minecraft", "mods", "a.jar"),
			)
		}))

	it("fails when the target instance is gone", () =>
		withInstaller(async ({ dir, installer, host }) => {
			const source = join(dir, "local.jar")
			await writeFile(source, "bytes")
			await expect(
				installer.install(
					{
						target: { type: "instance", id: { index: 7, generation: 0 } },
						files: [
							{
								path: "mods/local.jar",
								download: { type: "file", path: source },
								source: "manual",
							},
						],
					},
					host,
				),
			).rejects.toMatchObject({ kind: "io" })
		}))

	// ─────────────────────────────────────────────────────────────────────────
	// Provenance and modpacks
	// ─────────────────────────────────────────────────────────────────────────

	it("records provenance for non-manual sources", async () => {
		const provenance = ProvenanceStore.open(":memory:")
		try {
			await withInstaller(async ({ dir, installer, host }) => {
				serve("/mods/a.jar", "remote bytes")
				const source = join(dir, "local.jar")
				await writeFile(source, "local bytes")

				await installer.install(
					{
						target: { type: "library" },
						files: [
							remote("mods/a.jar", "remote bytes"),
							{
								path: "mods/local.jar",
								download: { type: "file", path: source },
								source: "manual",
							},
						],
					},
					host,
				)

				expect(provenance.count()).toBe(1)
				expect(provenance.lookup(sha1("remote bytes"))).toBe("modrinth")
				expect(provenance.lookup(sha1("local bytes"))).toBeNull()
			}, provenance)
		} finally {
			provenance.close()
		}
	})

	it("fetches the files listed by a downloaded modpack", () =>
		withInstaller(async ({ dir, installer, host, library }) => {
			const child = "child mod bytes"
			const packPath = join(dir, "build", "pack.mrpack")
			await writeJar(packPath, {
				"modrinth.index.json": JSON.stringify({
					formatVersion: 1,
					game: "minecraft",
					versionId: "1.0.0",
					name: "Pack",
					files: [
						{
							path: "mods/child.jar",
							hashes: { sha1: sha1(child) },
							downloads: [`${ORIGIN}/files/child.jar`],
							fileSize: Buffer.byteLength(child),
						},
					],
				}),
			})
			const pack = await readFile(packPath)
			serve("/pack.mrpack", pack)
			serve("/files/child.jar", child)

			await installer.install(
				{ target: { type: "library" }, files: [remote("pack.mrpack", pack)] },
				host,
			)

			agent.assertNoPendingInterceptors()
			const childPath = library.pathFor(sha1(child), "jar")
			expect(await readFile(childPath, "utf-8")).toBe(child)
		}))
})
