/**
 * Backend integration tests
 *
 * Raw filesystem batches are fed in directly, so no OS watcher runs.
 */

import { describe, it, expect, vi } from "vitest"
import { readFile } from "node:fs/promises"
import { join } from "node:path"
import { Backend } from "../../src/backend.js"
import { resolveConfig } from "../../src/config.js"
import { rawEventFromChokidar } from "../../src/watch/watcher.js"
import {
	RecordingSubscriber,
	fabricJar,
	messageRecorder,
	withTempDir,
	writeInstance,
	writeJar,
	writeWorld,
} from "../helpers/index.js"

async function withBackend(
	fn: (ctx: {
		backend: Backend
		dir: string
		instancesDir: string
		subscriber: RecordingSubscriber
		recorder: ReturnType<typeof messageRecorder>
	}) => Promise<void>,
	setup: (instancesDir: string) => Promise<void> = async () => {},
): Promise<void> {
	await withTempDir(async dir => {
		const instancesDir = join(dir, "instances")
		await setup(instancesDir)

		const subscriber = new RecordingSubscriber()
		const recorder = messageRecorder()
		const backend = await Backend.start({
			config: resolveConfig({ launcherDir: dir, tickIntervalMs: 10 }),
			send: recorder.send,
			subscriber,
			provenance: false,
		})
		try {
			await fn({ backend, dir, instancesDir, subscriber, recorder })
		} finally {
			await backend.close()
		}
	})
}

describe("Backend", () => {
	it("discovers existing instances on start", () =>
		withBackend(
			async ({ backend, instancesDir, subscriber, recorder }) => {
				const added = recorder.ofType("instance-added")
				expect(added).toHaveLength(1)
				expect(added[0]).toMatchObject({
					name: "Alpha",
					version: "1.20.1",
					loader: "fabric",
					rootPath: join(instancesDir, "Alpha"),
				})
				expect(subscriber.calls.slice(0, 2)).toEqual([
					{ type: "watch", path: instancesDir },
					{ type: "watch", path: join(instancesDir, "Alpha") },
				])
				expect(backend.listInstances().map(i => i.name)).toEqual(["Alpha"])
			},
			async instancesDir => {
				await writeInstance(instancesDir, "Alpha")
			},
		))

	it("watches folders without a valid info file as invalid", () =>
		withBackend(
			async ({ backend, instancesDir }) => {
				expect(backend.listInstances()).toEqual([])
				expect(backend.registry.get(join(instancesDir, "Broken"))).toEqual({
					kind: "invalid-instance-dir",
				})
			},
			async instancesDir => {
				await writeInstance(instancesDir, "Broken", { version: "" })
			},
		))

	it("adds an instance created while running", () =>
		withBackend(async ({ backend, instancesDir, recorder }) => {
			const root = await writeInstance(instancesDir, "Beta", {
				version: "1.21",
				loader: "neoforge",
			})
			await backend.handleRawBatch([rawEventFromChokidar("addDir", root)])

			expect(recorder.ofType("instance-added")).toMatchObject([
				{ name: "Beta", version: "1.21", loader: "neoforge" },
			])
		}))

	it("removes an instance whose folder is deleted", () =>
		withBackend(
			async ({ backend, instancesDir, recorder }) => {
				const [instance] = backend.listInstances()
				const root = join(instancesDir, "Alpha")
				await backend.handleRawBatch([rawEventFromChokidar("unlinkDir", root)])

				expect(recorder.ofType("instance-removed")).toEqual([
					{ type: "instance-removed", id: instance?.id },
				])
				expect(backend.listInstances()).toEqual([])
				expect(backend.registry.has(root)).toBe(false)
			},
			async instancesDir => {
				await writeInstance(instancesDir, "Alpha")
			},
		))

	it("loads and publishes worlds", () =>
		withBackend(
			async ({ backend, instancesDir, subscriber, recorder }) => {
				const [instance] = backend.listInstances()
				if (!instance) throw new Error("instance missing")
				const saves = join(instancesDir, "Alpha", ".minecraft", "saves")

				expect(backend.requestLoad(instance.id, "worlds")).toBe("initial")
				expect(recorder.ofType("load-state")).toContainEqual({
					type: "load-state",
					id: instance.id,
					resource: "worlds",
					state: "loading",
				})

				await vi.waitFor(() => {
					expect(recorder.ofType("worlds-updated")).toHaveLength(1)
				})
				const [update] = recorder.ofType("worlds-updated")
				expect(update?.worlds.map(w => w.title)).toEqual(["Quest"])
				expect(subscriber.calls).toContainEqual({ type: "watch", path: saves })
				expect(subscriber.calls).toContainEqual({
					type: "watch",
					path: join(saves, "quest"),
				})
				expect(backend.requestLoad(instance.id, "worlds")).toBe("none")
			},
			async instancesDir => {
				const root = await writeInstance(instancesDir, "Alpha")
				await writeWorld(join(root, ".minecraft", "saves", "quest"), {
					levelName: "Quest",
					lastPlayed: 1_700_000_000_000,
				})
			},
		))

	it("suffixes the folder of a duplicate instance name", () =>
		withBackend(async ({ backend, instancesDir }) => {
			await backend.createInstance("Gamma", "1.20.1", "vanilla")
			const second = await backend.createInstance("Gamma", "1.20.1", "forge")

			expect(backend.instanceDotMinecraft(second)).toBe(
				join(instancesDir, "Gamma (2)", ".minecraft"),
			)
			expect(backend.listInstances().map(i => i.name)).toEqual([
				"Gamma",
				"Gamma (2)",
			])
		}))

	it("rejects instance names that are not a single folder", () =>
		withBackend(async ({ backend }) => {
			await expect(
				backend.createInstance("a/b", "1.20.1", "vanilla"),
			).rejects.toThrow("Invalid instance name: a/b")
		}))

	it("installs a local file into an instance", () =>
		withBackend(async ({ backend, dir, instancesDir }) => {
			const id = await backend.createInstance("Delta", "1.20.1", "fabric")
			const source = join(dir, "download", "sodium.jar")
			await writeJar(source, fabricJar("sodium"))

			const result = await backend.install({
				target: { type: "instance", id },
				files: [
					{
						path: "mods/sodium.jar",
						download: { type: "file", path: source },
						source: "manual",
					},
				],
			})

			const installed = join(instancesDir, "Delta", ".minecraft", "mods", "sodium.jar")
			expect(result.instanceId).toEqual(id)
			expect(result.files).toHaveLength(1)
			expect(result.files[0]?.installedPath).toBe(installed)
			expect(result.files[0]?.cached).toBe(false)
			expect(await readFile(installed)).toEqual(await readFile(source))
		}))

	it("reports a failed install as an error message", () =>
		withBackend(async ({ backend, recorder }) => {
			await expect(
				backend.install({
					target: { type: "library" },
					files: [
						{
							path: "../escape.jar",
							download: { type: "file", path: "/nowhere.jar" },
							source: "manual",
						},
					],
				}),
			).rejects.toThrow("Invalid filename: ../escape.jar")
			expect(recorder.ofType("error")).toEqual([
				{ type: "error", message: "Invalid filename: ../escape.jar" },
			])
		}))

	it("can be closed twice", () =>
		withBackend(async ({ backend }) => {
			await backend.close()
			await backend.close()
		}))
})
