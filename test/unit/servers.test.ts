/**
 * Unit tests for servers.dat parsing
 */

import { describe, it, expect } from "vitest"
import { join } from "node:path"
import { loadServers, parseServersDat } from "../../src/instance/servers.js"
import {
	encodeServersDat,
	withTempDir,
	writeServersDat,
} from "../helpers/index.js"

describe("parseServersDat", () => {
	it("reads name, address and icon", () => {
		const icon = Buffer.from([1, 2, 3, 4])
		const servers = parseServersDat(
			encodeServersDat([
				{
					name: "Survival",
					ip: "play.example.test:25565",
					icon: icon.toString("base64"),
				},
			]),
		)
		expect(servers).toEqual([
			{ name: "Survival", address: "play.example.test:25565", pngIcon: icon },
		])
	})

	it("skips hidden entries and entries without an address", () => {
		const servers = parseServersDat(
			encodeServersDat([
				{ name: "Hidden", ip: "hidden.example.test", hidden: true },
				{ name: "No address" },
				{ name: "Shown", ip: "shown.example.test", hidden: false },
			]),
		)
		expect(servers.map(s => s.name)).toEqual(["Shown"])
	})

	it("names unnamed servers", () => {
		const [server] = parseServersDat(
			encodeServersDat([{ ip: "anon.example.test" }]),
		)
		expect(server?.name).toBe("<unnamed>")
		expect(server?.pngIcon).toBeNull()
	})

	it("reads an empty server list", () => {
		expect(parseServersDat(encodeServersDat([]))).toEqual([])
	})
})

describe("loadServers", () => {
	it("returns an empty list when servers.dat is missing", () =>
		withTempDir(async dir => {
			expect(await loadServers(join(dir, "servers.dat"))).toEqual([])
		}))

	it("reads servers.dat from disk", () =>
		withTempDir(async dir => {
			const path = join(dir, "servers.dat")
			await writeServersDat(path, [
				{ name: "One", ip: "one.example.test" },
				{ name: "Two", ip: "two.example.test" },
			])
			const servers = await loadServers(path)
			expect(servers.map(s => s.address)).toEqual([
				"one.example.test",
				"two.example.test",
			])
		}))
})
