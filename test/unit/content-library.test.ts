/**
 * Unit tests for the content-addressed library and safe install paths
 */

import { describe, it, expect } from "vitest"
import { readFile, readdir, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { ContentLibrary } from "../../src/install/content-library.js"
import { SafePath } from "../../src/install/safe-path.js"
import { withTempDir } from "../helpers/index.js"

const HELLO_SHA1 = "aaf4c61ddcc5e8a2dabede0f3b482cd9aea9434d"

describe("ContentLibrary", () => {
	it("shards paths by the first two hex characters", () => {
		const library = new ContentLibrary("/store")
		expect(library.pathFor(HELLO_SHA1, "jar")).toBe(
			join("/store", "aa", `${HELLO_SHA1}.jar`),
		)
		expect(library.pathFor(HELLO_SHA1.toUpperCase(), null)).toBe(
			join("/store", "aa", HELLO_SHA1),
		)
	})

	it("rejects malformed hashes", () => {
		const library = new ContentLibrary("/store")
		expect(() => library.pathFor("abc", "jar")).toThrow(
			"Hash isn't a valid sha1 hash: abc",
		)
	})

	it("gives every writer its own part file", () => {
		const library = new ContentLibrary("/store")
		const a = library.partPath("/store/aa/x.jar")
		const b = library.partPath("/store/aa/x.jar")
		expect(a).not.toBe(b)
		expect(a.startsWith("/store/aa/x.jar.")).toBe(true)
		expect(a.endsWith(".part")).toBe(true)
	})

	it("ingests a local file once", () =>
		withTempDir(async dir => {
			const library = new ContentLibrary(join(dir, "store"))
			const source = join(dir, "hello.txt")
			await writeFile(source, "hello")

			const first = await library.ingestFile(source, "txt")
			expect(first).toEqual({
				sha1: HELLO_SHA1,
				path: join(dir, "store", "aa", `${HELLO_SHA1}.txt`),
				copied: true,
			})
			expect(await readFile(first.path, "utf-8")).toBe("hello")

			const second = await library.ingestFile(source, "txt")
			expect(second.copied).toBe(false)
			expect(await readdir(join(dir, "store", "aa"))).toEqual([
				`${HELLO_SHA1}.txt`,
			])
		}))

	it("replaces a corrupted stored copy", () =>
		withTempDir(async dir => {
			const library = new ContentLibrary(join(dir, "store"))
			const source = join(dir, "hello.txt")
			await writeFile(source, "hello")
			const path = library.pathFor(HELLO_SHA1, "txt")
			await library.ensureDir(path)
			await writeFile(path, "corrupt")

			expect(await library.hasValid(path, HELLO_SHA1)).toBe(false)
			const stored = await library.ingestFile(source, "txt")
			expect(stored.copied).toBe(true)
			expect(await library.hasValid(path, HELLO_SHA1)).toBe(true)
		}))

	it("reports a missing source as an io error", () =>
		withTempDir(async dir => {
			const library = new ContentLibrary(join(dir, "store"))
			await expect(
				library.ingestFile(join(dir, "missing"), null),
			).rejects.toMatchObject({ kind: "io" })
		}))
})

describe("SafePath", () => {
	it("normalizes relative paths", () => {
		expect(SafePath.parse("mods//./a.jar")?.toString()).toBe("mods/a.jar")
	})

	it.each(["/etc/passwd", "../a.jar", "mods/../../a.jar", "", "./", "a/b:c"])(
		"rejects %j",
		path => {
			expect(SafePath.parse(path)).toBeNull()
		},
	)

	it("exposes the file name and extension", () => {
		const path = SafePath.parse("resourcepacks/Faithful 32x.zip")
		expect(path?.fileName).toBe("Faithful 32x.zip")
		expect(path?.extension).toBe("zip")
		expect(path?.toString()).toBe("resourcepacks/Faithful 32x.zip")
	})

	it("has no extension for dotfiles or bare names", () => {
		expect(SafePath.parse("config/.hidden")?.extension).toBeNull()
		expect(SafePath.parse("README")?.extension).toBeNull()
		expect(SafePath.parse("mods/a.jar.disabled")?.extension).toBe("disabled")
	})

	it("joins onto a base directory", () => {
		expect(SafePath.parse("mods/a.jar")?.toPath("/root/.minecraft")).toBe(
			join("/root/.minecraft", "mods", "a.jar"),
		)
	})
})
