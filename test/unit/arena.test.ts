/**
 * Unit tests for the generational arena and the instance store on top of it
 */

import { describe, it, expect } from "vitest"
import { Arena, DANGLING_ID, idKey, sameId } from "../../src/arena.js"
import { Instance } from "../../src/instance/instance.js"
import { InstanceStore } from "../../src/instance/store.js"

describe("Arena", () => {
	it("hands out ids that resolve to their values", () => {
		const arena = new Arena<string>()
		const a = arena.insert(() => "a")
		const b = arena.insert(() => "b")
		expect(arena.get(a)).toBe("a")
		expect(arena.get(b)).toBe("b")
		expect(arena.size).toBe(2)
	})

	it("passes the new id to the factory", () => {
		const arena = new Arena<string>()
		const id = arena.insert(own => idKey(own))
		expect(arena.get(id)).toBe("0:0")
	})

	it("never resolves a stale id to the slot's next occupant", () => {
		const arena = new Arena<string>()
		const old = arena.insert(() => "old")
		expect(arena.remove(old)).toBe("old")

		const fresh = arena.insert(() => "fresh")
		expect(fresh).toEqual({ index: 0, generation: 1 })
		expect(arena.get(old)).toBeNull()
		expect(arena.get(fresh)).toBe("fresh")
	})

	it("ignores a second remove of the same id", () => {
		const arena = new Arena<string>()
		const id = arena.insert(() => "x")
		arena.remove(id)
		expect(arena.remove(id)).toBeNull()
		expect(arena.size).toBe(0)
	})

	it("never resolves the dangling id", () => {
		const arena = new Arena<string>()
		arena.insert(() => "x")
		expect(arena.get(DANGLING_ID)).toBeNull()
	})

	it("iterates live entries in index order", () => {
		const arena = new Arena<string>()
		const a = arena.insert(() => "a")
		arena.insert(() => "b")
		arena.insert(() => "c")
		arena.remove(a)
		expect([...arena.values()]).toEqual(["b", "c"])
	})
})

describe("sameId", () => {
	it("compares index and generation", () => {
		expect(sameId({ index: 1, generation: 2 }, { index: 1, generation: 2 })).toBe(
			true,
		)
		expect(sameId({ index: 1, generation: 2 }, { index: 1, generation: 3 })).toBe(
			false,
		)
	})
})

describe("InstanceStore", () => {
	const instance = (rootPath: string, name: string): Instance =>
		new Instance({ rootPath, name, version: "1.20.1", loader: "fabric" })

	it("stamps the id on insert", () => {
		const store = new InstanceStore()
		const inst = instance("/launcher/instances/a", "a")
		const id = store.insert(inst)
		expect(inst.id).toEqual(id)
		expect(store.get(id)).toBe(inst)
	})

	it("finds instances by root path", () => {
		const store = new InstanceStore()
		const inst = instance("/launcher/instances/a", "a")
		store.insert(inst)
		expect(store.findByRoot("/launcher/instances/a/")).toBe(inst)
		expect(store.findByRoot("/launcher/instances/b")).toBeNull()
	})

	it("sorts by name", () => {
		const store = new InstanceStore()
		store.insert(instance("/i/zeta", "zeta"))
		store.insert(instance("/i/alpha", "alpha"))
		expect(store.sorted().map(i => i.name)).toEqual(["alpha", "zeta"])
	})
})
