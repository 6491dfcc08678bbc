/**
 * Instance store: the arena of loaded instances plus lookup by root path
 */

import { resolve } from "node:path"
import { Arena, type InstanceId } from "../arena.js"
import type { Instance } from "./instance.js"

export class InstanceStore {
	private readonly arena = new Arena<Instance>()

	get size(): number {
		return this.arena.size
	}

	/** Register an instance and stamp its id */
	insert(instance: Instance): InstanceId {
		return this.arena.insert(id => {
			instance.id = id
			return instance
		})
	}

	get(id: InstanceId): Instance | null {
		return this.arena.get(id)
	}

	remove(id: InstanceId): Instance | null {
		return this.arena.remove(id)
	}

	findByRoot(rootPath: string): Instance | null {
		const key = resolve(rootPath)
		for (const instance of this.arena.values()) {
			if (resolve(instance.rootPath) === key) return instance
		}
		return null
	}

	values(): IterableIterator<Instance> {
		return this.arena.values()
	}

	/** Instances sorted by name, for listings */
	sorted(): Instance[] {
		return [...this.arena.values()].sort((a, b) =>
			a.name.localeCompare(b.name),
		)
	}
}
