/**
 * Generational arena
 *
 * Every handle handed out is an (index, generation) pair. A slot's generation
 * is bumped whenever its value is removed, so a handle kept across a removal
 * resolves to nothing instead of the slot's next occupant.
 */

export interface ArenaId {
	readonly index: number
	readonly generation: number
}

export type InstanceId = ArenaId
export type ModId = ArenaId

/** Handle that never resolves: used before an entry is registered */
export const DANGLING_ID: ArenaId = Object.freeze({
	index: -1,
	generation: -1,
})

export function idKey(id: ArenaId): string {
	return `${id.index}:${id.generation}`
}

export function sameId(a: ArenaId, b: ArenaId): boolean {
	return a.index === b.index && a.generation === b.generation
}

interface Slot<T> {
	generation: number
	value: T | null
}

export class Arena<T> {
	private readonly slots: Slot<T>[] = []
	private readonly free: number[] = []
	private count = 0

	get size(): number {
		return this.count
	}

	insert(create: (id: ArenaId) => T): ArenaId {
		const index = this.free.pop()
		if (index !== undefined) {
			const slot = this.slots[index]
			if (slot) {
				const id = { index, generation: slot.generation }
				slot.value = create(id)
				this.count++
				return id
			}
		}

		const id = { index: this.slots.length, generation: 0 }
		this.slots.push({ generation: 0, value: create(id) })
		this.count++
		return id
	}

	get(id: ArenaId): T | null {
		const slot = this.slots[id.index]
		if (!slot || slot.generation !== id.generation) return null
		return slot.value
	}

	remove(id: ArenaId): T | null {
		const slot = this.slots[id.index]
		if (!slot || slot.generation !== id.generation || slot.value === null) {
			return null
		}
		const value = slot.value
		slot.value = null
		slot.generation++
		this.free.push(id.index)
		this.count--
		return value
	}

	*entries(): IterableIterator<[ArenaId, T]> {
		for (let index = 0; index < this.slots.length; index++) {
			const slot = this.slots[index]
			if (slot && slot.value !== null) {
				yield [{ index, generation: slot.generation }, slot.value]
			}
		}
	}

	*values(): IterableIterator<T> {
		for (const [, value] of this.entries()) {
			yield value
		}
	}
}
