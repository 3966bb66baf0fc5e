/**
 * Fixed-capacity FIFO buffer.
 *
 * Capacity, not age, drives eviction: once full, every push drops the
 * oldest item. Reads return copies so callers can compute on a snapshot
 * without holding on to live storage.
 */

import { assertPositiveInteger } from '../validation/index.js'

export interface RingBufferSlice<T> {
	/** Items pushed after the requested sequence that are still retained. */
	items: T[]
	/** Sequence to pass to the next `since()` call. */
	sequence: number
}

export class RingBuffer<T> {
	private readonly slots: Array<T | undefined>
	private head = 0
	private count = 0
	private pushed = 0

	constructor(readonly capacity: number) {
		assertPositiveInteger(capacity, 'capacity')
		this.slots = new Array<T | undefined>(capacity)
	}

	/** Number of retained items. */
	get size(): number {
		return this.count
	}

	/** Total number of items ever pushed. */
	get sequence(): number {
		return this.pushed
	}

	/**
	 * Append an item.
	 *
	 * @returns The evicted oldest item when the buffer was full
	 */
	push(item: T): T | undefined {
		const tail = (this.head + this.count) % this.capacity
		let evicted: T | undefined

		if (this.count === this.capacity) {
			evicted = this.slots[this.head]
			this.slots[this.head] = item
			this.head = (this.head + 1) % this.capacity
		} else {
			this.slots[tail] = item
			this.count++
		}

		this.pushed++
		return evicted
	}

	/** Copy of the retained items, oldest first. */
	toArray(): T[] {
		const out: T[] = []
		for (let i = 0; i < this.count; i++) {
			const item = this.slots[(this.head + i) % this.capacity]
			if (item !== undefined) {
				out.push(item)
			}
		}
		return out
	}

	/** The newest `n` items, oldest first. */
	last(n: number): T[] {
		if (n <= 0) return []
		const all = this.toArray()
		return all.slice(Math.max(0, all.length - n))
	}

	/**
	 * Items pushed after `sequence`, capped to the newest `limit`.
	 *
	 * Items that were pushed after `sequence` but already evicted are lost.
	 */
	since(sequence: number, limit = Number.POSITIVE_INFINITY): RingBufferSlice<T> {
		const fresh = Math.min(Math.max(0, this.pushed - sequence), this.count)
		return {
			items: this.last(Math.min(fresh, limit)),
			sequence: this.pushed,
		}
	}

	clear(): void {
		this.slots.fill(undefined)
		this.head = 0
		this.count = 0
	}
}
