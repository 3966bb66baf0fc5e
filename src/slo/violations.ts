/**
 * Bounded history of SLO violations with a 24-hour rolling count.
 */

import { type Clock, RingBuffer, type RingBufferSlice, systemClock } from '../collector/index.js'
import type { SLODefinition, SLOStatus, ViolationHealth, ViolationRecord } from './types.js'

export const DEFAULT_VIOLATION_CAPACITY = 1000

const DAY_MS = 24 * 60 * 60 * 1000

export interface ViolationTrackerOptions {
	/** Maximum retained violations, oldest evicted first (default: 1000) */
	capacity?: number
	clock?: Clock
}

export class ViolationTracker {
	private readonly history: RingBuffer<ViolationRecord>
	private readonly clock: Clock

	constructor(options: ViolationTrackerOptions = {}) {
		this.history = new RingBuffer(options.capacity ?? DEFAULT_VIOLATION_CAPACITY)
		this.clock = options.clock ?? systemClock
	}

	/**
	 * Append a violation for `slo` using the evaluated status.
	 */
	record(
		slo: SLODefinition,
		status: Pick<SLOStatus, 'currentValue' | 'targetValue' | 'compliancePercentage'> & {
			status: ViolationHealth
		},
	): ViolationRecord {
		const violation: ViolationRecord = {
			timestamp: this.clock.now(),
			sloName: slo.name,
			status: status.status,
			currentValue: status.currentValue,
			targetValue: status.targetValue,
			compliancePercentage: status.compliancePercentage,
		}
		this.history.push(violation)
		return violation
	}

	/**
	 * Violations of `sloName` in the last 24 hours. Linear scan.
	 */
	countInLast24h(sloName: string): number {
		const cutoff = this.clock.now() - DAY_MS
		let count = 0
		for (const violation of this.history.toArray()) {
			if (violation.sloName === sloName && violation.timestamp >= cutoff) {
				count++
			}
		}
		return count
	}

	/**
	 * Timestamp of the newest retained violation of `sloName`, or null.
	 */
	lastViolation(sloName: string): number | null {
		let latest: number | null = null
		for (const violation of this.history.toArray()) {
			if (violation.sloName === sloName && (latest === null || violation.timestamp > latest)) {
				latest = violation.timestamp
			}
		}
		return latest
	}

	/** Retained violations, oldest first. */
	getHistory(): ViolationRecord[] {
		return this.history.toArray()
	}

	/** Violations recorded after `sequence`, for incremental persistence. */
	since(sequence: number, limit?: number): RingBufferSlice<ViolationRecord> {
		return this.history.since(sequence, limit)
	}

	get size(): number {
		return this.history.size
	}

	reset(): void {
		this.history.clear()
	}
}
