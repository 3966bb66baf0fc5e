/**
 * In-process metrics store.
 */

import { assertPositiveInteger } from '../validation/index.js'
import {
	type MetricKind,
	type MetricRecordMap,
	RECORD_TIME,
	type StoredLatency,
	type StoredThroughput,
	type StoredViolation,
} from './records.js'
import type { MemoryMetricsStoreOptions, MetricsStore, TimeRange } from './types.js'

export const DEFAULT_MEMORY_CAPACITY = 10_000

type RecordLists = { [K in MetricKind]: MetricRecordMap[K][] }

/**
 * Keeps records in arrays, one per kind, capped at `capacity`.
 * The default store when no storage directory is configured.
 */
export class MemoryMetricsStore implements MetricsStore {
	private readonly capacity: number
	private readonly records: RecordLists = {
		latency: [],
		throughput: [],
		violations: [],
	}

	constructor(options: MemoryMetricsStoreOptions = {}) {
		this.capacity = options.capacity ?? DEFAULT_MEMORY_CAPACITY
		assertPositiveInteger(this.capacity, 'capacity')
	}

	async appendLatency(records: readonly StoredLatency[]): Promise<number> {
		return this.append('latency', records)
	}

	async appendThroughput(records: readonly StoredThroughput[]): Promise<number> {
		return this.append('throughput', records)
	}

	async appendViolations(records: readonly StoredViolation[]): Promise<number> {
		return this.append('violations', records)
	}

	async query<K extends MetricKind>(
		kind: K,
		range: TimeRange = {},
	): Promise<MetricRecordMap[K][]> {
		const list: MetricRecordMap[K][] = this.records[kind]
		const timeOf = RECORD_TIME[kind]
		return list.filter((record) => inRange(Date.parse(timeOf(record)), range))
	}

	private append<K extends MetricKind>(kind: K, records: readonly MetricRecordMap[K][]): number {
		const list: MetricRecordMap[K][] = this.records[kind]
		list.push(...records)
		if (list.length > this.capacity) {
			list.splice(0, list.length - this.capacity)
		}
		return records.length
	}
}

/**
 * True when `time` lies inside the inclusive range.
 */
export function inRange(time: number, { from, to }: TimeRange): boolean {
	if (from !== undefined && time < from) return false
	if (to !== undefined && time > to) return false
	return true
}
