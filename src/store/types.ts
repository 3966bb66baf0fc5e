/**
 * Persistence collaborator contract.
 */

import type { Clock } from '../collector/index.js'
import type { MonitorLogger } from '../logging/index.js'
import type {
	MetricKind,
	MetricRecordMap,
	StoredLatency,
	StoredThroughput,
	StoredViolation,
} from './records.js'

/**
 * Inclusive time range in epoch ms. Open on any side left out.
 */
export interface TimeRange {
	from?: number
	to?: number
}

/**
 * Append-only store for measurements and violations.
 *
 * Append methods resolve with the number of records written. A store that
 * cannot write logs the failure and resolves with 0; the batch is dropped.
 */
export interface MetricsStore {
	appendLatency(records: readonly StoredLatency[]): Promise<number>
	appendThroughput(records: readonly StoredThroughput[]): Promise<number>
	appendViolations(records: readonly StoredViolation[]): Promise<number>
	/** Records of one kind in the range, in append order. */
	query<K extends MetricKind>(kind: K, range?: TimeRange): Promise<MetricRecordMap[K][]>
}

export interface MemoryMetricsStoreOptions {
	/** Records kept per kind, oldest dropped first (default: 10000) */
	capacity?: number
}

export interface JsonlMetricsStoreOptions {
	/** Directory holding one `<kind>.jsonl` file per kind */
	directory: string
	/** Age past which rotation drops records (default: 7) */
	retentionDays?: number
	/** File size that triggers rotation before the next append (default: 10 MiB) */
	maxFileSizeBytes?: number
	/** Wait after three consecutive failures before writing again (default: 60000) */
	failureCooldownMs?: number
	clock?: Clock
	logger?: MonitorLogger
}
