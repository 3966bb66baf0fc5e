/**
 * Metrics persistence: plain JSON records for latency, throughput and
 * violations, and two `MetricsStore` implementations.
 *
 * ```typescript
 * import { JsonlMetricsStore, toLatencyRecord } from "pipeline-slo-monitor/store";
 *
 * const store = new JsonlMetricsStore({ directory: "./metrics", retentionDays: 7 });
 * await store.appendLatency(collector.getLatencyMeasurements("order_execution").map(toLatencyRecord));
 * ```
 *
 * @module store
 */

export {
	DEFAULT_FAILURE_COOLDOWN_MS,
	DEFAULT_MAX_FILE_SIZE_BYTES,
	DEFAULT_RETENTION_DAYS,
	JsonlMetricsStore,
	MAX_WRITE_FAILURES,
} from './jsonl-store.js'
export { DEFAULT_MEMORY_CAPACITY, inRange, MemoryMetricsStore } from './memory-store.js'
export {
	METRIC_KINDS,
	type MetricKind,
	type MetricRecordMap,
	RECORD_SCHEMAS,
	RECORD_TIME,
	type StoredLatency,
	StoredLatencySchema,
	type StoredThroughput,
	StoredThroughputSchema,
	type StoredViolation,
	StoredViolationSchema,
	toLatencyRecord,
	toThroughputRecord,
	toViolationRecord,
} from './records.js'
export type {
	JsonlMetricsStoreOptions,
	MemoryMetricsStoreOptions,
	MetricsStore,
	TimeRange,
} from './types.js'
