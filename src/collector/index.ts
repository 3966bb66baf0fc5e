/**
 * Measurement capture and windowed statistics for pipeline stages.
 *
 * ## Usage
 *
 * ```typescript
 * import { PerformanceCollector } from "pipeline-slo-monitor/collector";
 *
 * const collector = new PerformanceCollector();
 *
 * await collector.traceStage("order_execution", async (traceId) => {
 *   await submitOrder(order, { traceId });
 * });
 *
 * collector.recordThroughput("data_processing", 1_200, 60);
 *
 * collector.getLatencyStats("order_execution", 15);
 * // { count, meanMs, medianMs, p95Ms, p99Ms, minMs, maxMs, successRate } | null
 * ```
 *
 * @module collector
 */

export {
	DEFAULT_LATENCY_CAPACITY,
	DEFAULT_STATS_WINDOW_MINUTES,
	DEFAULT_THROUGHPUT_CAPACITY,
	PerformanceCollector,
	type StageTrace,
	systemClock,
} from './collector.js'
export { RingBuffer, type RingBufferSlice } from './ring-buffer.js'
export {
	computeLatencyStats,
	computeThroughputStats,
	mean,
	median,
	percentile,
	type WindowOptions,
} from './statistics.js'
export type {
	ActiveTrace,
	Clock,
	LatencyMeasurement,
	LatencyStats,
	PerformanceCollectorOptions,
	ThroughputMeasurement,
	ThroughputStats,
	TraceMetadata,
	TraceOptions,
} from './types.js'
