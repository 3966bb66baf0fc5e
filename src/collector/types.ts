/**
 * Measurement and statistics types for the performance collector.
 */

import type { MonitorLogger } from '../logging/index.js'
import type { PipelineStage } from '../pipeline/index.js'

/**
 * Time source. `now()` returns epoch milliseconds, fractional allowed.
 */
export interface Clock {
	now(): number
}

/** Free-form metadata attached to a trace. */
export type TraceMetadata = Record<string, unknown>

/**
 * One timed execution of a stage. Immutable once recorded.
 */
export interface LatencyMeasurement {
	readonly traceId: string
	readonly stage: PipelineStage
	/** Epoch ms */
	readonly startTime: number
	/** Epoch ms */
	readonly endTime: number
	readonly durationMs: number
	readonly success: boolean
	readonly errorMessage?: string
	readonly metadata?: TraceMetadata
}

/**
 * Explicitly reported item count over a window.
 */
export interface ThroughputMeasurement {
	readonly stage: PipelineStage
	/** Epoch ms */
	readonly timestamp: number
	readonly itemsProcessed: number
	readonly windowSeconds: number
	/** itemsProcessed / windowSeconds */
	readonly throughputPerSecond: number
	readonly errors: number
}

/**
 * An in-flight trace: started but not yet ended.
 */
export interface ActiveTrace {
	readonly traceId: string
	readonly stage: PipelineStage
	readonly startTime: number
	readonly metadata: TraceMetadata
}

export interface LatencyStats {
	/** Successful measurements in the window */
	count: number
	meanMs: number
	medianMs: number
	p95Ms: number
	p99Ms: number
	minMs: number
	maxMs: number
	/** Successful / total measurements in the window, 0-1 */
	successRate: number
}

export interface ThroughputStats {
	count: number
	meanThroughput: number
	maxThroughput: number
	totalItems: number
	totalErrors: number
	/** totalErrors / totalItems, 0 when no items were processed */
	errorRate: number
}

export interface TraceOptions {
	/** Explicit trace id. Synthesized from stage + high-resolution time otherwise. */
	traceId?: string
	metadata?: TraceMetadata
}

export interface PerformanceCollectorOptions {
	/** Per-stage latency buffer capacity (default: 10000) */
	latencyCapacity?: number
	/** Per-stage throughput buffer capacity (default: 1000) */
	throughputCapacity?: number
	clock?: Clock
	logger?: MonitorLogger
}
