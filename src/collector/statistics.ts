/**
 * Pure statistics over measurement snapshots.
 *
 * Every function takes a copy of buffer contents and never touches the
 * collector, so slow sorting work can't delay producers.
 */

import type {
	LatencyMeasurement,
	LatencyStats,
	ThroughputMeasurement,
	ThroughputStats,
} from './types.js'

export interface WindowOptions {
	/** Look-back window in minutes */
	windowMinutes: number
	/** Epoch ms the window ends at */
	now: number
}

const MS_PER_MINUTE = 60 * 1000

/**
 * Nearest-rank percentile, no interpolation.
 *
 * Sorts a copy ascending and picks `floor(n * p / 100)`, clamped to the
 * last index. Returns 0 for an empty list.
 *
 * @example
 * ```ts
 * percentile([10, 20, 30, 40], 50) // 30
 * percentile([10, 20, 30, 40], 99) // 40
 * ```
 */
export function percentile(values: readonly number[], p: number): number {
	if (values.length === 0) return 0
	const sorted = [...values].sort((a, b) => a - b)
	const index = Math.min(Math.floor((sorted.length * p) / 100), sorted.length - 1)
	return sorted[index] ?? 0
}

export function mean(values: readonly number[]): number {
	if (values.length === 0) return 0
	let sum = 0
	for (const value of values) {
		sum += value
	}
	return sum / values.length
}

/**
 * Middle value; mean of the two middle values for an even count.
 */
export function median(values: readonly number[]): number {
	if (values.length === 0) return 0
	const sorted = [...values].sort((a, b) => a - b)
	const mid = Math.floor(sorted.length / 2)
	if (sorted.length % 2 === 1) {
		return sorted[mid] ?? 0
	}
	return ((sorted[mid - 1] ?? 0) + (sorted[mid] ?? 0)) / 2
}

/**
 * Latency statistics over successful measurements that started inside the window.
 *
 * @returns null when the window holds no successful measurement
 */
export function computeLatencyStats(
	measurements: readonly LatencyMeasurement[],
	{ windowMinutes, now }: WindowOptions,
): LatencyStats | null {
	const cutoff = now - windowMinutes * MS_PER_MINUTE
	const inWindow = measurements.filter((m) => m.startTime >= cutoff)
	const durations = inWindow.filter((m) => m.success).map((m) => m.durationMs)

	if (durations.length === 0) {
		return null
	}

	return {
		count: durations.length,
		meanMs: mean(durations),
		medianMs: median(durations),
		p95Ms: percentile(durations, 95),
		p99Ms: percentile(durations, 99),
		minMs: durations.reduce((a, b) => Math.min(a, b)),
		maxMs: durations.reduce((a, b) => Math.max(a, b)),
		successRate: durations.length / inWindow.length,
	}
}

/**
 * Throughput statistics over reports timestamped inside the window.
 *
 * @returns null when the window holds no report
 */
export function computeThroughputStats(
	measurements: readonly ThroughputMeasurement[],
	{ windowMinutes, now }: WindowOptions,
): ThroughputStats | null {
	const cutoff = now - windowMinutes * MS_PER_MINUTE
	const recent = measurements.filter((m) => m.timestamp >= cutoff)

	if (recent.length === 0) {
		return null
	}

	const rates = recent.map((m) => m.throughputPerSecond)
	let totalItems = 0
	let totalErrors = 0
	for (const m of recent) {
		totalItems += m.itemsProcessed
		totalErrors += m.errors
	}

	return {
		count: recent.length,
		meanThroughput: mean(rates),
		maxThroughput: rates.reduce((a, b) => Math.max(a, b)),
		totalItems,
		totalErrors,
		errorRate: totalItems > 0 ? totalErrors / totalItems : 0,
	}
}
