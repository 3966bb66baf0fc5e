/**
 * Status and compliance math for a single SLO reading.
 */

import type { SLODefinition, SLOHealth } from './types.js'

/**
 * Classify a reading against an SLO's thresholds.
 *
 * Latency (lower is better): healthy at or below target, critical above the
 * critical threshold, warning in between. Throughput (higher is better)
 * mirrors it. The warning threshold is validated for ordering but does not
 * move either boundary.
 */
export function determineStatus(
	slo: SLODefinition,
	current: number,
): Exclude<SLOHealth, 'unknown'> {
	if (slo.metricType === 'latency') {
		if (current <= slo.targetValue) return 'healthy'
		if (current <= slo.criticalThreshold) return 'warning'
		return 'critical'
	}

	if (current >= slo.targetValue) return 'healthy'
	if (current >= slo.criticalThreshold) return 'warning'
	return 'critical'
}

/**
 * How close a reading is to target, in [0, 100].
 *
 * Latency: target/current; a zero reading counts as full compliance.
 * Throughput: current/target; a zero target counts as full compliance.
 */
export function calculateCompliance(slo: SLODefinition, current: number): number {
	let ratio: number
	if (slo.metricType === 'latency') {
		ratio = current > 0 ? (slo.targetValue / current) * 100 : 100
	} else {
		ratio = slo.targetValue > 0 ? (current / slo.targetValue) * 100 : 100
	}

	if (!Number.isFinite(ratio)) return 100
	return Math.min(100, Math.max(0, ratio))
}
