/**
 * Service Level Objective definitions, evaluation and violation tracking.
 *
 * ## Overview
 *
 * Each SLO names a stage, a metric (latency or throughput) and a
 * target / warning / critical threshold triple. Evaluation pulls windowed
 * statistics from the collector and derives a fresh status every time:
 *
 * - **Latency** (lower is better): p95 <= target is healthy, above the
 *   critical threshold is critical, anything in between is warning
 * - **Throughput** (higher is better): mean rate >= target is healthy,
 *   below the critical threshold is critical, anything in between is warning
 * - **Unknown**: no data in the window, or the statistics could not be read
 *
 * Compliance is `target / current` (latency) or `current / target`
 * (throughput) as a percentage capped at 100.
 *
 * ## Usage
 *
 * ```typescript
 * import { parseSLODefinitions, SLOMonitor } from "pipeline-slo-monitor/slo";
 *
 * const monitor = new SLOMonitor({
 *   definitions: parseSLODefinitions([
 *     {
 *       name: "signal_latency",
 *       stage: "signal_generation",
 *       metricType: "latency",
 *       targetValue: 1000,
 *       warningThreshold: 1500,
 *       criticalThreshold: 3000,
 *       measurementWindowMinutes: 15,
 *     },
 *   ]),
 * });
 *
 * for (const status of monitor.evaluate(collector)) {
 *   console.log(status.sloName, status.status, status.compliancePercentage);
 * }
 * ```
 *
 * ## Violations
 *
 * Warning and critical results are appended to a bounded history (1000
 * entries, oldest evicted first). Each status reports how many violations
 * its SLO had in the last 24 hours.
 *
 * @module slo
 */

export {
	DEFAULT_SLO_DEFINITIONS,
	formatZodIssues,
	parseSLODefinitions,
	SLODefinitionListSchema,
	SLODefinitionSchema,
} from './definitions.js'
export { calculateCompliance, determineStatus } from './evaluation.js'
export { isViolation, SLOMonitor } from './monitor.js'
export {
	DEFAULT_VIOLATION_CAPACITY,
	ViolationTracker,
	type ViolationTrackerOptions,
} from './violations.js'
export type {
	EvaluateOptions,
	SLODefinition,
	SLOHealth,
	SLOMetricType,
	SLOMonitorOptions,
	SLOStatsSource,
	SLOStatus,
	ViolationHealth,
	ViolationRecord,
} from './types.js'
