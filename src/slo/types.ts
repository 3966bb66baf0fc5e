/**
 * Service Level Objective type definitions.
 */

import type { LatencyStats, ThroughputStats } from '../collector/index.js'
import type { MonitorLogger } from '../logging/index.js'
import type { PipelineStage } from '../pipeline/index.js'
import type { ViolationTracker } from './violations.js'

/**
 * Metric an SLO is measured on.
 *
 * - latency: p95 duration in ms, lower is better
 * - throughput: mean items/second, higher is better
 */
export type SLOMetricType = 'latency' | 'throughput'

/**
 * Outcome of one evaluation. `unknown` means no data or a failed evaluation.
 */
export type SLOHealth = 'healthy' | 'warning' | 'critical' | 'unknown'

/** Health values that count as a violation. */
export type ViolationHealth = Extract<SLOHealth, 'warning' | 'critical'>

/**
 * Objective for one metric on one stage.
 *
 * Latency: targetValue <= warningThreshold <= criticalThreshold.
 * Throughput: targetValue >= warningThreshold >= criticalThreshold.
 */
export interface SLODefinition {
	/** Unique name */
	name: string
	stage: PipelineStage
	metricType: SLOMetricType
	targetValue: number
	warningThreshold: number
	criticalThreshold: number
	/** Look-back window for the statistics, in minutes */
	measurementWindowMinutes: number
	description: string
}

/**
 * Evaluation result for one SLO. Recomputed on every evaluation.
 */
export interface SLOStatus {
	sloName: string
	status: SLOHealth
	currentValue: number
	targetValue: number
	/** 0-100 */
	compliancePercentage: number
	violationCount24h: number
	/** ISO-8601 timestamp of the newest recorded violation */
	lastViolation: string | null
}

/**
 * One recorded warning/critical evaluation.
 */
export interface ViolationRecord {
	/** Epoch ms */
	timestamp: number
	sloName: string
	status: ViolationHealth
	currentValue: number
	targetValue: number
	compliancePercentage: number
}

/**
 * Anything the evaluator can pull windowed statistics from.
 * `PerformanceCollector` is the production implementation.
 */
export interface SLOStatsSource {
	getLatencyStats(stage: PipelineStage, windowMinutes: number): LatencyStats | null
	getThroughputStats(stage: PipelineStage, windowMinutes: number): ThroughputStats | null
}

export interface EvaluateOptions {
	/** Record warning/critical results in the violation tracker (default: true) */
	record?: boolean
}

export interface SLOMonitorOptions {
	definitions: readonly SLODefinition[]
	/** Violation tracker (default: a new tracker with capacity 1000) */
	tracker?: ViolationTracker
	logger?: MonitorLogger
}
