import type { AlertSink } from '../alerts/index.js'
import type {
	Clock,
	LatencyStats,
	PerformanceCollector,
	ThroughputStats,
} from '../collector/index.js'
import type { MonitorLogger } from '../logging/index.js'
import type { SLOMonitor, SLOStatus } from '../slo/index.js'
import type { MetricsStore } from '../store/index.js'
import type { MonitorConfigInput } from './config.js'

export interface PipelineMonitorOptions {
	/** Raw configuration, validated and defaulted on construction */
	config?: MonitorConfigInput
	collector?: PerformanceCollector
	sloMonitor?: SLOMonitor
	store?: MetricsStore
	alertSink?: AlertSink
	clock?: Clock
	logger?: MonitorLogger
}

/** Records written by one tick, per kind. */
export interface PersistedCounts {
	latency: number
	throughput: number
	violations: number
}

/**
 * Outcome of one monitoring pass.
 */
export interface TickResult {
	/** Id attached to every log line of this tick */
	correlationId: string
	statuses: SLOStatus[]
	/** Statuses that are warning or critical */
	violations: SLOStatus[]
	/** Violations delivered to the alert sink on this tick */
	alerted: SLOStatus[]
	persisted: PersistedCounts
}

export interface StagePerformance {
	latency: LatencyStats | null
	throughput: ThroughputStats | null
	activeTraces: number
}

export interface HealthSummary {
	/** ISO-8601 */
	timestamp: string
	/** Healthy SLOs as a percentage of all SLOs; 100 with none defined */
	overallHealthPercentage: number
	sloSummary: {
		total: number
		healthy: number
		warning: number
		critical: number
		unknown: number
	}
	sloDetails: SLOStatus[]
	/** Keyed by pipeline stage */
	stagePerformance: Record<string, StagePerformance>
}
