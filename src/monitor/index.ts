/**
 * Pipeline monitor orchestration and configuration.
 *
 * ```typescript
 * import { createPipelineMonitor, loadMonitorConfig } from "pipeline-slo-monitor/monitor";
 *
 * const monitor = createPipelineMonitor({ config: await loadMonitorConfig("monitor.json") });
 * monitor.start();
 * ```
 *
 * @module monitor
 */

export {
	type LoadMonitorConfigOptions,
	loadMonitorConfig,
	type MonitorConfig,
	type MonitorConfigInput,
	MonitorConfigSchema,
	parseMonitorConfig,
} from './config.js'
export {
	createPipelineMonitor,
	HEALTH_WINDOW_MINUTES,
	PipelineMonitor,
} from './pipeline-monitor.js'
export type {
	HealthSummary,
	PersistedCounts,
	PipelineMonitorOptions,
	StagePerformance,
	TickResult,
} from './types.js'
