/**
 * pipeline-slo-monitor
 *
 * Latency, throughput and SLO monitoring for a staged trading pipeline.
 *
 * Import everything from the root, or from subpath exports:
 *   import { PerformanceCollector } from "pipeline-slo-monitor/collector";
 *   import { createPipelineMonitor } from "pipeline-slo-monitor/monitor";
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0'

export * from './alerts/index.js'
export * from './collector/index.js'
export * from './concurrency/index.js'
export * from './errors/index.js'
export * from './logging/index.js'
export * from './monitor/index.js'
export * from './pipeline/index.js'
export * from './slo/index.js'
export * from './store/index.js'
export * from './validation/index.js'
