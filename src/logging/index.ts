/**
 * Logging for the pipeline monitor.
 *
 * Every component logs through LogTape under the `pipeline-monitor`
 * category (`["pipeline-monitor", "collector"]`, `["pipeline-monitor", "slo"]`,
 * ...). Components also accept any `MonitorLogger` for injection.
 *
 * @example
 * ```typescript
 * import { createMonitorLogger } from "pipeline-slo-monitor/logging";
 *
 * const { initLogger } = createMonitorLogger();
 * await initLogger();
 * ```
 *
 * @packageDocumentation
 */

export {
	DEFAULT_LOG_EXTENSION,
	DEFAULT_LOG_LEVEL,
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
	type LogLevel,
	ROOT_CATEGORY,
} from './config.js'
export { createCorrelationId } from './correlation.js'
export {
	createMonitorLogger,
	type MonitorLoggerHandle,
	type MonitorLoggerOptions,
} from './factory.js'
export {
	getSubsystemLogger,
	type MonitorLogger,
	type MonitorSubsystem,
} from './logger.js'
