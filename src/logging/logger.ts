/**
 * Logger contract accepted by every monitor component.
 *
 * LogTape's `Logger` satisfies it directly; tests pass a recording
 * implementation instead.
 */

import { getLogger } from '@logtape/logtape'
import { ROOT_CATEGORY } from './config.js'

export interface MonitorLogger {
	debug(message: string, properties?: Record<string, unknown>): void
	info(message: string, properties?: Record<string, unknown>): void
	warning(message: string, properties?: Record<string, unknown>): void
	error(message: string, properties?: Record<string, unknown>): void
}

/** Subsystems that log under the monitor's root category. */
export type MonitorSubsystem = 'collector' | 'slo' | 'store' | 'alerts' | 'monitor'

/**
 * Get the LogTape logger for a subsystem, e.g. ["pipeline-monitor", "slo"].
 *
 * Records are discarded until `initLogger()` (or the host application)
 * configures LogTape.
 */
export function getSubsystemLogger(subsystem: MonitorSubsystem): MonitorLogger {
	return getLogger([ROOT_CATEGORY, subsystem])
}
