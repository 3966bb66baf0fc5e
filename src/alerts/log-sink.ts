import { getSubsystemLogger, type MonitorLogger } from '../logging/index.js'
import type { AlertSink, SLOAlert } from './types.js'

export interface LogAlertSinkOptions {
	logger?: MonitorLogger
}

/**
 * Writes one warning per violation to the log. Used when no webhook is
 * configured.
 */
export class LogAlertSink implements AlertSink {
	private readonly logger: MonitorLogger

	constructor(options: LogAlertSinkOptions = {}) {
		this.logger = options.logger ?? getSubsystemLogger('alerts')
	}

	async send(alert: SLOAlert): Promise<void> {
		for (const violation of alert.violations) {
			this.logger.warning('SLO violation', {
				slo: violation.sloName,
				status: violation.status,
				currentValue: violation.currentValue,
				targetValue: violation.targetValue,
				compliancePercentage: violation.compliancePercentage,
				alertedAt: alert.timestamp,
			})
		}
	}
}
