/**
 * Alert collaborator contract.
 */

import type { SLOStatus } from '../slo/index.js'

/**
 * One batched notification covering every SLO in violation on a tick.
 */
export interface SLOAlert {
	alertType: 'slo_violation'
	/** ISO-8601 time the alert was raised */
	timestamp: string
	violations: SLOStatus[]
}

/**
 * Delivers alerts somewhere. Implementations reject on delivery failure;
 * the monitor logs the rejection and carries on.
 */
export interface AlertSink {
	send(alert: SLOAlert): Promise<void>
}
