/**
 * Human-readable alert text and the webhook wire payload.
 */

import type { SLOHealth } from '../slo/index.js'
import type { SLOAlert } from './types.js'

/**
 * Violation as sent over the wire.
 */
export interface WebhookViolation {
	slo_name: string
	status: SLOHealth
	current_value: number
	target_value: number
	compliance_percentage: number
	violation_count_24h: number
	last_violation: string | null
}

export interface WebhookPayload {
	text: string
	timestamp: string
	alert_type: SLOAlert['alertType']
	violations: WebhookViolation[]
}

/**
 * Render an alert as a plain-text block.
 *
 * @example
 * ```text
 * 🚨 SLO Violations Detected
 * Time: 2024-03-01 12:00:00 UTC
 * Violations: 1
 *
 * • order_execution_latency:
 *   Status: CRITICAL
 *   Current: 12000.00
 *   Target: 2000.00
 *   Compliance: 16.7%
 * ```
 */
export function formatSLOAlert(alert: SLOAlert): string {
	const lines = [
		'🚨 SLO Violations Detected',
		`Time: ${formatTime(alert.timestamp)}`,
		`Violations: ${alert.violations.length}`,
		'',
	]

	for (const violation of alert.violations) {
		lines.push(
			`• ${violation.sloName}:`,
			`  Status: ${violation.status.toUpperCase()}`,
			`  Current: ${violation.currentValue.toFixed(2)}`,
			`  Target: ${violation.targetValue.toFixed(2)}`,
			`  Compliance: ${violation.compliancePercentage.toFixed(1)}%`,
			'',
		)
	}

	return lines.join('\n')
}

export function toWebhookPayload(alert: SLOAlert): WebhookPayload {
	return {
		text: formatSLOAlert(alert),
		timestamp: alert.timestamp,
		alert_type: alert.alertType,
		violations: alert.violations.map((v) => ({
			slo_name: v.sloName,
			status: v.status,
			current_value: v.currentValue,
			target_value: v.targetValue,
			compliance_percentage: v.compliancePercentage,
			violation_count_24h: v.violationCount24h,
			last_violation: v.lastViolation,
		})),
	}
}

/** "2024-03-01T12:00:00.000Z" -> "2024-03-01 12:00:00 UTC" */
function formatTime(iso: string): string {
	const ms = Date.parse(iso)
	if (Number.isNaN(ms)) return iso
	return `${new Date(ms).toISOString().slice(0, 19).replace('T', ' ')} UTC`
}
