/**
 * SLO alert formatting and delivery.
 *
 * @module alerts
 */

export {
	formatSLOAlert,
	toWebhookPayload,
	type WebhookPayload,
	type WebhookViolation,
} from './format.js'
export { LogAlertSink, type LogAlertSinkOptions } from './log-sink.js'
export type { AlertSink, SLOAlert } from './types.js'
export {
	DEFAULT_WEBHOOK_TIMEOUT_MS,
	type FetchFn,
	WebhookAlertSink,
	type WebhookAlertSinkOptions,
} from './webhook-sink.js'
