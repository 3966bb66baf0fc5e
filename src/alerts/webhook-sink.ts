/**
 * Webhook delivery over the global `fetch`.
 */

import { TimeoutError, withTimeout } from '../concurrency/index.js'
import { AlertDeliveryError, describeError } from '../errors/index.js'
import { assertPositiveNumber } from '../validation/index.js'
import { toWebhookPayload } from './format.js'
import type { AlertSink, SLOAlert } from './types.js'

export const DEFAULT_WEBHOOK_TIMEOUT_MS = 10_000

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>

export interface WebhookAlertSinkOptions {
	url: string
	/** Give up on a delivery after this long (default: 10000) */
	timeoutMs?: number
	/** Injected for tests (default: global fetch) */
	fetch?: FetchFn
}

/**
 * POSTs each alert as JSON: `{ text, timestamp, alert_type, violations }`.
 *
 * @throws {AlertDeliveryError} From `send` on network errors, timeouts and
 *   non-2xx responses
 */
export class WebhookAlertSink implements AlertSink {
	readonly url: string
	readonly timeoutMs: number
	private readonly fetchFn: FetchFn

	constructor(options: WebhookAlertSinkOptions) {
		this.url = options.url
		this.timeoutMs = options.timeoutMs ?? DEFAULT_WEBHOOK_TIMEOUT_MS
		this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init))
		assertPositiveNumber(this.timeoutMs, 'timeoutMs')
	}

	async send(alert: SLOAlert): Promise<void> {
		const controller = new AbortController()
		const context = { url: this.url, violationCount: alert.violations.length }

		let response: Response
		try {
			response = await withTimeout(
				this.fetchFn(this.url, {
					method: 'POST',
					headers: { 'content-type': 'application/json' },
					body: JSON.stringify(toWebhookPayload(alert)),
					signal: controller.signal,
				}),
				this.timeoutMs,
				`Webhook delivery timed out after ${this.timeoutMs}ms`,
			)
		} catch (error: unknown) {
			controller.abort()
			throw new AlertDeliveryError(
				`Webhook delivery failed: ${describeError(error)}`,
				error instanceof TimeoutError ? 'ALERT_DELIVERY_TIMEOUT' : 'ALERT_DELIVERY_FAILED',
				context,
				error instanceof Error ? error : undefined,
			)
		}

		// Nothing reads the body; cancel it so the connection is released.
		await response.body?.cancel()

		if (!response.ok) {
			throw new AlertDeliveryError(
				`Webhook responded with HTTP ${response.status}`,
				'ALERT_DELIVERY_REJECTED',
				{ ...context, status: response.status },
			)
		}
	}
}
