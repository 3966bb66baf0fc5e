/**
 * Pipeline monitor: the periodic evaluate / persist / alert loop and the
 * on-demand health summary.
 */

import { type AlertSink, LogAlertSink, type SLOAlert, WebhookAlertSink } from '../alerts/index.js'
import { type Clock, PerformanceCollector, systemClock } from '../collector/index.js'
import { TimeoutError, withTimeout } from '../concurrency/index.js'
import { describeError } from '../errors/index.js'
import { createCorrelationId, getSubsystemLogger, type MonitorLogger } from '../logging/index.js'
import { PIPELINE_STAGES, type PipelineStage } from '../pipeline/index.js'
import { isViolation, SLOMonitor, type SLOStatus, ViolationTracker } from '../slo/index.js'
import {
	JsonlMetricsStore,
	MemoryMetricsStore,
	type MetricsStore,
	type StoredLatency,
	type StoredThroughput,
	toLatencyRecord,
	toThroughputRecord,
	toViolationRecord,
} from '../store/index.js'
import { type MonitorConfig, parseMonitorConfig } from './config.js'
import type {
	HealthSummary,
	PersistedCounts,
	PipelineMonitorOptions,
	StagePerformance,
	TickResult,
} from './types.js'

export const HEALTH_WINDOW_MINUTES = 60

/**
 * Ties the collector, SLO evaluator, store and alert sink together.
 *
 * `start()` runs `tick()` every `checkIntervalSeconds` until `stop()`. Ticks
 * never overlap: a loop that is still draining after a timed-out stop is
 * awaited by the next `start()` before its first tick.
 *
 * @example
 * ```typescript
 * const monitor = createPipelineMonitor({ config: await loadMonitorConfig("monitor.json") });
 * monitor.start();
 *
 * await monitor.collector.traceStage("order_execution", () => submitOrder(order));
 *
 * const health = monitor.healthSummary();
 * await monitor.stop();
 * ```
 */
export class PipelineMonitor {
	readonly config: MonitorConfig
	readonly collector: PerformanceCollector
	readonly sloMonitor: SLOMonitor
	readonly store: MetricsStore
	readonly alertSink: AlertSink
	private readonly clock: Clock
	private readonly logger: MonitorLogger

	private abortController: AbortController | null = null
	private loop: Promise<void> = Promise.resolve()

	private readonly latencyCursor = new Map<PipelineStage, number>()
	private readonly throughputCursor = new Map<PipelineStage, number>()
	private violationCursor = 0
	private readonly lastAlerted = new Map<string, number>()

	constructor(options: PipelineMonitorOptions = {}) {
		this.config = parseMonitorConfig(options.config ?? {})
		this.clock = options.clock ?? systemClock
		this.logger = options.logger ?? getSubsystemLogger('monitor')

		const { buffers, storage, alerting } = this.config

		this.collector =
			options.collector ??
			new PerformanceCollector({
				latencyCapacity: buffers.latencyCapacity,
				throughputCapacity: buffers.throughputCapacity,
				clock: this.clock,
			})

		this.sloMonitor =
			options.sloMonitor ??
			new SLOMonitor({
				definitions: this.config.slos,
				tracker: new ViolationTracker({
					capacity: buffers.violationCapacity,
					clock: this.clock,
				}),
			})

		this.store =
			options.store ??
			(storage.directory
				? new JsonlMetricsStore({
						directory: storage.directory,
						retentionDays: storage.retentionDays,
						maxFileSizeBytes: storage.maxFileSizeBytes,
						failureCooldownMs: storage.failureCooldownSeconds * 1000,
						clock: this.clock,
					})
				: new MemoryMetricsStore())

		this.alertSink =
			options.alertSink ??
			(alerting.webhookUrl
				? new WebhookAlertSink({ url: alerting.webhookUrl, timeoutMs: alerting.timeoutMs })
				: new LogAlertSink())
	}

	/** True between `start()` and `stop()`. */
	get isRunning(): boolean {
		return this.abortController !== null
	}

	/**
	 * Start the background loop. Calling it while running does nothing.
	 */
	start(): void {
		if (this.abortController) {
			return
		}

		const controller = new AbortController()
		this.abortController = controller
		this.loop = this.runLoop(controller.signal, this.loop)

		this.logger.info('Pipeline monitoring started', {
			checkIntervalSeconds: this.config.monitoring.checkIntervalSeconds,
			sloCount: this.sloMonitor.getDefinitions().length,
		})
	}

	/**
	 * Stop the loop and wait up to `stopTimeoutMs` for the current tick.
	 * A timeout is logged; the tick finishes in the background.
	 */
	async stop(): Promise<void> {
		const controller = this.abortController
		if (!controller) {
			return
		}

		this.abortController = null
		controller.abort()

		const { stopTimeoutMs } = this.config.monitoring
		try {
			await withTimeout(this.loop, stopTimeoutMs, 'Monitor loop did not stop in time')
			this.logger.info('Pipeline monitoring stopped')
		} catch (error: unknown) {
			if (error instanceof TimeoutError) {
				this.logger.warning('Monitor loop still draining after stop timeout', {
					timeoutMs: error.timeoutMs,
				})
				return
			}
			this.logger.error('Monitor loop failed while stopping', { error: describeError(error) })
		}
	}

	/**
	 * One monitoring pass: evaluate every SLO, persist what is new, and send
	 * one batched alert for violations outside their cooldown.
	 *
	 * Each step logs its own failures; a failing store or sink does not stop
	 * the others.
	 */
	async tick(): Promise<TickResult> {
		const correlationId = createCorrelationId()

		const statuses = this.sloMonitor.evaluate(this.collector)
		const persisted = await this.persist(correlationId)
		const violations = statuses.filter((status) => isViolation(status.status))
		const alerted = await this.alert(violations, correlationId)

		this.logger.debug('Monitor tick complete', {
			correlationId,
			sloCount: statuses.length,
			violationCount: violations.length,
			alertedCount: alerted.length,
			persisted,
		})

		return { correlationId, statuses, violations, alerted, persisted }
	}

	/**
	 * Current health over the last hour. Evaluates without recording
	 * violations.
	 */
	healthSummary(): HealthSummary {
		const statuses = this.sloMonitor.evaluate(this.collector, { record: false })
		const count = (health: SLOStatus['status']) =>
			statuses.filter((status) => status.status === health).length

		const total = statuses.length
		const healthy = count('healthy')

		const activeTraces = this.collector.getActiveTraces()
		const stagePerformance: Record<string, StagePerformance> = {}
		for (const stage of PIPELINE_STAGES) {
			stagePerformance[stage] = {
				latency: this.collector.getLatencyStats(stage, HEALTH_WINDOW_MINUTES),
				throughput: this.collector.getThroughputStats(stage, HEALTH_WINDOW_MINUTES),
				activeTraces: activeTraces.filter((trace) => trace.stage === stage).length,
			}
		}

		return {
			timestamp: new Date(this.clock.now()).toISOString(),
			overallHealthPercentage: total > 0 ? (healthy / total) * 100 : 100,
			sloSummary: {
				total,
				healthy,
				warning: count('warning'),
				critical: count('critical'),
				unknown: count('unknown'),
			},
			sloDetails: statuses,
			stagePerformance,
		}
	}

	private async runLoop(signal: AbortSignal, previous: Promise<void>): Promise<void> {
		await previous

		const intervalMs = this.config.monitoring.checkIntervalSeconds * 1000
		while (!signal.aborted) {
			try {
				await this.tick()
			} catch (error: unknown) {
				this.logger.error('Monitor tick failed', { error: describeError(error) })
			}
			await waitOrAbort(intervalMs, signal)
		}
	}

	/**
	 * Send what was appended since the previous tick. Cursors advance before
	 * the write, so a failed batch is dropped.
	 */
	private async persist(correlationId: string): Promise<PersistedCounts> {
		const { persistLatencyLimit, persistThroughputLimit } = this.config.monitoring

		const latency: StoredLatency[] = []
		const throughput: StoredThroughput[] = []
		for (const stage of PIPELINE_STAGES) {
			const latencySlice = this.collector.latencySince(
				stage,
				this.latencyCursor.get(stage) ?? 0,
				persistLatencyLimit,
			)
			this.latencyCursor.set(stage, latencySlice.sequence)
			latency.push(...latencySlice.items.map(toLatencyRecord))

			const throughputSlice = this.collector.throughputSince(
				stage,
				this.throughputCursor.get(stage) ?? 0,
				persistThroughputLimit,
			)
			this.throughputCursor.set(stage, throughputSlice.sequence)
			throughput.push(...throughputSlice.items.map(toThroughputRecord))
		}

		const violationSlice = this.sloMonitor.tracker.since(this.violationCursor)
		this.violationCursor = violationSlice.sequence
		const violations = violationSlice.items.map(toViolationRecord)

		return {
			latency: await this.write('latency', latency, correlationId, (records) =>
				this.store.appendLatency(records),
			),
			throughput: await this.write('throughput', throughput, correlationId, (records) =>
				this.store.appendThroughput(records),
			),
			violations: await this.write('violations', violations, correlationId, (records) =>
				this.store.appendViolations(records),
			),
		}
	}

	private async write<T>(
		kind: string,
		records: T[],
		correlationId: string,
		append: (records: T[]) => Promise<number>,
	): Promise<number> {
		if (records.length === 0) {
			return 0
		}
		try {
			return await append(records)
		} catch (error: unknown) {
			this.logger.error('Failed to persist metrics', {
				correlationId,
				kind,
				dropped: records.length,
				error: describeError(error),
			})
			return 0
		}
	}

	private async alert(violations: SLOStatus[], correlationId: string): Promise<SLOStatus[]> {
		if (violations.length === 0) {
			return []
		}
		if (!this.config.alerting.enabled) {
			this.logger.debug('Alerting disabled, skipping violations', {
				correlationId,
				violationCount: violations.length,
			})
			return []
		}

		const now = this.clock.now()
		const cooldownMs = this.config.monitoring.alertCooldownMinutes * 60_000
		const due = violations.filter((violation) => {
			const last = this.lastAlerted.get(violation.sloName)
			return last === undefined || now - last >= cooldownMs
		})

		if (due.length === 0) {
			this.logger.debug('Violations within alert cooldown', {
				correlationId,
				slos: violations.map((v) => v.sloName),
			})
			return []
		}

		const alert: SLOAlert = {
			alertType: 'slo_violation',
			timestamp: new Date(now).toISOString(),
			violations: due,
		}

		try {
			await this.alertSink.send(alert)
		} catch (error: unknown) {
			this.logger.error('Failed to send SLO alert', {
				correlationId,
				slos: due.map((v) => v.sloName),
				error: describeError(error),
			})
			return []
		}

		for (const violation of due) {
			this.lastAlerted.set(violation.sloName, now)
		}
		this.logger.info('SLO alert sent', {
			correlationId,
			slos: due.map((v) => v.sloName),
		})
		return due
	}
}

/**
 * Create a monitor from options; configuration defaults fill every gap.
 */
export function createPipelineMonitor(options: PipelineMonitorOptions = {}): PipelineMonitor {
	return new PipelineMonitor(options)
}

/** Resolve after `ms`, or as soon as `signal` aborts. */
function waitOrAbort(ms: number, signal: AbortSignal): Promise<void> {
	return new Promise((resolve) => {
		if (signal.aborted) {
			resolve()
			return
		}
		const done = () => {
			clearTimeout(timer)
			signal.removeEventListener('abort', done)
			resolve()
		}
		const timer = setTimeout(done, ms)
		signal.addEventListener('abort', done, { once: true })
	})
}
