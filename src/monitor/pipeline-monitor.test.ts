import { describe, expect, test, vi } from 'vitest'
import { type AlertSink, LogAlertSink, type SLOAlert, WebhookAlertSink } from '../alerts/index.js'
import { PIPELINE_STAGES } from '../pipeline/index.js'
import {
	JsonlMetricsStore,
	MemoryMetricsStore,
	type MetricsStore,
	type StoredLatency,
} from '../store/index.js'
import {
	cleanupTestDir,
	createTempDir,
	ManualClock,
	RecordingLogger,
	sleep,
} from '../testing/index.js'
import type { MonitorConfigInput } from './config.js'
import { createPipelineMonitor, PipelineMonitor } from './pipeline-monitor.js'

const NOW = Date.parse('2024-03-01T12:00:00Z')
const MINUTE = 60_000

class RecordingSink implements AlertSink {
	alerts: SLOAlert[] = []
	failure: Error | null = null

	async send(alert: SLOAlert): Promise<void> {
		if (this.failure) throw this.failure
		this.alerts.push(alert)
	}
}

class FailingStore extends MemoryMetricsStore {
	override async appendLatency(): Promise<number> {
		throw new Error('disk full')
	}
}

function setup(config: MonitorConfigInput = {}) {
	const clock = new ManualClock(NOW)
	const logger = new RecordingLogger()
	const store = new MemoryMetricsStore()
	const alertSink = new RecordingSink()
	const monitor = new PipelineMonitor({ config, clock, logger, store, alertSink })
	return { clock, logger, store, alertSink, monitor }
}

/** One signal_generation trace lasting `durationMs`. */
function traceSignal(monitor: PipelineMonitor, clock: ManualClock, durationMs: number): void {
	monitor.collector.traceStageSync('signal_generation', () => clock.advance(durationMs))
}

describe('PipelineMonitor.tick', () => {
	test('with no data every SLO is unknown and nothing is sent', async () => {
		const { monitor, alertSink } = setup()

		const result = await monitor.tick()

		expect(result.statuses.map((s) => s.status)).toEqual(['unknown', 'unknown', 'unknown'])
		expect(result.violations).toEqual([])
		expect(result.alerted).toEqual([])
		expect(result.persisted).toEqual({ latency: 0, throughput: 0, violations: 0 })
		expect(result.correlationId).toMatch(/^[0-9a-f]{8}$/)
		expect(alertSink.alerts).toEqual([])
	})

	test('persists measurements and violations and sends one batched alert', async () => {
		const { monitor, clock, store, alertSink } = setup()
		traceSignal(monitor, clock, 2000)
		monitor.collector.recordThroughput('data_processing', 600, 60)

		const result = await monitor.tick()

		expect(result.violations.map((v) => [v.sloName, v.status])).toEqual([
			['signal_generation_latency', 'warning'],
			['data_processing_throughput', 'critical'],
		])
		expect(result.persisted).toEqual({ latency: 1, throughput: 1, violations: 2 })
		expect(alertSink.alerts).toHaveLength(1)
		expect(alertSink.alerts[0]).toEqual({
			alertType: 'slo_violation',
			timestamp: new Date(NOW + 2000).toISOString(),
			violations: result.violations,
		})
		expect(result.alerted).toEqual(result.violations)

		const stored = await store.query('violations')
		expect(stored.map((v) => v.sloName)).toEqual([
			'signal_generation_latency',
			'data_processing_throughput',
		])
		expect(await store.query('latency')).toHaveLength(1)
	})

	test('the violation count includes the current tick', async () => {
		const { monitor, clock } = setup()
		traceSignal(monitor, clock, 2000)

		const first = await monitor.tick()
		const second = await monitor.tick()

		expect(first.violations[0]?.violationCount24h).toBe(1)
		expect(second.violations[0]?.violationCount24h).toBe(2)
	})

	test('only persists what is new since the previous tick', async () => {
		const { monitor, clock } = setup({ slos: [] })
		traceSignal(monitor, clock, 10)

		expect((await monitor.tick()).persisted.latency).toBe(1)
		expect((await monitor.tick()).persisted.latency).toBe(0)

		traceSignal(monitor, clock, 10)
		traceSignal(monitor, clock, 10)
		expect((await monitor.tick()).persisted.latency).toBe(2)
	})

	test('caps each stage at the persist limits', async () => {
		const { monitor, clock, store } = setup({
			slos: [],
			monitoring: { persistLatencyLimit: 3, persistThroughputLimit: 1 },
		})
		for (let i = 0; i < 5; i++) traceSignal(monitor, clock, 10 + i)
		monitor.collector.recordThroughput('data_processing', 1)
		monitor.collector.recordThroughput('data_processing', 2)

		const result = await monitor.tick()

		expect(result.persisted).toEqual({ latency: 3, throughput: 1, violations: 0 })
		const latency: StoredLatency[] = await store.query('latency')
		expect(latency.map((m) => m.durationMs)).toEqual([12, 13, 14])
		expect((await store.query('throughput'))[0]?.itemsProcessed).toBe(2)
	})

	test('suppresses repeat alerts for an SLO until its cooldown passes', async () => {
		const { monitor, clock, alertSink } = setup()
		traceSignal(monitor, clock, 2000)

		expect((await monitor.tick()).alerted).toHaveLength(1)

		clock.advance(4 * MINUTE)
		const quiet = await monitor.tick()
		expect(quiet.violations).toHaveLength(1)
		expect(quiet.alerted).toEqual([])

		clock.advance(1 * MINUTE)
		expect((await monitor.tick()).alerted).toHaveLength(1)
		expect(alertSink.alerts).toHaveLength(2)
	})

	test('sends nothing when alerting is disabled', async () => {
		const { monitor, clock, alertSink } = setup({ alerting: { enabled: false } })
		traceSignal(monitor, clock, 4000)

		const result = await monitor.tick()

		expect(result.violations).toHaveLength(1)
		expect(result.alerted).toEqual([])
		expect(alertSink.alerts).toEqual([])
	})

	test('an alert failure is logged and retried on the next tick', async () => {
		const { monitor, clock, alertSink, logger } = setup()
		traceSignal(monitor, clock, 2000)
		alertSink.failure = new Error('webhook down')

		const failed = await monitor.tick()

		expect(failed.alerted).toEqual([])
		expect(failed.persisted.violations).toBe(1)
		expect(logger.messages('error')).toEqual(['Failed to send SLO alert'])
		expect(monitor.sloMonitor.tracker.size).toBe(1)

		alertSink.failure = null
		expect((await monitor.tick()).alerted).toHaveLength(1)
	})

	test('a store failure is logged and does not block alerts', async () => {
		const clock = new ManualClock(NOW)
		const logger = new RecordingLogger()
		const alertSink = new RecordingSink()
		const monitor = new PipelineMonitor({
			clock,
			logger,
			alertSink,
			store: new FailingStore(),
		})
		traceSignal(monitor, clock, 2000)

		const result = await monitor.tick()

		expect(result.persisted).toEqual({ latency: 0, throughput: 0, violations: 1 })
		expect(result.alerted).toHaveLength(1)
		expect(logger.messages('error')).toEqual(['Failed to persist metrics'])
		expect(logger.logs.find((log) => log.level === 'error')?.properties).toMatchObject({
			kind: 'latency',
			dropped: 1,
			error: 'disk full',
			correlationId: result.correlationId,
		})
	})

	test('unserializable metadata does not stop later ticks from persisting', async () => {
		const dir = createTempDir('monitor-store-')
		try {
			const clock = new ManualClock(NOW)
			const logger = new RecordingLogger()
			const store = new JsonlMetricsStore({ directory: dir, clock, logger })
			const monitor = new PipelineMonitor({ clock, logger, store, alertSink: new RecordingSink() })

			for (let i = 0; i < 3; i++) {
				monitor.collector.traceStageSync('data_ingestion', () => undefined, {
					metadata: { seq: BigInt(i) },
				})
				expect((await monitor.tick()).persisted.latency).toBe(0)
			}
			traceSignal(monitor, clock, 5000)

			const result = await monitor.tick()

			expect(result.persisted).toEqual({ latency: 1, throughput: 0, violations: 1 })
			expect((await store.query('violations')).map((v) => v.sloName)).toEqual([
				'signal_generation_latency',
			])
		} finally {
			cleanupTestDir(dir)
		}
	})
})

describe('PipelineMonitor.healthSummary', () => {
	test('is 100% healthy with no SLOs', () => {
		const { monitor } = setup({ slos: [] })

		const summary = monitor.healthSummary()

		expect(summary.overallHealthPercentage).toBe(100)
		expect(summary.sloSummary).toEqual({
			total: 0,
			healthy: 0,
			warning: 0,
			critical: 0,
			unknown: 0,
		})
		expect(summary.timestamp).toBe('2024-03-01T12:00:00.000Z')
		expect(Object.keys(summary.stagePerformance)).toEqual([...PIPELINE_STAGES])
	})

	test('summarizes statuses without recording violations', () => {
		const { monitor, clock } = setup()
		traceSignal(monitor, clock, 2000)
		monitor.collector.recordThroughput('data_processing', 7200, 60)
		monitor.collector.beginTrace('order_execution', { traceId: 'in-flight' })

		const summary = monitor.healthSummary()

		expect(summary.sloSummary).toEqual({
			total: 3,
			healthy: 1,
			warning: 1,
			critical: 0,
			unknown: 1,
		})
		expect(summary.overallHealthPercentage).toBeCloseTo(100 / 3)
		expect(summary.sloDetails.map((s) => s.sloName)).toEqual([
			'signal_generation_latency',
			'order_execution_latency',
			'data_processing_throughput',
		])
		expect(summary.stagePerformance.signal_generation?.latency?.p95Ms).toBe(2000)
		expect(summary.stagePerformance.data_processing?.throughput?.meanThroughput).toBe(120)
		expect(summary.stagePerformance.order_execution?.activeTraces).toBe(1)
		expect(summary.stagePerformance.order_execution?.latency).toBeNull()
		expect(monitor.sloMonitor.tracker.size).toBe(0)
	})
})

describe('PipelineMonitor lifecycle', () => {
	test('start is idempotent and stop ends the loop', async () => {
		const { monitor, logger } = setup({ monitoring: { checkIntervalSeconds: 0.01 } })
		const tick = vi.spyOn(monitor, 'tick')

		monitor.start()
		monitor.start()
		expect(monitor.isRunning).toBe(true)

		await vi.waitFor(() => expect(tick.mock.calls.length).toBeGreaterThanOrEqual(2))
		await monitor.stop()

		expect(monitor.isRunning).toBe(false)
		expect(logger.messages('info')).toEqual([
			'Pipeline monitoring started',
			'Pipeline monitoring stopped',
		])

		const calls = tick.mock.calls.length
		await sleep(40)
		expect(tick.mock.calls.length).toBe(calls)
	})

	test('stop wakes the interval wait instead of sleeping it out', async () => {
		const { monitor } = setup({ monitoring: { checkIntervalSeconds: 3600 } })
		const tick = vi.spyOn(monitor, 'tick')

		monitor.start()
		await vi.waitFor(() => expect(tick).toHaveBeenCalledTimes(1))

		const started = Date.now()
		await monitor.stop()
		expect(Date.now() - started).toBeLessThan(1000)
	})

	test('stop without start is a no-op', async () => {
		const { monitor, logger } = setup()
		await monitor.stop()
		expect(logger.logs).toEqual([])
	})

	test('a restart waits for a loop still draining after a stop timeout', async () => {
		let active = 0
		let maxActive = 0
		let calls = 0
		let release: () => void = () => {}
		const gate = new Promise<void>((resolve) => {
			release = resolve
		})

		class GatedStore extends MemoryMetricsStore {
			override async appendLatency(records: readonly StoredLatency[]): Promise<number> {
				calls++
				active++
				maxActive = Math.max(maxActive, active)
				try {
					await gate
					return await super.appendLatency(records)
				} finally {
					active--
				}
			}
		}

		const clock = new ManualClock(NOW)
		const logger = new RecordingLogger()
		const monitor = new PipelineMonitor({
			config: { monitoring: { checkIntervalSeconds: 0.01, stopTimeoutMs: 20 } },
			clock,
			logger,
			store: new GatedStore(),
			alertSink: new RecordingSink(),
		})

		monitor.collector.beginTrace('data_ingestion').end()
		monitor.start()
		await vi.waitFor(() => expect(calls).toBe(1))

		await monitor.stop()
		expect(monitor.isRunning).toBe(false)
		expect(logger.messages('warning')).toEqual([
			'Monitor loop still draining after stop timeout',
		])

		monitor.collector.beginTrace('data_ingestion').end()
		monitor.start()
		await sleep(50)
		expect(calls).toBe(1)

		release()
		await vi.waitFor(() => expect(calls).toBe(2))
		await monitor.stop()

		expect(maxActive).toBe(1)
	})
})

describe('createPipelineMonitor', () => {
	test('defaults to an in-memory store and a log sink', () => {
		const monitor = createPipelineMonitor()
		expect(monitor.store).toBeInstanceOf(MemoryMetricsStore)
		expect(monitor.alertSink).toBeInstanceOf(LogAlertSink)
		expect(monitor.sloMonitor.getDefinitions()).toHaveLength(3)
	})

	test('builds a JSONL store and webhook sink from config', () => {
		const monitor = createPipelineMonitor({
			config: {
				storage: { directory: '/tmp/pipeline-metrics-test' },
				alerting: { webhookUrl: 'http://alerts.test/hook', timeoutMs: 2500 },
			},
		})

		expect(monitor.store).toBeInstanceOf(JsonlMetricsStore)
		expect(monitor.alertSink).toBeInstanceOf(WebhookAlertSink)
		expect(monitor.alertSink instanceof WebhookAlertSink && monitor.alertSink.timeoutMs).toBe(2500)
	})

	test('prefers injected collaborators', () => {
		const store: MetricsStore = new MemoryMetricsStore({ capacity: 5 })
		const monitor = createPipelineMonitor({ store })
		expect(monitor.store).toBe(store)
	})
})
