import fs from 'node:fs'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { cleanupTestDir, createTempDir, ManualClock, RecordingLogger } from '../testing/index.js'
import { JsonlMetricsStore } from './jsonl-store.js'
import type { StoredLatency, StoredViolation } from './records.js'

const NOW = Date.parse('2024-03-10T00:00:00Z')
const DAY = 24 * 60 * 60 * 1000

function iso(ms: number): string {
	return new Date(ms).toISOString()
}

function latency(traceId: string, startMs: number): StoredLatency {
	return {
		traceId,
		stage: 'signal_generation',
		startTime: iso(startMs),
		endTime: iso(startMs + 120),
		durationMs: 120,
		success: true,
		errorMessage: null,
		metadata: null,
	}
}

function violation(sloName: string, atMs: number): StoredViolation {
	return {
		timestamp: iso(atMs),
		sloName,
		status: 'critical',
		currentValue: 4000,
		targetValue: 1000,
		compliancePercentage: 25,
	}
}

describe('JsonlMetricsStore', () => {
	let dir: string
	let logger: RecordingLogger
	let clock: ManualClock

	beforeEach(() => {
		dir = createTempDir('jsonl-store-')
		logger = new RecordingLogger()
		clock = new ManualClock(NOW)
	})

	afterEach(() => {
		cleanupTestDir(dir)
	})

	test('writes one JSON line per record and reads them back', async () => {
		const store = new JsonlMetricsStore({ directory: dir, clock, logger })

		expect(await store.appendLatency([latency('a', NOW), latency('b', NOW + 1000)])).toBe(2)

		const lines = fs.readFileSync(path.join(dir, 'latency.jsonl'), 'utf8').trim().split('\n')
		expect(lines).toHaveLength(2)
		expect(JSON.parse(lines[0] ?? '')).toEqual(latency('a', NOW))
		expect(await store.query('latency')).toEqual([latency('a', NOW), latency('b', NOW + 1000)])
	})

	test('creates the directory on first write', async () => {
		const nested = path.join(dir, 'metrics', 'prod')
		const store = new JsonlMetricsStore({ directory: nested, clock, logger })

		await store.appendViolations([violation('slo', NOW)])

		expect(fs.existsSync(path.join(nested, 'violations.jsonl'))).toBe(true)
	})

	test('query on a missing file is empty', async () => {
		const store = new JsonlMetricsStore({ directory: dir, clock, logger })
		expect(await store.query('throughput')).toEqual([])
	})

	test('query filters by time range', async () => {
		const store = new JsonlMetricsStore({ directory: dir, clock, logger })
		await store.appendViolations([
			violation('early', NOW - 2 * DAY),
			violation('late', NOW),
		])

		const result = await store.query('violations', { from: NOW - DAY })
		expect(result.map((v) => v.sloName)).toEqual(['late'])
	})

	test('concurrent appends do not interleave', async () => {
		const store = new JsonlMetricsStore({ directory: dir, clock, logger })

		const counts = await Promise.all(
			Array.from({ length: 20 }, (_, i) => store.appendViolations([violation(`slo-${i}`, NOW)])),
		)

		expect(counts.every((count) => count === 1)).toBe(true)
		const stored = await store.query('violations')
		expect(stored.map((v) => v.sloName)).toEqual(
			Array.from({ length: 20 }, (_, i) => `slo-${i}`),
		)
	})

	test('skips malformed and invalid lines with an error log', async () => {
		const good = violation('kept', NOW)
		fs.writeFileSync(
			path.join(dir, 'violations.jsonl'),
			`${JSON.stringify(good)}\n{not json\n${JSON.stringify({ sloName: 'no-timestamp' })}\n\n${JSON.stringify(good)}\n`,
		)
		const store = new JsonlMetricsStore({ directory: dir, clock, logger })

		const result = await store.query('violations')

		expect(result).toEqual([good, good])
		expect(logger.messages('error')).toEqual([
			'Failed to parse metrics line',
			'Skipping invalid metrics record',
		])
	})

	test('rotation at the size limit keeps only records inside retention', async () => {
		const lineBytes = Buffer.byteLength(`${JSON.stringify(violation('recent', NOW))}\n`)
		const store = new JsonlMetricsStore({
			directory: dir,
			retentionDays: 7,
			maxFileSizeBytes: 2 * lineBytes,
			clock,
			logger,
		})
		await store.appendViolations([
			violation('stale1', NOW - 10 * DAY),
			violation('recent', NOW - DAY),
		])

		await store.appendViolations([violation('latest', NOW)])

		const stored = await store.query('violations')
		expect(stored.map((v) => v.sloName)).toEqual(['recent', 'latest'])
		expect(logger.messages('info')).toEqual([
			'Rotating metrics file (size limit)',
			'Metrics file rotated',
		])
		expect(logger.messages('warning')).toEqual([])
		expect(fs.readdirSync(dir).sort()).toEqual(['violations.jsonl'])
	})

	test('file stays bounded when every record is inside retention', async () => {
		const maxFileSizeBytes = 1000
		const store = new JsonlMetricsStore({ directory: dir, maxFileSizeBytes, clock, logger })
		const lineBytes = Buffer.byteLength(`${JSON.stringify(violation('slo-00-a', NOW))}\n`)

		for (let i = 0; i < 50; i++) {
			const id = String(i).padStart(2, '0')
			await store.appendViolations([violation(`slo-${id}-a`, NOW), violation(`slo-${id}-b`, NOW)])
		}

		const size = fs.statSync(path.join(dir, 'violations.jsonl')).size
		expect(size).toBeLessThan(maxFileSizeBytes + 2 * lineBytes)
		const names = (await store.query('violations')).map((v) => v.sloName)
		expect(names.slice(-2)).toEqual(['slo-49-a', 'slo-49-b'])
		expect(logger.messages('warning')[0]).toBe('Dropping oldest metrics records over size limit')
		expect(logger.messages('info').filter((m) => m === 'Metrics file rotated').length).toBeLessThan(
			25,
		)
	})

	test('pauses a kind after three consecutive failures', async () => {
		fs.mkdirSync(path.join(dir, 'violations.jsonl'))
		const store = new JsonlMetricsStore({ directory: dir, clock, logger })

		const counts: number[] = []
		for (let i = 0; i < 4; i++) {
			counts.push(await store.appendViolations([violation('slo', NOW)]))
		}

		expect(counts).toEqual([0, 0, 0, 0])
		expect(store.isDisabled('violations')).toBe(true)
		expect(logger.messages('error')).toEqual([
			'Failed to persist metrics',
			'Failed to persist metrics',
			'Failed to persist metrics',
			'Metrics persistence disabled - too many failures',
			'Metrics persistence disabled - too many consecutive failures',
		])

		expect(logger.logs[0]?.properties).toMatchObject({
			kind: 'violations',
			category: 'PERSISTENCE',
			failureCount: 1,
		})

		store.reset()
		expect(store.isDisabled('violations')).toBe(false)
	})

	test('failures of one kind do not stop the others', async () => {
		fs.mkdirSync(path.join(dir, 'latency.jsonl'))
		const store = new JsonlMetricsStore({ directory: dir, clock, logger })

		for (let i = 0; i < 3; i++) {
			await store.appendLatency([latency(`t-${i}`, NOW)])
		}

		expect(store.isDisabled('latency')).toBe(true)
		expect(store.isDisabled('violations')).toBe(false)
		expect(await store.appendViolations([violation('slo', NOW)])).toBe(1)
	})

	test('writes again after the cooldown once the filesystem recovers', async () => {
		const blocked = path.join(dir, 'violations.jsonl')
		fs.mkdirSync(blocked)
		const store = new JsonlMetricsStore({
			directory: dir,
			failureCooldownMs: 30_000,
			clock,
			logger,
		})
		for (let i = 0; i < 3; i++) {
			await store.appendViolations([violation('lost', NOW)])
		}
		fs.rmdirSync(blocked)

		clock.advance(10_000)
		expect(await store.appendViolations([violation('still-paused', NOW)])).toBe(0)

		clock.advance(20_000)
		expect(store.isDisabled('violations')).toBe(false)
		expect(await store.appendViolations([violation('recovered', NOW)])).toBe(1)
		expect(logger.messages('info')).toEqual(['Metrics persistence resumed'])
		expect((await store.query('violations')).map((v) => v.sloName)).toEqual(['recovered'])
	})

	test('a retry that fails again re-opens the breaker for another cooldown', async () => {
		fs.mkdirSync(path.join(dir, 'violations.jsonl'))
		const store = new JsonlMetricsStore({
			directory: dir,
			failureCooldownMs: 30_000,
			clock,
			logger,
		})
		for (let i = 0; i < 3; i++) {
			await store.appendViolations([violation('lost', NOW)])
		}

		clock.advance(30_000)
		expect(await store.appendViolations([violation('retry', NOW)])).toBe(0)
		expect(store.isDisabled('violations')).toBe(true)
	})

	test('skips records that cannot be serialized and writes the rest', async () => {
		const store = new JsonlMetricsStore({ directory: dir, clock, logger })
		const poisoned: StoredLatency = { ...latency('bad', NOW), metadata: { seq: BigInt(7) } }

		const written = await store.appendLatency([latency('a', NOW), poisoned, latency('c', NOW)])

		expect(written).toBe(2)
		expect((await store.query('latency')).map((r) => r.traceId)).toEqual(['a', 'c'])
		expect(logger.messages('error')).toEqual(['Skipping unserializable metrics record'])
		expect(store.isDisabled('latency')).toBe(false)
	})

	test('a batch with nothing serializable is not a write failure', async () => {
		const store = new JsonlMetricsStore({ directory: dir, clock, logger })
		const circular: Record<string, unknown> = {}
		circular.self = circular

		for (let i = 0; i < 3; i++) {
			expect(await store.appendLatency([{ ...latency('loop', NOW), metadata: circular }])).toBe(0)
		}

		expect(store.isDisabled('latency')).toBe(false)
		expect(logger.messages('error')).not.toContain('Failed to persist metrics')
	})

	test('an empty batch is a no-op', async () => {
		const store = new JsonlMetricsStore({ directory: dir, clock, logger })
		expect(await store.appendThroughput([])).toBe(0)
		expect(fs.readdirSync(dir)).toEqual([])
	})
})
