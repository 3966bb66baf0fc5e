/**
 * JSONL metrics store with size-based rotation and per-kind write circuit breakers.
 */

import { join } from 'node:path'
import { type Clock, systemClock } from '../collector/index.js'
import { describeError, type ErrorCategory } from '../errors/index.js'
import {
	appendToFile,
	ensureDir,
	pathExists,
	readTextFile,
	stat,
	writeTextFileAtomic,
} from '../fs/index.js'
import { getSubsystemLogger, type MonitorLogger } from '../logging/index.js'
import {
	assertNonNegativeNumber,
	assertPositiveInteger,
	assertPositiveNumber,
} from '../validation/index.js'
import { inRange } from './memory-store.js'
import {
	type MetricKind,
	type MetricRecordMap,
	RECORD_SCHEMAS,
	RECORD_TIME,
	type StoredLatency,
	type StoredThroughput,
	type StoredViolation,
} from './records.js'
import type { JsonlMetricsStoreOptions, MetricsStore, TimeRange } from './types.js'

export const DEFAULT_RETENTION_DAYS = 7
export const DEFAULT_MAX_FILE_SIZE_BYTES = 10 * 1024 * 1024
export const DEFAULT_FAILURE_COOLDOWN_MS = 60_000
export const MAX_WRITE_FAILURES = 3

const DAY_MS = 24 * 60 * 60 * 1000
const CATEGORY: ErrorCategory = 'PERSISTENCE'

interface Breaker {
	failures: number
	openedAt: number
}

/**
 * Appends records as JSON lines to `<directory>/<kind>.jsonl`.
 *
 * Writes go through one promise chain so appends and rotations never
 * interleave. When a file reaches `maxFileSizeBytes` it is rewritten with
 * only the records newer than `retentionDays`; if those still take more
 * than half the limit, the oldest are dropped until they fit.
 *
 * Each kind has its own circuit breaker. After three consecutive failures
 * appends of that kind resolve with 0 until `failureCooldownMs` has passed,
 * then one write is tried again. A success closes the breaker.
 *
 * @example
 * ```typescript
 * const store = new JsonlMetricsStore({ directory: "/var/lib/pipeline-monitor" });
 * await store.appendLatency(measurements.map(toLatencyRecord));
 * const lastHour = await store.query("latency", { from: Date.now() - 3_600_000 });
 * ```
 */
export class JsonlMetricsStore implements MetricsStore {
	readonly directory: string
	private readonly retentionDays: number
	private readonly maxFileSizeBytes: number
	private readonly failureCooldownMs: number
	private readonly clock: Clock
	private readonly logger: MonitorLogger
	private readonly breakers = new Map<MetricKind, Breaker>()
	private writeChain: Promise<unknown> = Promise.resolve()

	constructor(options: JsonlMetricsStoreOptions) {
		this.directory = options.directory
		this.retentionDays = options.retentionDays ?? DEFAULT_RETENTION_DAYS
		this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE_BYTES
		this.failureCooldownMs = options.failureCooldownMs ?? DEFAULT_FAILURE_COOLDOWN_MS
		this.clock = options.clock ?? systemClock
		this.logger = options.logger ?? getSubsystemLogger('store')

		assertPositiveNumber(this.retentionDays, 'retentionDays')
		assertPositiveInteger(this.maxFileSizeBytes, 'maxFileSizeBytes')
		assertNonNegativeNumber(this.failureCooldownMs, 'failureCooldownMs')
	}

	/** Path of the file holding one kind. */
	filePath(kind: MetricKind): string {
		return join(this.directory, `${kind}.jsonl`)
	}

	/** True while the breaker for a kind is open and cooling down. */
	isDisabled(kind: MetricKind): boolean {
		const breaker = this.breakers.get(kind)
		if (!breaker || breaker.failures < MAX_WRITE_FAILURES) {
			return false
		}
		return this.clock.now() - breaker.openedAt < this.failureCooldownMs
	}

	async appendLatency(records: readonly StoredLatency[]): Promise<number> {
		return this.append('latency', records)
	}

	async appendThroughput(records: readonly StoredThroughput[]): Promise<number> {
		return this.append('throughput', records)
	}

	async appendViolations(records: readonly StoredViolation[]): Promise<number> {
		return this.append('violations', records)
	}

	/**
	 * Read back one kind. Lines that fail to parse or validate are skipped
	 * and logged.
	 */
	async query<K extends MetricKind>(
		kind: K,
		range: TimeRange = {},
	): Promise<MetricRecordMap[K][]> {
		await this.writeChain
		const records = await this.readRecords(kind)
		const timeOf = RECORD_TIME[kind]
		return records.filter((record) => inRange(Date.parse(timeOf(record)), range))
	}

	/**
	 * Close every breaker.
	 */
	reset(): void {
		this.breakers.clear()
	}

	private append<K extends MetricKind>(
		kind: K,
		records: readonly MetricRecordMap[K][],
	): Promise<number> {
		if (records.length === 0) {
			return Promise.resolve(0)
		}

		const write = this.writeChain.then(async (): Promise<number> => {
			if (this.isDisabled(kind)) {
				this.logger.error('Metrics persistence disabled - too many consecutive failures', {
					kind,
					dropped: records.length,
					category: CATEGORY,
				})
				return 0
			}

			const lines = this.serialize(kind, records)
			if (lines.length === 0) {
				return 0
			}

			try {
				await this.writeLines(kind, lines)
			} catch (error: unknown) {
				this.recordFailure(kind, lines.length, error)
				return 0
			}

			const breaker = this.breakers.get(kind)
			if (breaker && breaker.failures >= MAX_WRITE_FAILURES) {
				this.logger.info('Metrics persistence resumed', { kind })
			}
			this.breakers.delete(kind)
			return lines.length
		})

		this.writeChain = write
		return write
	}

	private recordFailure(kind: MetricKind, dropped: number, error: unknown): void {
		const breaker = this.breakers.get(kind) ?? { failures: 0, openedAt: 0 }
		breaker.failures++
		breaker.openedAt = this.clock.now()
		this.breakers.set(kind, breaker)

		this.logger.error('Failed to persist metrics', {
			kind,
			dropped,
			category: CATEGORY,
			failureCount: breaker.failures,
			maxFailures: MAX_WRITE_FAILURES,
			error: describeError(error),
		})
		if (breaker.failures === MAX_WRITE_FAILURES) {
			this.logger.error('Metrics persistence disabled - too many failures', {
				kind,
				directory: this.directory,
				retryInMs: this.failureCooldownMs,
			})
		}
	}

	/**
	 * One JSON line per record. Records that cannot be serialized (a BigInt
	 * or a cycle in metadata) are logged and left out.
	 */
	private serialize<K extends MetricKind>(
		kind: K,
		records: readonly MetricRecordMap[K][],
	): string[] {
		const lines: string[] = []
		for (const record of records) {
			try {
				lines.push(`${JSON.stringify(record)}\n`)
			} catch (error: unknown) {
				this.logger.error('Skipping unserializable metrics record', {
					kind,
					error: describeError(error),
				})
			}
		}
		return lines
	}

	private async writeLines(kind: MetricKind, lines: readonly string[]): Promise<void> {
		await ensureDir(this.directory)

		const filePath = this.filePath(kind)
		if (await pathExists(filePath)) {
			const { size } = await stat(filePath)
			if (size >= this.maxFileSizeBytes) {
				this.logger.info('Rotating metrics file (size limit)', {
					kind,
					currentSize: size,
					maxSize: this.maxFileSizeBytes,
				})
				await this.rotate(kind)
			}
		}

		await appendToFile(filePath, lines.join(''))
	}

	/**
	 * Rewrite a file atomically with the records inside retention, newest
	 * kept within half of `maxFileSizeBytes`.
	 */
	private async rotate<K extends MetricKind>(kind: K): Promise<void> {
		const cutoff = this.clock.now() - this.retentionDays * DAY_MS
		const timeOf = RECORD_TIME[kind]
		const lines = (await this.readRecords(kind))
			.filter((record) => Date.parse(timeOf(record)) >= cutoff)
			.map((record) => `${JSON.stringify(record)}\n`)

		const budget = Math.floor(this.maxFileSizeBytes / 2)
		let size = lines.reduce((total, line) => total + Buffer.byteLength(line), 0)
		let first = 0
		while (size > budget && first < lines.length) {
			size -= Buffer.byteLength(lines[first] ?? '')
			first++
		}
		if (first > 0) {
			this.logger.warning('Dropping oldest metrics records over size limit', {
				kind,
				dropped: first,
				maxSize: this.maxFileSizeBytes,
			})
		}

		const kept = lines.slice(first)
		await writeTextFileAtomic(this.filePath(kind), kept.join(''))

		this.logger.info('Metrics file rotated', { kind, recordCount: kept.length })
	}

	private async readRecords<K extends MetricKind>(kind: K): Promise<MetricRecordMap[K][]> {
		const filePath = this.filePath(kind)
		if (!(await pathExists(filePath))) {
			return []
		}

		const schema = RECORD_SCHEMAS[kind]
		const content = await readTextFile(filePath)
		const records: MetricRecordMap[K][] = []

		for (const line of content.split('\n')) {
			if (line.trim() === '') continue

			let parsed: unknown
			try {
				parsed = JSON.parse(line)
			} catch (error: unknown) {
				this.logger.error('Failed to parse metrics line', {
					kind,
					line: line.substring(0, 100),
					error: describeError(error),
				})
				continue
			}

			const result = schema.safeParse(parsed)
			if (!result.success) {
				this.logger.error('Skipping invalid metrics record', {
					kind,
					line: line.substring(0, 100),
					error: result.error.message,
				})
				continue
			}
			records.push(result.data)
		}

		return records
	}
}
