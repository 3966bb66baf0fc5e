/**
 * Performance collector: per-stage measurement buffers, scoped stage
 * tracing and throughput reporting.
 *
 * Node runs every mutation below as one synchronous step on the event loop,
 * so an append plus its eviction and the matching active-trace update can't
 * interleave with another caller. Statistics are computed on copies taken
 * from the buffers, never on live storage.
 */

import { ValidationError, describeError } from '../errors/index.js'
import { getSubsystemLogger, type MonitorLogger } from '../logging/index.js'
import { isPipelineStage, PIPELINE_STAGES, type PipelineStage } from '../pipeline/index.js'
import {
	assertNonNegativeInteger,
	assertPositiveNumber,
} from '../validation/index.js'
import { RingBuffer, type RingBufferSlice } from './ring-buffer.js'
import { computeLatencyStats, computeThroughputStats } from './statistics.js'
import type {
	ActiveTrace,
	Clock,
	LatencyMeasurement,
	LatencyStats,
	PerformanceCollectorOptions,
	ThroughputMeasurement,
	ThroughputStats,
	TraceOptions,
} from './types.js'

export const DEFAULT_LATENCY_CAPACITY = 10_000
export const DEFAULT_THROUGHPUT_CAPACITY = 1_000
export const DEFAULT_STATS_WINDOW_MINUTES = 60

/**
 * Wall clock with sub-millisecond resolution.
 */
export const systemClock: Clock = {
	now: () => performance.timeOrigin + performance.now(),
}

/**
 * Handle for one in-flight trace.
 */
export interface StageTrace {
	readonly traceId: string
	readonly stage: PipelineStage
	readonly startTime: number
	/**
	 * Close the trace and record its measurement. Pass the error that ended
	 * the scope, if any. Later calls return the first measurement unchanged.
	 */
	end(error?: unknown): LatencyMeasurement
}

/**
 * Collects latency and throughput measurements for every pipeline stage.
 *
 * @example
 * ```typescript
 * const collector = new PerformanceCollector();
 *
 * const signal = await collector.traceStage("signal_generation", async (traceId) => {
 *   return generateSignal(marketData, traceId);
 * });
 *
 * collector.recordThroughput("data_processing", 150, 60);
 * const stats = collector.getLatencyStats("signal_generation", 15);
 * ```
 */
export class PerformanceCollector {
	private readonly latency: Map<PipelineStage, RingBuffer<LatencyMeasurement>>
	private readonly throughput: Map<PipelineStage, RingBuffer<ThroughputMeasurement>>
	/** Keyed per trace, so a reused trace id never hides another in-flight trace. */
	private readonly activeTraces = new Map<number, ActiveTrace>()
	private nextTraceHandle = 0
	private readonly clock: Clock
	private readonly logger: MonitorLogger

	constructor(options: PerformanceCollectorOptions = {}) {
		const latencyCapacity = options.latencyCapacity ?? DEFAULT_LATENCY_CAPACITY
		const throughputCapacity =
			options.throughputCapacity ?? DEFAULT_THROUGHPUT_CAPACITY

		this.clock = options.clock ?? systemClock
		this.logger = options.logger ?? getSubsystemLogger('collector')

		this.latency = new Map(
			PIPELINE_STAGES.map((stage) => [
				stage,
				new RingBuffer<LatencyMeasurement>(latencyCapacity),
			]),
		)
		this.throughput = new Map(
			PIPELINE_STAGES.map((stage) => [
				stage,
				new RingBuffer<ThroughputMeasurement>(throughputCapacity),
			]),
		)
	}

	/**
	 * Start timing a stage and register it as in flight.
	 *
	 * Prefer `traceStage` / `traceStageSync`, which guarantee `end()` runs on
	 * every exit path. Use this directly when the scope spans callbacks.
	 */
	beginTrace(stage: PipelineStage, options: TraceOptions = {}): StageTrace {
		assertStage(stage)

		const traceId = options.traceId ?? synthesizeTraceId(stage)
		const startTime = this.clock.now()
		const metadata = options.metadata ? { ...options.metadata } : undefined
		const handle = this.nextTraceHandle++

		this.activeTraces.set(handle, {
			traceId,
			stage,
			startTime,
			metadata: { ...metadata },
		})

		let recorded: LatencyMeasurement | undefined

		return {
			traceId,
			stage,
			startTime,
			end: (error?: unknown): LatencyMeasurement => {
				if (recorded) {
					return recorded
				}

				const endTime = this.clock.now()
				const failed = error !== undefined
				recorded = {
					traceId,
					stage,
					startTime,
					endTime,
					durationMs: Math.max(0, endTime - startTime),
					success: !failed,
					...(failed ? { errorMessage: describeError(error) } : {}),
					...(metadata ? { metadata } : {}),
				}

				this.bufferFor(this.latency, stage).push(recorded)
				this.activeTraces.delete(handle)

				if (failed) {
					this.logger.debug('Stage trace failed', {
						stage,
						traceId,
						durationMs: recorded.durationMs,
						error: recorded.errorMessage,
					})
				}

				return recorded
			},
		}
	}

	/**
	 * Trace an async unit of work.
	 *
	 * Records exactly one measurement whether `fn` resolves or rejects.
	 * A rejection is re-thrown as the very same value.
	 */
	async traceStage<T>(
		stage: PipelineStage,
		fn: (traceId: string) => Promise<T> | T,
		options?: TraceOptions,
	): Promise<T> {
		const trace = this.beginTrace(stage, options)
		try {
			const result = await fn(trace.traceId)
			trace.end()
			return result
		} catch (error: unknown) {
			trace.end(error ?? new Error('Traced stage threw a nullish value'))
			throw error
		}
	}

	/**
	 * Sync version of traceStage.
	 */
	traceStageSync<T>(
		stage: PipelineStage,
		fn: (traceId: string) => T,
		options?: TraceOptions,
	): T {
		const trace = this.beginTrace(stage, options)
		try {
			const result = fn(trace.traceId)
			trace.end()
			return result
		} catch (error: unknown) {
			trace.end(error ?? new Error('Traced stage threw a nullish value'))
			throw error
		}
	}

	/**
	 * Report items processed by a stage over a window.
	 *
	 * @param itemsProcessed - Non-negative integer
	 * @param windowSeconds - Positive window length (default: 60)
	 * @param errors - Non-negative integer (default: 0)
	 * @throws {ValidationError} On negative counts or a non-positive window
	 */
	recordThroughput(
		stage: PipelineStage,
		itemsProcessed: number,
		windowSeconds = 60,
		errors = 0,
	): ThroughputMeasurement {
		assertStage(stage)
		assertNonNegativeInteger(itemsProcessed, 'itemsProcessed')
		assertPositiveNumber(windowSeconds, 'windowSeconds')
		assertNonNegativeInteger(errors, 'errors')

		const measurement: ThroughputMeasurement = {
			stage,
			timestamp: this.clock.now(),
			itemsProcessed,
			windowSeconds,
			throughputPerSecond: itemsProcessed / windowSeconds,
			errors,
		}

		this.bufferFor(this.throughput, stage).push(measurement)
		return measurement
	}

	/**
	 * Latency statistics over the last `windowMinutes`.
	 *
	 * @returns null when no successful measurement falls inside the window
	 */
	getLatencyStats(
		stage: PipelineStage,
		windowMinutes = DEFAULT_STATS_WINDOW_MINUTES,
	): LatencyStats | null {
		return computeLatencyStats(this.getLatencyMeasurements(stage), {
			windowMinutes,
			now: this.clock.now(),
		})
	}

	/**
	 * Throughput statistics over the last `windowMinutes`.
	 *
	 * @returns null when no report falls inside the window
	 */
	getThroughputStats(
		stage: PipelineStage,
		windowMinutes = DEFAULT_STATS_WINDOW_MINUTES,
	): ThroughputStats | null {
		return computeThroughputStats(this.getThroughputMeasurements(stage), {
			windowMinutes,
			now: this.clock.now(),
		})
	}

	/** Snapshot of a stage's latency buffer, oldest first. */
	getLatencyMeasurements(stage: PipelineStage): LatencyMeasurement[] {
		assertStage(stage)
		return this.bufferFor(this.latency, stage).toArray()
	}

	/** Snapshot of a stage's throughput buffer, oldest first. */
	getThroughputMeasurements(stage: PipelineStage): ThroughputMeasurement[] {
		assertStage(stage)
		return this.bufferFor(this.throughput, stage).toArray()
	}

	/** Latency measurements appended after `sequence`, newest `limit` of them. */
	latencySince(
		stage: PipelineStage,
		sequence: number,
		limit?: number,
	): RingBufferSlice<LatencyMeasurement> {
		return this.bufferFor(this.latency, stage).since(sequence, limit)
	}

	/** Throughput measurements appended after `sequence`, newest `limit` of them. */
	throughputSince(
		stage: PipelineStage,
		sequence: number,
		limit?: number,
	): RingBufferSlice<ThroughputMeasurement> {
		return this.bufferFor(this.throughput, stage).since(sequence, limit)
	}

	/** Traces that have started and not yet ended. */
	getActiveTraces(): ActiveTrace[] {
		return Array.from(this.activeTraces.values())
	}

	/** Clear every buffer and the active-trace registry. */
	reset(): void {
		for (const buffer of this.latency.values()) buffer.clear()
		for (const buffer of this.throughput.values()) buffer.clear()
		this.activeTraces.clear()
	}

	private bufferFor<T>(
		buffers: Map<PipelineStage, RingBuffer<T>>,
		stage: PipelineStage,
	): RingBuffer<T> {
		const buffer = buffers.get(stage)
		if (!buffer) {
			throw new ValidationError(`Unknown pipeline stage: ${stage}`, 'UNKNOWN_STAGE', {
				stage,
			})
		}
		return buffer
	}
}

function assertStage(stage: unknown): asserts stage is PipelineStage {
	if (!isPipelineStage(stage)) {
		throw new ValidationError(`Unknown pipeline stage: ${String(stage)}`, 'UNKNOWN_STAGE', {
			stage,
		})
	}
}

/**
 * `<stage>_<hrtime ns>`: unique per process without a shared counter.
 */
function synthesizeTraceId(stage: PipelineStage): string {
	return `${stage}_${process.hrtime.bigint()}`
}
