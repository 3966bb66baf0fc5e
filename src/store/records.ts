/**
 * Persisted record shapes and conversions from in-memory measurements.
 *
 * Records are plain JSON: stage as a string, ISO-8601 timestamps and numeric
 * fields. Each kind has a zod schema used to validate lines read back from
 * disk.
 */

import { z } from 'zod'
import type { LatencyMeasurement, ThroughputMeasurement } from '../collector/index.js'
import type { ViolationRecord } from '../slo/index.js'

export const StoredLatencySchema = z.object({
	traceId: z.string(),
	stage: z.string(),
	startTime: z.string().datetime(),
	endTime: z.string().datetime(),
	durationMs: z.number(),
	success: z.boolean(),
	errorMessage: z.string().nullable(),
	metadata: z.record(z.unknown()).nullable(),
})

export const StoredThroughputSchema = z.object({
	stage: z.string(),
	timestamp: z.string().datetime(),
	itemsProcessed: z.number(),
	windowSeconds: z.number(),
	throughputPerSecond: z.number(),
	errors: z.number(),
})

export const StoredViolationSchema = z.object({
	timestamp: z.string().datetime(),
	sloName: z.string(),
	status: z.enum(['warning', 'critical']),
	currentValue: z.number(),
	targetValue: z.number(),
	compliancePercentage: z.number(),
})

export type StoredLatency = z.infer<typeof StoredLatencySchema>
export type StoredThroughput = z.infer<typeof StoredThroughputSchema>
export type StoredViolation = z.infer<typeof StoredViolationSchema>

/**
 * Record type for each persisted kind.
 */
export interface MetricRecordMap {
	latency: StoredLatency
	throughput: StoredThroughput
	violations: StoredViolation
}

export type MetricKind = keyof MetricRecordMap

export const METRIC_KINDS: readonly MetricKind[] = ['latency', 'throughput', 'violations']

export const RECORD_SCHEMAS: {
	[K in MetricKind]: z.ZodType<MetricRecordMap[K], z.ZodTypeDef, unknown>
} = {
	latency: StoredLatencySchema,
	throughput: StoredThroughputSchema,
	violations: StoredViolationSchema,
}

/**
 * Timestamp a record is filtered and aged by: a latency record's start
 * time, every other kind's `timestamp`.
 */
export const RECORD_TIME: { [K in MetricKind]: (record: MetricRecordMap[K]) => string } = {
	latency: (record) => record.startTime,
	throughput: (record) => record.timestamp,
	violations: (record) => record.timestamp,
}

export function toLatencyRecord(measurement: LatencyMeasurement): StoredLatency {
	return {
		traceId: measurement.traceId,
		stage: measurement.stage,
		startTime: new Date(measurement.startTime).toISOString(),
		endTime: new Date(measurement.endTime).toISOString(),
		durationMs: measurement.durationMs,
		success: measurement.success,
		errorMessage: measurement.errorMessage ?? null,
		metadata:
			measurement.metadata && Object.keys(measurement.metadata).length > 0
				? { ...measurement.metadata }
				: null,
	}
}

export function toThroughputRecord(measurement: ThroughputMeasurement): StoredThroughput {
	return {
		stage: measurement.stage,
		timestamp: new Date(measurement.timestamp).toISOString(),
		itemsProcessed: measurement.itemsProcessed,
		windowSeconds: measurement.windowSeconds,
		throughputPerSecond: measurement.throughputPerSecond,
		errors: measurement.errors,
	}
}

export function toViolationRecord(violation: ViolationRecord): StoredViolation {
	return {
		timestamp: new Date(violation.timestamp).toISOString(),
		sloName: violation.sloName,
		status: violation.status,
		currentValue: violation.currentValue,
		targetValue: violation.targetValue,
		compliancePercentage: violation.compliancePercentage,
	}
}
