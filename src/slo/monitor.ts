/**
 * SLO evaluator: compares windowed statistics against every registered
 * objective and feeds violations into the tracker.
 */

import { describeError } from '../errors/index.js'
import { getSubsystemLogger, type MonitorLogger } from '../logging/index.js'
import { calculateCompliance, determineStatus } from './evaluation.js'
import type {
	EvaluateOptions,
	SLODefinition,
	SLOHealth,
	SLOMonitorOptions,
	SLOStatsSource,
	SLOStatus,
} from './types.js'
import { ViolationTracker } from './violations.js'

/**
 * Evaluates SLOs on demand. Holds no per-SLO state between evaluations
 * apart from the violation history.
 *
 * @example
 * ```typescript
 * const monitor = new SLOMonitor({ definitions: DEFAULT_SLO_DEFINITIONS });
 * const statuses = monitor.evaluate(collector);
 * const violations = statuses.filter((s) => isViolation(s.status));
 * ```
 */
export class SLOMonitor {
	private readonly definitions: readonly SLODefinition[]
	private readonly logger: MonitorLogger
	readonly tracker: ViolationTracker

	constructor(options: SLOMonitorOptions) {
		this.definitions = [...options.definitions]
		this.tracker = options.tracker ?? new ViolationTracker()
		this.logger = options.logger ?? getSubsystemLogger('slo')
	}

	/**
	 * Evaluate every SLO. Never throws: a failing SLO degrades to `unknown`
	 * and the rest are still evaluated.
	 */
	evaluate(source: SLOStatsSource, options: EvaluateOptions = {}): SLOStatus[] {
		return this.definitions.map((slo) => this.evaluateOne(slo, source, options))
	}

	/**
	 * Evaluate one SLO.
	 *
	 * The current value is the window's p95 latency for latency SLOs and the
	 * mean per-second throughput for throughput SLOs.
	 */
	evaluateOne(
		slo: SLODefinition,
		source: SLOStatsSource,
		{ record = true }: EvaluateOptions = {},
	): SLOStatus {
		let current: number | null
		try {
			current = readCurrentValue(slo, source)
		} catch (error: unknown) {
			this.logger.error('SLO evaluation failed', {
				slo: slo.name,
				stage: slo.stage,
				error: describeError(error),
			})
			return this.unknownStatus(slo)
		}

		if (current === null) {
			this.logger.debug('No data in SLO window', {
				slo: slo.name,
				stage: slo.stage,
				windowMinutes: slo.measurementWindowMinutes,
			})
			return this.unknownStatus(slo)
		}

		const status = determineStatus(slo, current)
		const compliancePercentage = calculateCompliance(slo, current)

		if (record && status !== 'healthy') {
			this.tracker.record(slo, {
				status,
				currentValue: current,
				targetValue: slo.targetValue,
				compliancePercentage,
			})
		}

		return {
			sloName: slo.name,
			status,
			currentValue: current,
			targetValue: slo.targetValue,
			compliancePercentage,
			...this.violationSummary(slo.name),
		}
	}

	getDefinitions(): SLODefinition[] {
		return [...this.definitions]
	}

	getDefinition(name: string): SLODefinition | undefined {
		return this.definitions.find((slo) => slo.name === name)
	}

	private unknownStatus(slo: SLODefinition): SLOStatus {
		return {
			sloName: slo.name,
			status: 'unknown',
			currentValue: 0,
			targetValue: slo.targetValue,
			compliancePercentage: 0,
			...this.violationSummary(slo.name),
		}
	}

	private violationSummary(
		sloName: string,
	): Pick<SLOStatus, 'violationCount24h' | 'lastViolation'> {
		const last = this.tracker.lastViolation(sloName)
		return {
			violationCount24h: this.tracker.countInLast24h(sloName),
			lastViolation: last === null ? null : new Date(last).toISOString(),
		}
	}
}

/**
 * True for `warning` and `critical`.
 */
export function isViolation(status: SLOHealth): status is 'warning' | 'critical' {
	return status === 'warning' || status === 'critical'
}

function readCurrentValue(slo: SLODefinition, source: SLOStatsSource): number | null {
	if (slo.metricType === 'latency') {
		return source.getLatencyStats(slo.stage, slo.measurementWindowMinutes)?.p95Ms ?? null
	}
	return (
		source.getThroughputStats(slo.stage, slo.measurementWindowMinutes)?.meanThroughput ?? null
	)
}
