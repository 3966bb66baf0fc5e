/**
 * SLO definition schema, validation and defaults.
 */

import { z } from 'zod'
import { ValidationError } from '../errors/index.js'
import { PIPELINE_STAGES } from '../pipeline/index.js'
import type { SLODefinition } from './types.js'

/**
 * Zod schema for one SLO definition, including threshold ordering.
 */
export const SLODefinitionSchema: z.ZodType<SLODefinition, z.ZodTypeDef, unknown> = z
	.object({
		name: z.string().trim().min(1),
		stage: z.enum(PIPELINE_STAGES),
		metricType: z.enum(['latency', 'throughput']),
		targetValue: z.number().finite().nonnegative(),
		warningThreshold: z.number().finite().nonnegative(),
		criticalThreshold: z.number().finite().nonnegative(),
		measurementWindowMinutes: z.number().finite().positive(),
		description: z.string().default(''),
	})
	.superRefine((slo, ctx) => {
		const { metricType, targetValue, warningThreshold, criticalThreshold } = slo

		if (metricType === 'latency') {
			if (!(targetValue <= warningThreshold && warningThreshold <= criticalThreshold)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ['warningThreshold'],
					message: `latency SLO "${slo.name}" requires target <= warning <= critical (got ${targetValue}/${warningThreshold}/${criticalThreshold})`,
				})
			}
			return
		}

		if (!(targetValue >= warningThreshold && warningThreshold >= criticalThreshold)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['warningThreshold'],
				message: `throughput SLO "${slo.name}" requires target >= warning >= critical (got ${targetValue}/${warningThreshold}/${criticalThreshold})`,
			})
		}
	})

export const SLODefinitionListSchema = z.array(SLODefinitionSchema)

/**
 * Format zod issues as "path: message" lines.
 */
export function formatZodIssues(error: z.ZodError): string[] {
	return error.issues.map((issue) =>
		issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
	)
}

/**
 * Validate a list of SLO definitions from config.
 *
 * @throws {ValidationError} On schema violations, bad threshold ordering or
 *   duplicate names
 *
 * @example
 * ```ts
 * const slos = parseSLODefinitions(JSON.parse(raw).slos);
 * ```
 */
export function parseSLODefinitions(raw: unknown): SLODefinition[] {
	const result = SLODefinitionListSchema.safeParse(raw)
	if (!result.success) {
		const issues = formatZodIssues(result.error)
		throw new ValidationError(
			`Invalid SLO definitions: ${issues.join('; ')}`,
			'INVALID_SLO_DEFINITION',
			{ issues },
		)
	}

	const seen = new Set<string>()
	for (const slo of result.data) {
		if (seen.has(slo.name)) {
			throw new ValidationError(
				`Duplicate SLO name: ${slo.name}`,
				'DUPLICATE_SLO_NAME',
				{ name: slo.name },
			)
		}
		seen.add(slo.name)
	}

	return result.data
}

/**
 * Objectives used when no configuration supplies any.
 */
export const DEFAULT_SLO_DEFINITIONS: readonly SLODefinition[] = [
	{
		name: 'signal_generation_latency',
		stage: 'signal_generation',
		metricType: 'latency',
		targetValue: 1000,
		warningThreshold: 1500,
		criticalThreshold: 3000,
		measurementWindowMinutes: 15,
		description: 'Signal generation should complete within 1 second',
	},
	{
		name: 'order_execution_latency',
		stage: 'order_execution',
		metricType: 'latency',
		targetValue: 2000,
		warningThreshold: 5000,
		criticalThreshold: 10000,
		measurementWindowMinutes: 15,
		description: 'Order execution should complete within 2 seconds',
	},
	{
		name: 'data_processing_throughput',
		stage: 'data_processing',
		metricType: 'throughput',
		targetValue: 100,
		warningThreshold: 50,
		criticalThreshold: 20,
		measurementWindowMinutes: 5,
		description: 'Data processing should handle 100 items/second',
	},
]
