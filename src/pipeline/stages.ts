/**
 * The closed set of stages a unit of work passes through, in pipeline order.
 */
export const PIPELINE_STAGES = [
	'data_ingestion',
	'data_processing',
	'feature_extraction',
	'signal_generation',
	'risk_validation',
	'order_creation',
	'order_execution',
	'trade_confirmation',
	'portfolio_update',
] as const

export type PipelineStage = (typeof PIPELINE_STAGES)[number]

const STAGE_SET: ReadonlySet<string> = new Set(PIPELINE_STAGES)

/**
 * Type guard for stage names coming from config files or other untrusted input.
 */
export function isPipelineStage(value: unknown): value is PipelineStage {
	return typeof value === 'string' && STAGE_SET.has(value)
}
