/**
 * Monitor configuration: zod schema with defaults, and a JSON file loader.
 */

import { z } from 'zod'
import { ConfigurationError, describeError } from '../errors/index.js'
import { pathExists, readTextFile } from '../fs/index.js'
import { getSubsystemLogger, type MonitorLogger } from '../logging/index.js'
import {
	DEFAULT_SLO_DEFINITIONS,
	formatZodIssues,
	SLODefinitionListSchema,
} from '../slo/index.js'

const MonitoringSchema = z
	.object({
		checkIntervalSeconds: z.number().finite().positive().default(30),
		stopTimeoutMs: z.number().int().positive().default(5000),
		alertCooldownMinutes: z.number().finite().nonnegative().default(5),
		persistLatencyLimit: z.number().int().nonnegative().default(100),
		persistThroughputLimit: z.number().int().nonnegative().default(50),
	})
	.default({})

const BuffersSchema = z
	.object({
		latencyCapacity: z.number().int().positive().default(10_000),
		throughputCapacity: z.number().int().positive().default(1_000),
		violationCapacity: z.number().int().positive().default(1_000),
	})
	.default({})

const StorageSchema = z
	.object({
		/** Directory for JSONL files; in-memory storage when absent */
		directory: z.string().min(1).optional(),
		retentionDays: z.number().finite().positive().default(7),
		maxFileSizeBytes: z
			.number()
			.int()
			.positive()
			.default(10 * 1024 * 1024),
		failureCooldownSeconds: z.number().finite().nonnegative().default(60),
	})
	.default({})

const AlertingSchema = z
	.object({
		enabled: z.boolean().default(true),
		webhookUrl: z.string().url().nullable().default(null),
		timeoutMs: z.number().int().positive().default(10_000),
	})
	.default({})

export const MonitorConfigSchema = z.object({
	monitoring: MonitoringSchema,
	buffers: BuffersSchema,
	storage: StorageSchema,
	alerting: AlertingSchema,
	slos: SLODefinitionListSchema.default(() => [...DEFAULT_SLO_DEFINITIONS]).superRefine(
		(slos, ctx) => {
			const seen = new Set<string>()
			slos.forEach((slo, index) => {
				if (seen.has(slo.name)) {
					ctx.addIssue({
						code: z.ZodIssueCode.custom,
						path: [index, 'name'],
						message: `Duplicate SLO name: ${slo.name}`,
					})
				}
				seen.add(slo.name)
			})
		},
	),
})

/** Fully defaulted configuration. */
export type MonitorConfig = z.output<typeof MonitorConfigSchema>

/** Configuration as written in a file; every field optional. */
export type MonitorConfigInput = z.input<typeof MonitorConfigSchema>

/**
 * Validate raw configuration and fill in defaults.
 *
 * @throws {ConfigurationError} When any field is invalid
 *
 * @example
 * ```ts
 * const config = parseMonitorConfig({ monitoring: { checkIntervalSeconds: 10 } });
 * config.alerting.enabled; // true
 * ```
 */
export function parseMonitorConfig(raw: unknown = {}): MonitorConfig {
	const result = MonitorConfigSchema.safeParse(raw)
	if (!result.success) {
		const issues = formatZodIssues(result.error)
		throw new ConfigurationError(
			`Invalid monitor configuration: ${issues.join('; ')}`,
			'INVALID_CONFIG',
			{ issues },
		)
	}
	return result.data
}

export interface LoadMonitorConfigOptions {
	logger?: MonitorLogger
}

/**
 * Load configuration from a JSON file.
 *
 * A missing path or file yields the defaults. A file that exists but cannot
 * be read, is not JSON, or fails validation throws.
 *
 * @throws {ConfigurationError}
 */
export async function loadMonitorConfig(
	filePath?: string,
	options: LoadMonitorConfigOptions = {},
): Promise<MonitorConfig> {
	const logger = options.logger ?? getSubsystemLogger('monitor')

	if (filePath === undefined || !(await pathExists(filePath))) {
		logger.info('Monitor config not found, using defaults', { path: filePath ?? null })
		return parseMonitorConfig({})
	}

	let raw: unknown
	try {
		raw = JSON.parse(await readTextFile(filePath))
	} catch (error: unknown) {
		throw new ConfigurationError(
			`Failed to read monitor config ${filePath}: ${describeError(error)}`,
			'CONFIG_READ_FAILED',
			{ path: filePath },
			error instanceof Error ? error : undefined,
		)
	}

	const config = parseMonitorConfig(raw)
	logger.info('Monitor config loaded', { path: filePath, sloCount: config.slos.length })
	return config
}
