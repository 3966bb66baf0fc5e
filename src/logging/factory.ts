/**
 * Monitor logger factory.
 *
 * Configures LogTape with a rotating JSONL file sink under the
 * `pipeline-monitor` category. Library code only ever calls `getLogger`;
 * the host process decides whether and where records are written.
 */

import { existsSync, mkdirSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { getRotatingFileSink } from '@logtape/file'
import {
	configure,
	getLogger,
	jsonLinesFormatter,
	type Logger,
} from '@logtape/logtape'
import {
	DEFAULT_LOG_EXTENSION,
	DEFAULT_LOG_LEVEL,
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
	type LogLevel,
	ROOT_CATEGORY,
} from './config.js'
import { createCorrelationId } from './correlation.js'

const DEFAULT_LOG_DIR = join(homedir(), '.pipeline-monitor', 'logs')

export interface MonitorLoggerOptions {
	/**
	 * Log directory. Defaults to ~/.pipeline-monitor/logs/
	 */
	logDir?: string

	/**
	 * Log file name without extension. Defaults to "pipeline-monitor".
	 */
	logFileName?: string

	/** Maximum log file size before rotation. Defaults to 1 MiB. */
	maxSize?: number

	/** Number of rotated files to keep. Defaults to 5. */
	maxFiles?: number

	/** Lowest level to capture. Defaults to "info". */
	lowestLevel?: LogLevel
}

export interface MonitorLoggerHandle {
	/**
	 * Configure LogTape. Safe to call more than once, and safe when the host
	 * application has already configured LogTape itself.
	 */
	initLogger: () => Promise<void>

	createCorrelationId: typeof createCorrelationId

	/** Logger for the root `pipeline-monitor` category. */
	rootLogger: Logger

	logDir: string

	logFile: string
}

/**
 * Create the logging handle for a process hosting a pipeline monitor.
 *
 * @example
 * ```typescript
 * const { initLogger, rootLogger } = createMonitorLogger({ lowestLevel: "debug" });
 * await initLogger();
 * rootLogger.info("Pipeline worker started");
 * ```
 */
export function createMonitorLogger(
	options: MonitorLoggerOptions = {},
): MonitorLoggerHandle {
	const {
		logDir = DEFAULT_LOG_DIR,
		logFileName = ROOT_CATEGORY,
		maxSize = DEFAULT_MAX_SIZE,
		maxFiles = DEFAULT_MAX_FILES,
		lowestLevel = DEFAULT_LOG_LEVEL,
	} = options

	const logFile = join(logDir, `${logFileName}${DEFAULT_LOG_EXTENSION}`)

	let isInitialized = false

	async function initLogger(): Promise<void> {
		if (isInitialized) return

		if (!existsSync(logDir)) {
			mkdirSync(logDir, { recursive: true })
		}

		const sinkName = `file_${ROOT_CATEGORY}`

		try {
			await configure({
				sinks: {
					[sinkName]: getRotatingFileSink(logFile, {
						formatter: jsonLinesFormatter,
						maxSize,
						maxFiles,
					}),
				},
				loggers: [
					{
						category: [ROOT_CATEGORY],
						sinks: [sinkName],
						lowestLevel,
					},
					{
						category: ['logtape', 'meta'],
						sinks: [sinkName],
						lowestLevel: 'error',
					},
				],
			})
		} catch (error: unknown) {
			// The host already configured LogTape; keep its setup.
			if (
				error instanceof Error &&
				error.message.includes('Already configured')
			) {
				isInitialized = true
				return
			}
			throw error
		}

		getLogger([ROOT_CATEGORY]).info('Logging initialized', {
			logDir,
			logFile,
			maxSize,
			maxFiles,
		})

		isInitialized = true
	}

	return {
		initLogger,
		createCorrelationId,
		rootLogger: getLogger([ROOT_CATEGORY]),
		logDir,
		logFile,
	}
}
