/**
 * Logging configuration defaults.
 */

/** Maximum log file size before rotation (1 MiB) */
export const DEFAULT_MAX_SIZE: number = 0x400 * 0x400

/** Number of rotated files to keep */
export const DEFAULT_MAX_FILES = 5

/** Default log file extension */
export const DEFAULT_LOG_EXTENSION = '.jsonl'

/** Root LogTape category for every monitor logger */
export const ROOT_CATEGORY = 'pipeline-monitor'

/**
 * Logging level conventions.
 *
 * Note: LogTape uses "warning" not "warn".
 *
 * - DEBUG: per-trace and per-report bookkeeping
 * - INFO: lifecycle (start/stop, tick summaries, rotations)
 * - WARNING: degraded operation (SLO violations, stop timeouts, unknown status)
 * - ERROR: failed evaluation, persistence or alert delivery
 */
export type LogLevel = 'debug' | 'info' | 'warning' | 'error'

/** Default lowest log level to capture */
export const DEFAULT_LOG_LEVEL: LogLevel = 'info'
