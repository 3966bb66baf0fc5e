/**
 * Timeout utilities for async operations.
 *
 * Used to bound how long `PipelineMonitor.stop()` waits for an in-flight
 * tick, and how long a webhook delivery may take.
 *
 * @module concurrency/timeout
 */

/**
 * Error thrown when an operation exceeds its timeout.
 */
export class TimeoutError extends Error {
	/**
	 * @param message - Error description
	 * @param timeoutMs - Timeout duration that was exceeded
	 */
	constructor(
		message: string,
		public readonly timeoutMs: number,
	) {
		super(message)
		this.name = 'TimeoutError'
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, TimeoutError)
		}
	}
}

/**
 * Wrap an async operation with a timeout.
 *
 * Uses Promise.race to reject if the operation takes too long. The
 * operation keeps running after the timeout (there is no preemption), but
 * the returned promise rejects immediately. The timer is cleared as soon as
 * either side settles so nothing is left holding the event loop open.
 *
 * @param promise - Async operation to wrap
 * @param timeoutMs - Maximum time to wait in milliseconds
 * @param message - Optional error message (default: "Operation timed out after {timeoutMs}ms")
 * @throws {TimeoutError} If operation exceeds timeout
 *
 * @example
 * ```typescript
 * try {
 *   await withTimeout(loopPromise, 5000, "Monitor loop did not stop");
 * } catch (error) {
 *   if (error instanceof TimeoutError) {
 *     logger.warning("Stop timed out", { timeoutMs: error.timeoutMs });
 *   }
 * }
 * ```
 */
export async function withTimeout<T>(
	promise: Promise<T>,
	timeoutMs: number,
	message?: string,
): Promise<T> {
	let timer: NodeJS.Timeout | undefined
	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			reject(
				new TimeoutError(
					message ?? `Operation timed out after ${timeoutMs}ms`,
					timeoutMs,
				),
			)
		}, timeoutMs)
	})

	try {
		return await Promise.race([promise, timeout])
	} finally {
		clearTimeout(timer)
	}
}
