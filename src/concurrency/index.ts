/**
 * Concurrency helpers.
 *
 * ```typescript
 * import { withTimeout } from "pipeline-slo-monitor/concurrency";
 *
 * await withTimeout(sink.send(alert), 10_000);
 * ```
 *
 * @module concurrency
 */

export { TimeoutError, withTimeout } from './timeout.js'
