/**
 * Test utilities for loopscope
 *
 * @example
 * ```typescript
 * import { createManualClock, createRecordingLogger } from 'loopscope/testing'
 *
 * const clock = createManualClock()
 * const logger = createRecordingLogger()
 * const main = new ExecutionContext({ clock, logger })
 * ```
 */

export { createManualClock, type ManualClock } from "./manual-clock.js";
export {
	createRecordingLogger,
	type LogEntry,
	type RecordingLogger,
} from "./recording-logger.js";
