/**
 * Default time source
 */

import type { Clock } from "./types.js";

/**
 * Clock backed by `performance.now()` and the host's timers.
 * `performance.now()` never goes backwards, so due times stay ordered.
 */
export const systemClock: Clock = {
	now: () => performance.now(),
	setTimer(callback, delayMs) {
		const timeoutId = setTimeout(callback, Math.max(0, delayMs));
		return () => clearTimeout(timeoutId);
	},
};
