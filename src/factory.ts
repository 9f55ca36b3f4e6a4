/**
 * Scope factory function
 */

import type { ScopeOptions } from "./scope.js";
import { Scope } from "./scope.js";

/**
 * Create a root Scope for structured concurrency.
 *
 * @param options - Configuration; `pool` is required for a root scope
 * @returns A new Scope instance
 *
 * @example
 * ```typescript
 * const pool = new DispatcherPool({ workers: 4 })
 * const main = new ExecutionContext({ name: "main" })
 *
 * await using s = scope({ pool, context: main })
 * s.launch(() => fetchData(), main, { onResult: show })
 * ```
 *
 * @example With OpenTelemetry tracing
 * ```typescript
 * import { trace } from "@opentelemetry/api"
 *
 * const s = scope({ pool, tracer: trace.getTracer("my-app") })
 * const user = await s.async(() => fetchUser())  // "scope.job" span
 * ```
 */
export function scope(options: ScopeOptions): Scope {
	return new Scope(options);
}
