import type { Transport, LogObject } from '../types';

export interface FilterOptions {
	/** Only log these names (empty = all) */
	includeNames?: string[];
	/** Never log these names */
	excludeNames?: string[];
}

/**
 * Filter transport - wraps another transport and filters by logger name.
 *
 * @example
 * ```ts
 * // Silence pass diagnostics, keep everything else
 * filterTransport(consoleTransport(), { excludeNames: ['Mapping'] })
 * ```
 */
export function filterTransport(transport: Transport, options: FilterOptions): Transport {
	const includeSet = options.includeNames?.length ? new Set(options.includeNames) : null;
	const excludeSet = options.excludeNames?.length ? new Set(options.excludeNames) : null;

	function shouldLog(name?: string): boolean {
		if (!name) return true;
		if (includeSet && !includeSet.has(name)) return false;
		return !excludeSet?.has(name);
	}

	return {
		write(obj: LogObject): void {
			if (shouldLog(obj.name)) {
				transport.write(obj);
			}
		}
	};
}
