import type { Transport, LogObject } from '../types';

export interface MemoryTransport extends Transport {
	readonly records: LogObject[];
	clear(): void;
}

/**
 * Keeps records in an array. Intended for tests and for callers that
 * want to inspect mapping diagnostics programmatically.
 */
export function memoryTransport(): MemoryTransport {
	const records: LogObject[] = [];

	return {
		records,
		write(obj: LogObject): void {
			records.push(obj);
		},
		clear(): void {
			records.length = 0;
		}
	};
}
