import { consoleTransport } from './console';
import { filterTransport } from './filter';
import { memoryTransport } from './memory';

export { consoleTransport, formatPretty, ANSI_COLORS, type ConsoleTransportOptions } from './console';
export { filterTransport, type FilterOptions } from './filter';
export { memoryTransport, type MemoryTransport } from './memory';

interface TransportsNamespace {
	console: typeof consoleTransport;
	filter: typeof filterTransport;
	memory: typeof memoryTransport;
}

/**
 * Built-in transports for the logger.
 */
export const transports: TransportsNamespace = {
	console: consoleTransport,
	filter: filterTransport,
	memory: memoryTransport
};
