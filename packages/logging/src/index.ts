export { Logger, type LogObject, type Transport, type LoggerOptions, type LoggerGlobalOptions } from './logger';
export { levels, getLevelName, isLevelName, isLevelEnabled, type LevelName, type LevelNumber } from './levels';
export {
	transports,
	consoleTransport,
	filterTransport,
	memoryTransport,
	formatPretty,
	ANSI_COLORS
} from './transports/index';
export type { ConsoleTransportOptions, FilterOptions, MemoryTransport } from './transports/index';
export { readLogConfig, buildLoggerOptions, DEFAULT_LOG_CONFIG, type LogConfig } from './config';
