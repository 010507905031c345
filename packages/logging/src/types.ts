/**
 * Logging Types
 *
 * Shared by the logger, its transports and the config reader.
 */

export type LevelName = 'debug' | 'info' | 'warn' | 'error';

export type LevelNumber = 10 | 20 | 30 | 40;

/**
 * A single structured log record as handed to transports.
 */
export interface LogObject {
	time: number;
	level: LevelNumber;
	msg: string;
	name?: string;
	[key: string]: unknown;
}

/**
 * Destination for log records.
 */
export interface Transport {
	write(obj: LogObject): void;
}

export interface LoggerOptions {
	/** Minimum level written (default: the global level) */
	level?: LevelName;
	/** Transports used instead of the global ones */
	transports?: Transport[];
}

export interface LoggerGlobalOptions {
	level?: LevelName;
	transports?: Transport[];
}
