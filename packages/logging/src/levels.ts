/**
 * Logging level utilities.
 */
import type { LevelName, LevelNumber } from './types';

export type { LevelName, LevelNumber };

/**
 * Log level constants (Pino-compatible numbering)
 */
export const levels: Readonly<Record<LevelName, LevelNumber>> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40
};

const levelNames: Readonly<Record<LevelNumber, LevelName>> = {
	10: 'debug',
	20: 'info',
	30: 'warn',
	40: 'error'
};

export function getLevelName(level: LevelNumber): LevelName {
	return levelNames[level];
}

/**
 * Narrow an arbitrary string (e.g. an env value) to a level name.
 */
export function isLevelName(value: string | undefined): value is LevelName {
	return value !== undefined && Object.hasOwn(levels, value);
}

export function isLevelEnabled(current: LevelNumber, threshold: LevelNumber): boolean {
	return current >= threshold;
}
