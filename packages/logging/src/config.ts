import type { LoggerOptions, Transport } from './types';
import { isLevelName, type LevelName } from './levels';
import { consoleTransport } from './transports/console';
import { filterTransport } from './transports/filter';

/**
 * Minimal ConfigProvider shape for logging configuration.
 * Any @fieldmap/config provider satisfies it.
 */
interface ConfigProvider {
	get(key: string): Promise<string | undefined>;
}

/**
 * Logging configuration read from a config provider.
 */
export interface LogConfig {
	/** Log level threshold. Default: 'info' */
	level: LevelName;
	/** Logger names to include (empty = all) */
	includeNames: string[];
	/** Logger names to exclude */
	excludeNames: string[];
	/** Use JSON lines instead of the pretty format */
	jsonFormat: boolean;
}

export const DEFAULT_LOG_CONFIG: Readonly<LogConfig> = {
	level: 'info',
	includeNames: [],
	excludeNames: [],
	jsonFormat: false
};

function parseList(value: string | undefined): string[] {
	if (!value || value.trim() === '') return [];
	return value
		.split(',')
		.map((s) => s.trim())
		.filter(Boolean);
}

/**
 * Read logging configuration from a config provider.
 *
 * Reads these keys:
 * - LOG_LEVEL: debug | info | warn | error (default: info)
 * - LOG_INCLUDE_NAMES: comma-separated logger names to include
 * - LOG_EXCLUDE_NAMES: comma-separated logger names to exclude
 * - LOG_JSON: true | false (default: false)
 */
export async function readLogConfig(config: ConfigProvider): Promise<LogConfig> {
	const level = (await config.get('LOG_LEVEL'))?.trim().toLowerCase();
	const includeNames = await config.get('LOG_INCLUDE_NAMES');
	const excludeNames = await config.get('LOG_EXCLUDE_NAMES');
	const jsonFormat = await config.get('LOG_JSON');

	return {
		level: isLevelName(level) ? level : DEFAULT_LOG_CONFIG.level,
		includeNames: parseList(includeNames),
		excludeNames: parseList(excludeNames),
		jsonFormat: jsonFormat === 'true'
	};
}

/**
 * Build logger options from a LogConfig.
 *
 * @example
 * ```ts
 * const logConfig = await readLogConfig(new EnvConfigProvider());
 * Logger.configure(buildLoggerOptions(logConfig));
 * ```
 */
export function buildLoggerOptions(config: LogConfig): Required<LoggerOptions> {
	let transport: Transport = consoleTransport({ json: config.jsonFormat });

	if (config.includeNames.length > 0 || config.excludeNames.length > 0) {
		transport = filterTransport(transport, {
			includeNames: config.includeNames,
			excludeNames: config.excludeNames
		});
	}

	return { level: config.level, transports: [transport] };
}
