import { describe, test, expect } from 'vitest';
import { EnvConfigProvider } from '@fieldmap/config';
import { readLogConfig, buildLoggerOptions, DEFAULT_LOG_CONFIG } from '../src/config';
import type { LogObject } from '../src/types';

describe('readLogConfig', () => {
	test('should return defaults when nothing is set', async () => {
		const result = await readLogConfig(new EnvConfigProvider({}));
		expect(result).toEqual(DEFAULT_LOG_CONFIG);
	});

	test('should parse level case-insensitively', async () => {
		const result = await readLogConfig(new EnvConfigProvider({ LOG_LEVEL: ' DEBUG ' }));
		expect(result.level).toBe('debug');
	});

	test('should fall back to info for unknown level', async () => {
		const result = await readLogConfig(new EnvConfigProvider({ LOG_LEVEL: 'verbose' }));
		expect(result.level).toBe('info');
	});

	test('should parse comma-separated name lists', async () => {
		const result = await readLogConfig(
			new EnvConfigProvider({ LOG_INCLUDE_NAMES: 'Mapping, Fields,,', LOG_EXCLUDE_NAMES: ' ' })
		);
		expect(result.includeNames).toEqual(['Mapping', 'Fields']);
		expect(result.excludeNames).toEqual([]);
	});

	test('should enable JSON only for the literal true', async () => {
		expect((await readLogConfig(new EnvConfigProvider({ LOG_JSON: 'true' }))).jsonFormat).toBe(true);
		expect((await readLogConfig(new EnvConfigProvider({ LOG_JSON: 'yes' }))).jsonFormat).toBe(false);
	});
});

describe('buildLoggerOptions', () => {
	const record: LogObject = { time: 0, level: 20, msg: 'hello', name: 'Mapping' };

	test('should carry the level and a single transport', () => {
		const options = buildLoggerOptions({ ...DEFAULT_LOG_CONFIG, level: 'warn' });
		expect(options.level).toBe('warn');
		expect(options.transports).toHaveLength(1);
	});

	test('should filter by logger name when lists are configured', () => {
		const lines: string[] = [];
		const original = console.log;
		console.log = (line: string) => lines.push(line);
		try {
			const options = buildLoggerOptions({
				...DEFAULT_LOG_CONFIG,
				jsonFormat: true,
				excludeNames: ['Mapping']
			});
			options.transports[0]!.write(record);
			options.transports[0]!.write({ ...record, name: 'Fields' });
		} finally {
			console.log = original;
		}
		expect(lines).toEqual([JSON.stringify({ ...record, name: 'Fields' })]);
	});
});
