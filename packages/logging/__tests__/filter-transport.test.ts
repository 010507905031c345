import { describe, test, expect } from 'vitest';
import { filterTransport } from '../src/transports/filter';
import { memoryTransport } from '../src/transports/memory';
import type { LogObject } from '../src/types';

function createLogObject(name: string | undefined, msg = 'test'): LogObject {
	return { time: Date.now(), level: 20, msg, name };
}

describe('filterTransport', () => {
	test('should only pass logs from included names', () => {
		const inner = memoryTransport();
		const transport = filterTransport(inner, { includeNames: ['Mapping', 'Fields'] });

		transport.write(createLogObject('Mapping'));
		transport.write(createLogObject('Fields'));
		transport.write(createLogObject('Other'));

		expect(inner.records.map((r) => r.name)).toEqual(['Mapping', 'Fields']);
	});

	test('should drop logs from excluded names', () => {
		const inner = memoryTransport();
		const transport = filterTransport(inner, { excludeNames: ['Mapping'] });

		transport.write(createLogObject('Mapping'));
		transport.write(createLogObject('Fields'));

		expect(inner.records.map((r) => r.name)).toEqual(['Fields']);
	});

	test('should pass unnamed logs', () => {
		const inner = memoryTransport();
		const transport = filterTransport(inner, { includeNames: ['Mapping'] });

		transport.write(createLogObject(undefined));

		expect(inner.records).toHaveLength(1);
	});

	test('should pass everything when lists are empty', () => {
		const inner = memoryTransport();
		const transport = filterTransport(inner, { includeNames: [], excludeNames: [] });

		transport.write(createLogObject('Anything'));

		expect(inner.records).toHaveLength(1);
	});
});
