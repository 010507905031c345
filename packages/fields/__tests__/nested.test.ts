import { describe, test, expect } from 'vitest';
import { Mapping, MappingErrors, marshal, serialize, validateForMarshal } from '@fieldmap/mapping';
import { field } from '../src/field-builder';

function captureErrors(fn: () => unknown): Record<string, string[]> {
	try {
		fn();
	} catch (error) {
		if (error instanceof MappingErrors) {
			return error.errors;
		}
		throw error;
	}
	throw new Error('Expected MappingErrors');
}

const CompanyMapping = new Mapping([field('name').string(), field('founded').dateTime().optional()]);

const UserMapping = new Mapping([field('id').integer(), field('company').nested(CompanyMapping)]);

const TeamMapping = new Mapping([field('companies').nested(CompanyMapping, { many: true })]);

class Company {
	public constructor(
		public readonly name: string,
		public readonly founded: Date | null = null
	) {}
}

describe('NestedType', () => {
	test('should marshal nested instances through the inner mapping', () => {
		expect(marshal(UserMapping, { id: 1, company: { name: 'Acme', founded: '1999-12-31T00:00:00.000Z' } })).toEqual({
			id: 1,
			company: { name: 'Acme', founded: new Date(Date.UTC(1999, 11, 31)) }
		});
	});

	test('should serialize nested class instances', () => {
		expect(serialize(UserMapping, { id: 1, company: new Company('Acme', new Date(Date.UTC(2001, 0, 1))) })).toEqual({
			id: 1,
			company: { name: 'Acme', founded: '2001-01-01T00:00:00.000Z' }
		});
	});

	test('should surface inner errors as key-prefixed messages', () => {
		expect(captureErrors(() => marshal(UserMapping, { id: 1, company: {} }))).toEqual({
			company: ['name: This is a required field']
		});
	});

	test('should report outer and inner failures together', () => {
		expect(captureErrors(() => marshal(UserMapping, { id: 'x', company: { name: 5 } }))).toEqual({
			id: ['This field was of an incorrect type'],
			company: ['name: This field was of an incorrect type']
		});
	});

	test('should reject values that are not instances', () => {
		expect(captureErrors(() => marshal(UserMapping, { id: 1, company: 'Acme' }))).toEqual({
			company: ['This field was of an incorrect type']
		});
		expect(captureErrors(() => marshal(UserMapping, { id: 1, company: [{ name: 'Acme' }] }))).toEqual({
			company: ['This field was of an incorrect type']
		});
	});

	test('should run nested checks in validate-only passes', () => {
		expect(captureErrors(() => validateForMarshal(UserMapping, { id: 1, company: {} }))).toEqual({
			company: ['name: This is a required field']
		});
	});

	describe('many', () => {
		test('should map every item', () => {
			expect(marshal(TeamMapping, { companies: [{ name: 'Acme' }, { name: 'Globex' }] })).toEqual({
				companies: [
					{ name: 'Acme', founded: null },
					{ name: 'Globex', founded: null }
				]
			});
		});

		test('should prefix item errors with the index', () => {
			expect(captureErrors(() => marshal(TeamMapping, { companies: [{ name: 'Acme' }, {}, 5] }))).toEqual({
				companies: ['1.name: This is a required field', '2: This field was of an incorrect type']
			});
		});

		test('should require an array', () => {
			expect(captureErrors(() => marshal(TeamMapping, { companies: { name: 'Acme' } }))).toEqual({
				companies: ['This field was of an incorrect type']
			});
		});

		test('should map an empty array', () => {
			expect(marshal(TeamMapping, { companies: [] })).toEqual({ companies: [] });
		});
	});
});
