import { describe, test, expect } from 'vitest';
import { FieldValidationError } from '@fieldmap/mapping';
import { BaseType, INCORRECT_TYPE_MESSAGE } from '../src/types/field-type';
import { BooleanType, DateTimeType, FloatType, IntegerType, StringType } from '../src/types/scalar';

describe('field types', () => {
	test('incorrect type message', () => {
		expect(INCORRECT_TYPE_MESSAGE).toBe('This field was of an incorrect type');
	});

	describe('BaseType', () => {
		test('should accept anything and convert nothing', () => {
			const type = new BaseType();
			const value = { a: 1 };

			expect(() => type.validate(value)).not.toThrow();
			expect(type.marshalValue(value)).toBe(value);
			expect(type.serializeValue(value)).toBe(value);
		});
	});

	describe('StringType', () => {
		test('should accept strings only', () => {
			const type = new StringType();

			expect(() => type.validate('foo')).not.toThrow();
			expect(() => type.validate(1)).toThrow(INCORRECT_TYPE_MESSAGE);
			expect(() => type.validate(['foo'])).toThrow(FieldValidationError);
		});

		test('should leave values unchanged without coerce', () => {
			expect(new StringType().marshalValue(7)).toBe(7);
		});

		test('should accept and stringify scalars with coerce', () => {
			const type = new StringType({ coerce: true });

			expect(() => type.validate(7)).not.toThrow();
			expect(type.marshalValue(7)).toBe('7');
			expect(type.marshalValue(true)).toBe('true');
			expect(type.serializeValue(new Date(Date.UTC(2024, 0, 2)))).toBe('2024-01-02T00:00:00.000Z');
		});

		test('should report coercion failures with coerce', () => {
			const type = new StringType({ coerce: true });

			expect(() => type.validate({ a: 1 })).toThrow(
				'unsupported type for string coercion - expected string, got: {"a":1}'
			);
			expect(() => type.validate(['foo'])).toThrow(FieldValidationError);
		});
	});

	describe('IntegerType', () => {
		test('should accept integers only by default', () => {
			const type = new IntegerType();

			expect(() => type.validate(1)).not.toThrow();
			expect(() => type.validate(-3)).not.toThrow();
			expect(() => type.validate(1.5)).toThrow(INCORRECT_TYPE_MESSAGE);
			expect(() => type.validate('1')).toThrow(INCORRECT_TYPE_MESSAGE);
			expect(() => type.validate(true)).toThrow(INCORRECT_TYPE_MESSAGE);
		});

		test('should leave values unchanged without coerce', () => {
			expect(new IntegerType().marshalValue('42')).toBe('42');
		});

		test('should accept and convert numeric strings with coerce', () => {
			const type = new IntegerType({ coerce: true });

			expect(() => type.validate('42')).not.toThrow();
			expect(type.marshalValue('42')).toBe(42);
			expect(type.serializeValue(42)).toBe(42);
		});

		test('should report coercion failures with coerce', () => {
			const type = new IntegerType({ coerce: true });

			expect(() => type.validate('abc')).toThrow('coercion failed - expected number, got: "abc"');
			expect(() => type.validate('1.5')).toThrow('not an integer');
			expect(() => type.validate(false)).toThrow(INCORRECT_TYPE_MESSAGE);
		});
	});

	describe('FloatType', () => {
		test('should accept finite numbers', () => {
			const type = new FloatType();

			expect(() => type.validate(1.5)).not.toThrow();
			expect(() => type.validate(Number.NaN)).toThrow(INCORRECT_TYPE_MESSAGE);
			expect(() => type.validate(Infinity)).toThrow(INCORRECT_TYPE_MESSAGE);
			expect(() => type.validate('1.5')).toThrow(INCORRECT_TYPE_MESSAGE);
		});

		test('should convert numeric strings with coerce', () => {
			const type = new FloatType({ coerce: true });

			expect(() => type.validate('2.5')).not.toThrow();
			expect(type.marshalValue('2.5')).toBe(2.5);
		});
	});

	describe('BooleanType', () => {
		test('should accept booleans only by default', () => {
			const type = new BooleanType();

			expect(() => type.validate(false)).not.toThrow();
			expect(() => type.validate('true')).toThrow(INCORRECT_TYPE_MESSAGE);
			expect(() => type.validate(0)).toThrow(INCORRECT_TYPE_MESSAGE);
		});

		test('should convert boolean words with coerce', () => {
			const type = new BooleanType({ coerce: true });

			expect(type.marshalValue('yes')).toBe(true);
			expect(type.serializeValue(0)).toBe(false);
			expect(() => type.validate('maybe')).toThrow('coercion failed - expected boolean, got: "maybe"');
		});
	});

	describe('DateTimeType', () => {
		const type = new DateTimeType();
		const iso = '2024-03-01T12:00:00.000Z';

		test('should marshal ISO strings and timestamps to Dates', () => {
			expect(type.marshalValue(iso).getTime()).toBe(Date.UTC(2024, 2, 1, 12));
			expect(type.marshalValue(Date.UTC(2024, 2, 1, 12)).toISOString()).toBe(iso);
		});

		test('should serialize Dates to ISO strings', () => {
			expect(type.serializeValue(new Date(Date.UTC(2024, 2, 1, 12)))).toBe(iso);
		});

		test('should reject values that are not dates', () => {
			expect(() => type.validate(iso)).not.toThrow();
			expect(() => type.validate('yesterday')).toThrow('invalid date string - expected date, got: "yesterday"');
			expect(() => type.validate(true)).toThrow('unsupported type for date coercion');
		});
	});
});
