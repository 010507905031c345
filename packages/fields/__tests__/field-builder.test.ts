import { describe, test, expect } from 'vitest';
import { Mapping } from '@fieldmap/mapping';
import { Type } from '@fieldmap/validation';
import { field } from '../src/field-builder';
import { Field } from '../src/field';
import { BaseType } from '../src/types/field-type';
import { NestedType } from '../src/types/nested';
import { BooleanType, DateTimeType, FloatType, IntegerType, StringType } from '../src/types/scalar';
import { SchemaType } from '../src/types/schema';

describe('field builders', () => {
	test('field().string() should create a required string field', () => {
		const f = field('display_name').string();

		expect(f).toBeInstanceOf(Field);
		expect(f.name).toBe('display_name');
		expect(f.source).toBe('display_name');
		expect(f.required).toBe(true);
		expect(f.type).toBeInstanceOf(StringType);
	});

	test('field().string() should pass coercion options', () => {
		const f = field('code').string({ coerce: true });

		expect(f.type).toBeInstanceOf(StringType);
		expect(f.marshalValue(42)).toBe('42');
		expect(f.serializeValue(42)).toBe('42');
	});

	test('field().integer() should pass coercion options', () => {
		const f = field('age').integer({ coerce: true });

		expect(f.type).toBeInstanceOf(IntegerType);
		expect(f.marshalValue('30')).toBe(30);
	});

	test('field().float() should create a float field', () => {
		expect(field('score').float().type).toBeInstanceOf(FloatType);
	});

	test('field().boolean() should create a boolean field', () => {
		const f = field('is_active').boolean({ coerce: true });

		expect(f.type).toBeInstanceOf(BooleanType);
		expect(f.marshalValue('false')).toBe(false);
	});

	test('field().dateTime() should create a date-time field', () => {
		expect(field('created_at').dateTime().type).toBeInstanceOf(DateTimeType);
	});

	test('field().schema() should wrap the schema', () => {
		const schema = Type.Array(Type.String());
		const f = field('tags').schema(schema);

		expect(f.type).toBeInstanceOf(SchemaType);
		if (f.type instanceof SchemaType) {
			expect(f.type.schema).toBe(schema);
		}
	});

	test('field().nested() should wrap the mapping', () => {
		const company = new Mapping();
		const f = field('companies').nested(company, { many: true });

		expect(f.type).toBeInstanceOf(NestedType);
		if (f.type instanceof NestedType) {
			expect(f.type.mapping).toBe(company);
			expect(f.type.many).toBe(true);
		}
	});

	test('field().of() should accept a type class or instance', () => {
		const type = new BaseType();

		expect(field('metadata').of(BaseType).type).toBeInstanceOf(BaseType);
		expect(field('metadata').of(type).type).toBe(type);
	});

	test('should chain modifiers', () => {
		const f = field('nickname').string().optional().withDefault('Anonymous').withSource('profile.nickname');

		expect(f.required).toBe(false);
		expect(f.default).toBe('Anonymous');
		expect(f.source).toBe('profile.nickname');
		expect(f.name).toBe('nickname');
	});
});
