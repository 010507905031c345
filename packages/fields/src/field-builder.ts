/**
 * Field Builder
 *
 * Name first, then the type.
 *
 * @example
 * ```typescript
 * const UserMapping = new Mapping([
 *   field('id').integer(),
 *   field('name').string().withSource('user.name'),
 *   field('signup').dateTime().optional(),
 *   field('tags').schema(Type.Array(Type.String())),
 *   field('company').nested(CompanyMapping)
 * ]);
 * ```
 */

import type { Mapping } from '@fieldmap/mapping';
import type { Schema } from '@fieldmap/validation';
import { Field } from './field';
import type { FieldType, FieldTypeClass } from './types/field-type';
import { NestedType, type NestedTypeOptions } from './types/nested';
import { BooleanType, DateTimeType, FloatType, IntegerType, StringType, type CoercionOptions } from './types/scalar';
import { SchemaType } from './types/schema';

export interface FieldTypeBuilder {
	string(options?: CoercionOptions): Field;
	integer(options?: CoercionOptions): Field;
	float(options?: CoercionOptions): Field;
	boolean(options?: CoercionOptions): Field;
	dateTime(): Field;
	schema<T>(schema: Schema<T>): Field;
	nested(mapping: Mapping, options?: NestedTypeOptions): Field;
	of(type: FieldType | FieldTypeClass): Field;
}

class FieldTypeBuilderInternal implements FieldTypeBuilder {
	public constructor(private readonly name: string) {}

	public string(options?: CoercionOptions): Field {
		return this.of(new StringType(options));
	}

	public integer(options?: CoercionOptions): Field {
		return this.of(new IntegerType(options));
	}

	public float(options?: CoercionOptions): Field {
		return this.of(new FloatType(options));
	}

	public boolean(options?: CoercionOptions): Field {
		return this.of(new BooleanType(options));
	}

	public dateTime(): Field {
		return this.of(DateTimeType);
	}

	public schema<T>(schema: Schema<T>): Field {
		return this.of(new SchemaType(schema));
	}

	public nested(mapping: Mapping, options?: NestedTypeOptions): Field {
		return this.of(new NestedType(mapping, options));
	}

	public of(type: FieldType | FieldTypeClass): Field {
		return new Field(this.name, type);
	}
}

/**
 * Start a field definition. The name is the internal key; chain
 * `.withSource()` to read from or write to a different external key.
 */
export function field(name: string): FieldTypeBuilder {
	return new FieldTypeBuilderInternal(name);
}
