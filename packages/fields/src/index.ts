/**
 * Field implementations for @fieldmap/mapping.
 *
 * @example
 * ```typescript
 * import { Mapping, marshal } from '@fieldmap/mapping';
 * import { field } from '@fieldmap/fields';
 *
 * const UserMapping = new Mapping([field('name').string(), field('id').integer()]);
 * marshal(UserMapping, { name: 'foo', id: 1 });
 * ```
 */

export { Field, FieldDefinitionError, REQUIRED_MESSAGE, type FieldOptions, type FieldDefinition } from './field';
export { field, type FieldTypeBuilder } from './field-builder';
export { schemaValidator } from './schema-validator';
export { coerceString, coerceNumber, coerceInteger, coerceBoolean, coerceDate } from './coercion';
export {
	BaseType,
	StringType,
	IntegerType,
	FloatType,
	BooleanType,
	DateTimeType,
	SchemaType,
	NestedType,
	INCORRECT_TYPE_MESSAGE,
	type FieldType,
	type FieldTypeClass,
	type CoercionOptions,
	type NestedTypeOptions
} from './types/index';
