export { BaseType, INCORRECT_TYPE_MESSAGE, type FieldType, type FieldTypeClass } from './field-type';
export {
	StringType,
	IntegerType,
	FloatType,
	BooleanType,
	DateTimeType,
	type CoercionOptions
} from './scalar';
export { SchemaType } from './schema';
export { NestedType, type NestedTypeOptions } from './nested';
