import { Type, Kind, type Static, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { Json } from './json';

// Re-export TypeBox for convenience
export { Type, Type as t, Value };
export type { Static, TSchema };

/**
 * Standard Schema interface for library-agnostic validation.
 * TypeBox is the primary schema library; any synchronous Standard Schema
 * vendor works in its place.
 */
export interface StandardSchema<T = unknown> {
	'~standard': {
		version: 1;
		vendor: string;
		validate: (value: unknown) => { value: T } | { issues: StandardSchemaIssue[] };
	};
}

export interface StandardSchemaIssue {
	message: string;
	path?: (string | number)[];
}

/**
 * Custom validator function type.
 * Return the validated/transformed data, or throw an error to fail validation.
 * Mapping passes are synchronous, so validators must be too.
 */
export type Validator<T = unknown> = (data: unknown) => T;

/**
 * Schema type that can be TypeBox, Standard Schema, or custom validator.
 */
export type Schema<T = unknown> = TSchema | StandardSchema<T> | Validator<T>;

export type ValidationResult<T> = { success: true; data: T } | { success: false; errors: ValidationError[] };

export interface ValidationError {
	/** Dotted path to the offending value ('' for the root) */
	path: string;
	message: string;
	value?: unknown;
}

export function isValidator(schema: unknown): schema is Validator {
	return typeof schema === 'function';
}

export function isStandardSchema(schema: unknown): schema is StandardSchema {
	return typeof schema === 'object' && schema !== null && '~standard' in schema;
}

export function isTypeBoxSchema(schema: unknown): schema is TSchema {
	return typeof schema === 'object' && schema !== null && Kind in schema;
}

/**
 * Convert a JSON pointer ('/user/company/0') into a dotted path ('user.company.0').
 */
export function pointerToPath(pointer: string): string {
	return pointer
		.split('/')
		.filter((segment) => segment !== '')
		.map((segment) => segment.replace(/~1/g, '/').replace(/~0/g, '~'))
		.join('.');
}

/**
 * Validate data against a schema (TypeBox, Standard Schema, or custom validator).
 *
 * @throws Error if the schema is none of the supported kinds
 */
export function validateSync<T>(schema: Schema<T>, data: unknown): ValidationResult<T> {
	if (isValidator(schema)) {
		return validateCustom(schema, data);
	}

	if (isStandardSchema(schema)) {
		return validateStandardSchema(schema, data);
	}

	if (isTypeBoxSchema(schema)) {
		return validateTypeBox<T>(schema, data);
	}

	throw new Error('Unknown schema type');
}

function validateCustom<T>(validator: Validator<T>, data: unknown): ValidationResult<T> {
	try {
		return { success: true, data: validator(data) };
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		return { success: false, errors: [{ path: '', message }] };
	}
}

function validateTypeBox<T>(schema: TSchema, data: unknown): ValidationResult<T> {
	// Strip __proto__, constructor and prototype keys before checking
	const sanitized = Json.sanitize(data);

	const errors = [...Value.Errors(schema, sanitized)];

	if (errors.length === 0) {
		// Apply transforms
		const decoded = Value.Decode(schema, sanitized);
		return { success: true, data: decoded as T };
	}

	return {
		success: false,
		errors: errors.map((err) => ({
			path: pointerToPath(err.path),
			message: err.message,
			value: err.value
		}))
	};
}

function validateStandardSchema<T>(schema: StandardSchema<T>, data: unknown): ValidationResult<T> {
	const result = schema['~standard'].validate(data);

	if ('value' in result) {
		return { success: true, data: result.value };
	}

	return {
		success: false,
		errors: result.issues.map((issue) => ({
			path: issue.path?.join('.') ?? '',
			message: issue.message
		}))
	};
}
