export {
	Type,
	t,
	Value,
	validateSync,
	pointerToPath,
	isValidator,
	isStandardSchema,
	isTypeBoxSchema
} from './types';

export type {
	Static,
	TSchema,
	StandardSchema,
	StandardSchemaIssue,
	Validator,
	Schema,
	ValidationResult,
	ValidationError
} from './types';

// Safe JSON parsing with prototype pollution protection
export { Json, DANGEROUS_KEYS } from './json';
