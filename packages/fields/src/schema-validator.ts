import { MAPPING_ERROR_KEY, MappingErrors, type ErrorMap, type MappingValidator } from '@fieldmap/mapping';
import { validateSync, type Schema } from '@fieldmap/validation';

/**
 * Mapping validator that checks the whole output against a schema.
 * Failures are keyed by dotted path; root-level failures go under `__mapping__`.
 *
 * @example
 * ```typescript
 * const RangeMapping = new Mapping([field('start').integer(), field('end').integer()], {
 *   validator: schemaValidator(Type.Object({ start: Type.Integer({ minimum: 0 }), end: Type.Integer() }))
 * });
 * ```
 */
export function schemaValidator<T>(schema: Schema<T>): MappingValidator {
	return (output) => {
		const result = validateSync(schema, output);
		if (result.success) {
			return;
		}

		const errors: ErrorMap = {};
		for (const issue of result.errors) {
			const key = issue.path || MAPPING_ERROR_KEY;
			(errors[key] ??= []).push(issue.message);
		}
		throw new MappingErrors(errors);
	};
}
