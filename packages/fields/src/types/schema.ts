import { FieldValidationError } from '@fieldmap/mapping';
import { validateSync, type Schema, type ValidationError } from '@fieldmap/validation';
import { BaseType } from './field-type';

function formatIssue(issue: ValidationError): string {
	return issue.path ? `${issue.path}: ${issue.message}` : issue.message;
}

/**
 * Checks a value against a TypeBox schema (or a Standard Schema / validator
 * function). Marshaling returns the decoded value, so TypeBox transforms
 * apply; serializing returns the value unchanged.
 *
 * @example
 * ```typescript
 * new Field('tags', new SchemaType(Type.Array(Type.String())));
 * ```
 */
export class SchemaType<T = unknown> extends BaseType {
	public constructor(public readonly schema: Schema<T>) {
		super();
	}

	public override validate(value: unknown): void {
		this.check(value);
	}

	public override marshalValue(value: unknown): T {
		return this.check(value);
	}

	private check(value: unknown): T {
		const result = validateSync(this.schema, value);
		if (!result.success) {
			throw new FieldValidationError(result.errors.map(formatIssue));
		}
		return result.data;
	}
}
