import { FieldValidationError, type DirectionName } from '@fieldmap/mapping';

export const INCORRECT_TYPE_MESSAGE = 'This field was of an incorrect type';

/**
 * Type-specific behavior of a field: the check applied to present values and
 * the conversion in each direction. Empty values never reach a FieldType.
 */
export interface FieldType {
	validate(value: unknown, direction: DirectionName): void;
	marshalValue(value: unknown): unknown;
	serializeValue(value: unknown): unknown;
}

/** A FieldType class with a no-argument constructor. */
export type FieldTypeClass = new () => FieldType;

/**
 * Accepts anything, converts nothing.
 */
export class BaseType implements FieldType {
	public validate(_value: unknown): void {}

	public marshalValue(value: unknown): unknown {
		return value;
	}

	public serializeValue(value: unknown): unknown {
		return value;
	}

	protected incorrectType(): never {
		throw new FieldValidationError(INCORRECT_TYPE_MESSAGE);
	}
}
