/**
 * Nested Field Type
 *
 * Maps a value through another Mapping. Failures of the inner mapping become
 * messages of the outer field, prefixed with the inner key:
 *
 * ```
 * { company: ['name: This is a required field'] }
 * ```
 *
 * With `{ many: true }` the value must be an array and keys are prefixed with
 * the item index (`'1.name: ...'`).
 */

import {
	FieldValidationError,
	MappingErrors,
	flattenErrorMap,
	marshal,
	serialize,
	validateForMarshal,
	validateForSerialize,
	type DirectionName,
	type Mapping
} from '@fieldmap/mapping';
import { INCORRECT_TYPE_MESSAGE, type FieldType } from './field-type';

export interface NestedTypeOptions {
	/** Value is an array of instances (default: false) */
	many?: boolean;
}

function isInstance(value: unknown): boolean {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class NestedType implements FieldType {
	public readonly many: boolean;

	public constructor(
		public readonly mapping: Mapping,
		options: NestedTypeOptions = {}
	) {
		this.many = options.many ?? false;
	}

	public validate(value: unknown, direction: DirectionName): void {
		this.apply(value, (item) => {
			if (direction === 'marshal') {
				validateForMarshal(this.mapping, item);
			} else {
				validateForSerialize(this.mapping, item);
			}
		});
	}

	public marshalValue(value: unknown): unknown {
		return this.apply(value, (item) => marshal(this.mapping, item));
	}

	public serializeValue(value: unknown): unknown {
		return this.apply(value, (item) => serialize(this.mapping, item));
	}

	private apply(value: unknown, pass: (item: unknown) => unknown): unknown {
		if (!this.many) {
			if (!isInstance(value)) {
				throw new FieldValidationError(INCORRECT_TYPE_MESSAGE);
			}
			try {
				return pass(value);
			} catch (error) {
				if (error instanceof MappingErrors) {
					throw new FieldValidationError(flattenErrorMap(error.errors));
				}
				throw error;
			}
		}

		if (!Array.isArray(value)) {
			throw new FieldValidationError(INCORRECT_TYPE_MESSAGE);
		}

		const results: unknown[] = [];
		const messages: string[] = [];
		value.forEach((item: unknown, index) => {
			if (!isInstance(item)) {
				messages.push(`${index}: ${INCORRECT_TYPE_MESSAGE}`);
				return;
			}
			try {
				results.push(pass(item));
			} catch (error) {
				if (!(error instanceof MappingErrors)) {
					throw error;
				}
				for (const line of flattenErrorMap(error.errors)) {
					messages.push(`${index}.${line}`);
				}
			}
		});

		if (messages.length > 0) {
			throw new FieldValidationError(messages);
		}
		return results;
	}
}
