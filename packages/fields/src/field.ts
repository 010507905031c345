/**
 * Field
 *
 * Concrete MappedField: handles required/optional checks and empty values,
 * then delegates type checks and conversion to a FieldType.
 *
 * Fields are immutable; optional(), withDefault() and withSource() return
 * new instances.
 *
 * @example
 * ```typescript
 * const id = new Field('id', IntegerType);
 * const name = new Field('name', StringType, { source: 'user.name' });
 * const nickname = field('nickname').string().optional().withDefault('anon');
 * ```
 */

import {
	FieldValidationError,
	MappingError,
	isEmptyValue,
	type DirectionName,
	type MappedField
} from '@fieldmap/mapping';
import type { FieldType, FieldTypeClass } from './types/field-type';

export const REQUIRED_MESSAGE = 'This is a required field';

export interface FieldOptions {
	/** External key or dotted path (default: the field name) */
	source?: string;
	/** Substituted when the value is empty */
	default?: unknown;
	/** Default: true */
	required?: boolean;
}

export interface FieldDefinition extends FieldOptions {
	name?: string;
	type: FieldType | FieldTypeClass;
}

/**
 * A field was declared with an unusable name or source.
 */
export class FieldDefinitionError extends MappingError {
	public override readonly name: string = 'FieldDefinitionError';
}

function isFieldTypeClass(type: FieldType | FieldTypeClass): type is FieldTypeClass {
	return typeof type === 'function';
}

export class Field implements MappedField {
	public readonly name: string;
	public readonly source: string;
	public readonly default: unknown;
	public readonly required: boolean;
	public readonly type: FieldType;

	public constructor(name: string, type: FieldType | FieldTypeClass, options: FieldOptions = {}) {
		if (name === '') {
			throw new FieldDefinitionError('Field name must not be empty');
		}
		if (options.source === '') {
			throw new FieldDefinitionError(`Field '${name}' has an empty source`);
		}

		this.name = name;
		this.source = options.source ?? name;
		this.default = options.default;
		this.required = options.required ?? true;
		this.type = isFieldTypeClass(type) ? new type() : type;
	}

	/**
	 * Build a field from a definition where either `name` or `source` may be
	 * omitted; each defaults to the other.
	 *
	 * @throws FieldDefinitionError when neither is given
	 */
	public static fromOptions(definition: FieldDefinition): Field {
		const name = definition.name ?? definition.source;
		if (name === undefined) {
			throw new FieldDefinitionError('Field requires a name or a source');
		}

		return new Field(name, definition.type, {
			source: definition.source ?? name,
			default: definition.default,
			required: definition.required
		});
	}

	public validateForMarshal(value: unknown): void {
		this.validate(value, 'marshal');
	}

	public validateForSerialize(value: unknown): void {
		this.validate(value, 'serialize');
	}

	public marshalValue(value: unknown): unknown {
		return value === null || value === undefined ? value : this.type.marshalValue(value);
	}

	public serializeValue(value: unknown): unknown {
		return value === null || value === undefined ? value : this.type.serializeValue(value);
	}

	/**
	 * Fail validation of this field with `message`.
	 */
	public invalid(message: string): never {
		throw new FieldValidationError(message, { key: this.source });
	}

	public optional(): Field {
		return new Field(this.name, this.type, { ...this.options(), required: false });
	}

	public withDefault(value: unknown): Field {
		return new Field(this.name, this.type, { ...this.options(), default: value });
	}

	public withSource(source: string): Field {
		return new Field(this.name, this.type, { ...this.options(), source });
	}

	private validate(value: unknown, direction: DirectionName): void {
		if (isEmptyValue(value)) {
			if (this.required) {
				this.invalid(REQUIRED_MESSAGE);
			}
			return;
		}
		this.type.validate(value, direction);
	}

	private options(): FieldOptions {
		return { source: this.source, default: this.default, required: this.required };
	}
}
