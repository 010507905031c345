/**
 * Scalar Field Types
 *
 * Scalar types are strict by default. With `{ coerce: true }` the numeric and
 * boolean types also accept string input, and StringType accepts numbers,
 * booleans, bigints and Dates. Values are converted in both directions.
 *
 * @example
 * ```typescript
 * new Field('age', new IntegerType({ coerce: true })); // '42' -> 42
 * new Field('code', new StringType({ coerce: true })); // 7 -> '7'
 * new Field('created', DateTimeType); // '2024-01-01T00:00:00.000Z' <-> Date
 * ```
 */

import { coerceBoolean, coerceDate, coerceInteger, coerceNumber, coerceString } from '../coercion';
import { BaseType } from './field-type';

export interface CoercionOptions {
	/** Accept string input and convert it (default: false) */
	coerce?: boolean;
}

export class StringType extends BaseType {
	private readonly coerce: boolean;

	public constructor(options: CoercionOptions = {}) {
		super();
		this.coerce = options.coerce ?? false;
	}

	public override validate(value: unknown): void {
		if (typeof value === 'string') {
			return;
		}
		if (this.coerce) {
			coerceString(value);
			return;
		}
		this.incorrectType();
	}

	public override marshalValue(value: unknown): unknown {
		return this.coerce ? coerceString(value) : value;
	}

	public override serializeValue(value: unknown): unknown {
		return this.coerce ? coerceString(value) : value;
	}
}

export class IntegerType extends BaseType {
	private readonly coerce: boolean;

	public constructor(options: CoercionOptions = {}) {
		super();
		this.coerce = options.coerce ?? false;
	}

	public override validate(value: unknown): void {
		if (typeof value === 'number') {
			if (!Number.isInteger(value)) this.incorrectType();
			return;
		}
		if (this.coerce && typeof value === 'string') {
			coerceInteger(value);
			return;
		}
		this.incorrectType();
	}

	public override marshalValue(value: unknown): unknown {
		return this.coerce ? coerceInteger(value) : value;
	}

	public override serializeValue(value: unknown): unknown {
		return this.coerce ? coerceInteger(value) : value;
	}
}

export class FloatType extends BaseType {
	private readonly coerce: boolean;

	public constructor(options: CoercionOptions = {}) {
		super();
		this.coerce = options.coerce ?? false;
	}

	public override validate(value: unknown): void {
		if (typeof value === 'number') {
			if (!Number.isFinite(value)) this.incorrectType();
			return;
		}
		if (this.coerce && typeof value === 'string') {
			coerceNumber(value);
			return;
		}
		this.incorrectType();
	}

	public override marshalValue(value: unknown): unknown {
		return this.coerce ? coerceNumber(value) : value;
	}

	public override serializeValue(value: unknown): unknown {
		return this.coerce ? coerceNumber(value) : value;
	}
}

export class BooleanType extends BaseType {
	private readonly coerce: boolean;

	public constructor(options: CoercionOptions = {}) {
		super();
		this.coerce = options.coerce ?? false;
	}

	public override validate(value: unknown): void {
		if (typeof value === 'boolean') {
			return;
		}
		if (this.coerce) {
			coerceBoolean(value);
			return;
		}
		this.incorrectType();
	}

	public override marshalValue(value: unknown): unknown {
		return this.coerce ? coerceBoolean(value) : value;
	}

	public override serializeValue(value: unknown): unknown {
		return this.coerce ? coerceBoolean(value) : value;
	}
}

/**
 * Date-times travel as ISO strings (or millisecond timestamps) externally and
 * as Date objects internally.
 */
export class DateTimeType extends BaseType {
	public override validate(value: unknown): void {
		coerceDate(value);
	}

	public override marshalValue(value: unknown): Date {
		return coerceDate(value);
	}

	public override serializeValue(value: unknown): string {
		return coerceDate(value).toISOString();
	}
}
