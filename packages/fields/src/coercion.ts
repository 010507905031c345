/**
 * Type Coercion Functions
 *
 * Each function returns the coerced value or throws FieldValidationError
 * describing what was expected and what arrived.
 *
 * @example
 * ```typescript
 * coerceNumber('25');            // -> 25
 * coerceNumber('abc');           // throws: coercion failed - expected number, got: "abc"
 * coerceInteger('2.5');          // throws: not an integer - expected integer, got: "2.5"
 * coerceDate('2024-01-01');      // -> Date
 * coerceBoolean('false');        // -> false
 * ```
 */

import { FieldValidationError } from '@fieldmap/mapping';

function formatValue(value: unknown): string {
	if (value === null) {
		return 'null';
	}
	if (typeof value === 'string') {
		return `"${value}"`;
	}
	if (typeof value === 'object') {
		try {
			return JSON.stringify(value);
		} catch {
			return '[object]';
		}
	}
	return String(value);
}

/**
 * `[reason] - expected [type], got: [value]`; the value part is left out for undefined.
 */
function coercionError(reason: string, expectedType: string, value: unknown): FieldValidationError {
	let message = `${reason} - expected ${expectedType}`;
	if (value !== undefined) {
		message += `, got: ${formatValue(value)}`;
	}
	return new FieldValidationError(message);
}

/**
 * Coerce a value to a finite number. Accepts numbers and numeric strings.
 *
 * @throws FieldValidationError for null, undefined, empty strings and anything that is not numeric
 */
export function coerceNumber(value: unknown): number {
	if (value === null || value === undefined) {
		throw coercionError('cannot coerce null/undefined', 'number', value);
	}

	if (typeof value === 'number') {
		if (!Number.isFinite(value)) {
			throw coercionError('value is not finite', 'number', value);
		}
		return value;
	}

	if (typeof value === 'string') {
		if (value.trim() === '') {
			throw coercionError('cannot coerce empty string', 'number', value);
		}
		const num = Number(value);
		if (!Number.isFinite(num)) {
			throw coercionError('coercion failed', 'number', value);
		}
		return num;
	}

	throw coercionError('unsupported type for number coercion', 'number', value);
}

/**
 * Coerce a value to an integer. Numeric strings with a fractional part are rejected.
 */
export function coerceInteger(value: unknown): number {
	const num = coerceNumber(value);
	if (!Number.isInteger(num)) {
		throw coercionError('not an integer', 'integer', value);
	}
	return num;
}

/**
 * Coerce a value to a Date.
 * Accepts Date objects, millisecond timestamps and date strings (ISO 8601 or
 * anything `new Date()` parses).
 */
export function coerceDate(value: unknown): Date {
	if (value === null || value === undefined) {
		throw coercionError('cannot coerce null/undefined', 'date', value);
	}

	// Already a Date - return as-is
	if (value instanceof Date) {
		if (Number.isNaN(value.getTime())) {
			throw coercionError('invalid Date object', 'date', value);
		}
		return value;
	}

	if (value === '') {
		throw coercionError('cannot coerce empty string', 'date', value);
	}

	if (typeof value === 'number') {
		const date = new Date(value);
		if (Number.isNaN(date.getTime())) {
			throw coercionError('invalid timestamp', 'date', value);
		}
		return date;
	}

	if (typeof value === 'string') {
		const date = new Date(value);
		if (Number.isNaN(date.getTime())) {
			throw coercionError('invalid date string', 'date', value);
		}
		return date;
	}

	throw coercionError('unsupported type for date coercion', 'date', value);
}

const TRUE_STRINGS: ReadonlySet<string> = new Set(['true', '1', 'yes', 'on']);
const FALSE_STRINGS: ReadonlySet<string> = new Set(['false', '0', 'no', 'off']);

/**
 * Coerce a value to a boolean.
 * - booleans as-is
 * - 1 and 0
 * - 'true'/'false', '1'/'0', 'yes'/'no', 'on'/'off' (case-insensitive)
 */
export function coerceBoolean(value: unknown): boolean {
	if (typeof value === 'boolean') {
		return value;
	}

	if (value === 1 || value === 0) {
		return value === 1;
	}

	if (typeof value === 'string') {
		const normalized = value.trim().toLowerCase();
		if (TRUE_STRINGS.has(normalized)) return true;
		if (FALSE_STRINGS.has(normalized)) return false;
	}

	throw coercionError('coercion failed', 'boolean', value);
}

/**
 * Coerce a value to a string. Numbers, booleans and bigints are stringified,
 * Dates become ISO strings.
 */
export function coerceString(value: unknown): string {
	if (value === null || value === undefined) {
		throw coercionError('cannot coerce null/undefined', 'string', value);
	}

	if (typeof value === 'string') {
		return value;
	}

	if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
		return String(value);
	}

	if (value instanceof Date) {
		return coerceDate(value).toISOString();
	}

	throw coercionError('unsupported type for string coercion', 'string', value);
}
