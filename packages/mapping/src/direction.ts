/**
 * Direction Strategies
 *
 * One policy object per direction. The iterator asks the strategy which key
 * to read and which key to report errors under. It also delegates validation,
 * coercion, the output-shape check and the write.
 *
 * Output never shares records with the input: a record reached through a
 * `__self__` merge or an earlier field is copied before a nested write.
 *
 * | direction | reads    | writes              | errors keyed by |
 * |-----------|----------|---------------------|-----------------|
 * | marshal   | `name`   | `source` (dotted)   | `source`        |
 * | serialize | `source` | `name` (flat)       | `name`          |
 */

import { DANGEROUS_KEYS } from '@fieldmap/validation';
import { SELF_KEY, isPlainRecord } from './attribute-resolver';
import { FieldValidationError, MappingFault } from './mapping-errors';
import type { DirectionName, MappedField, MappingData } from './types';

/**
 * Records created by one pass. Only these are written into in place.
 */
export type OwnedRecords = WeakSet<MappingData>;

export interface DirectionStrategy {
	readonly name: DirectionName;
	inputKey(field: MappedField): string;
	errorKey(field: MappedField): string;
	validate(field: MappedField, value: unknown): void;
	coerce(field: MappedField, value: unknown): unknown;
	/**
	 * Checks that a coerced value fits the output. Runs in validate-only
	 * passes too.
	 * @throws FieldValidationError
	 */
	check(field: MappedField, value: unknown): void;
	write(output: MappingData, field: MappedField, value: unknown, owned: OwnedRecords): void;
}

/**
 * Own-property write; a `__proto__` key becomes data, not a prototype change.
 */
function setOwn(target: MappingData, key: string, value: unknown): void {
	Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

function checkSegment(segment: string, path: string, key: string): void {
	if (segment === '') {
		throw new MappingFault(`Invalid source path '${path}': empty segment`, { key });
	}
	if (DANGEROUS_KEYS.has(segment)) {
		throw new MappingFault(`Invalid source path '${path}': '${segment}' is a reserved key`, { key });
	}
}

/**
 * Write `value` at a dotted path, creating intermediate records on demand.
 * Fields sharing a prefix merge into one record. An intermediate record not
 * in `owned` is replaced by a copy first, so records the output took from the
 * input are never modified.
 */
export function writePath(
	output: MappingData,
	path: string,
	value: unknown,
	owned: OwnedRecords = new WeakSet([output])
): void {
	const segments = path.split('.');
	const leaf = segments.pop() ?? '';
	let target = output;
	const walked: string[] = [];

	for (const segment of segments) {
		checkSegment(segment, path, path);
		walked.push(segment);
		const existing = target[segment];

		if (existing === undefined) {
			const next: MappingData = {};
			setOwn(target, segment, next);
			owned.add(next);
			target = next;
		} else if (isPlainRecord(existing) && owned.has(existing)) {
			target = existing;
		} else if (isPlainRecord(existing)) {
			const copy: MappingData = { ...existing };
			setOwn(target, segment, copy);
			owned.add(copy);
			target = copy;
		} else {
			throw new MappingFault(
				`Cannot write '${path}': '${walked.join('.')}' already holds a non-object value`,
				{ key: path }
			);
		}
	}

	checkSegment(leaf, path, path);
	setOwn(target, leaf, value);
}

/**
 * Entries a `__self__` value contributes to the top level.
 * @throws FieldValidationError when the value is neither a Map nor a plain record
 */
function mergeEntries(value: unknown): [string, unknown][] {
	if (value instanceof Map) {
		return Array.from(value, ([key, entry]): [string, unknown] => [String(key), entry]);
	}
	if (!isPlainRecord(value)) {
		throw new FieldValidationError('Expected an object to merge into the output');
	}
	return Object.entries(value);
}

/**
 * External (source-keyed) data -> internal shape.
 */
export const marshalDirection: DirectionStrategy = {
	name: 'marshal',

	inputKey: (field) => field.name,
	errorKey: (field) => field.source,

	validate(field, value) {
		field.validateForMarshal(value);
	},

	coerce(field, value) {
		return field.marshalValue(value);
	},

	check(field, value) {
		if (field.source === SELF_KEY) {
			mergeEntries(value);
		}
	},

	write(output, field, value, owned) {
		if (field.source !== SELF_KEY) {
			writePath(output, field.source, value, owned);
			return;
		}
		// Merged values keep their identity; writePath copies them on demand
		for (const [key, entry] of mergeEntries(value)) {
			setOwn(output, key, entry);
		}
	}
};

/**
 * Internal (attribute-style) data -> external, name-keyed shape.
 */
export const serializeDirection: DirectionStrategy = {
	name: 'serialize',

	inputKey: (field) => field.source,
	errorKey: (field) => field.name,

	validate(field, value) {
		field.validateForSerialize(value);
	},

	coerce(field, value) {
		return field.serializeValue(value);
	},

	// Flat keys take any value
	check() {},

	write(output, field, value) {
		setOwn(output, field.name, value);
	}
};
