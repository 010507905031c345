/**
 * Public entry points.
 *
 * Single instance: returns the output or throws MappingErrors.
 * Batch (`{ many: true }`): one independent pass per item, returned as
 * outcomes in input order. A failing item never stops the others; use
 * unwrapOutcomes() to turn a batch back into values-or-throw.
 *
 * @example
 * ```typescript
 * const outcomes = marshal(UserMapping, rows, { many: true });
 * const users = unwrapOutcomes(outcomes); // throws BatchMappingErrors on any failure
 * ```
 */

import { marshalDirection, serializeDirection } from './direction';
import type { Mapping } from './mapping';
import { BatchMappingErrors, MappingFault } from './mapping-errors';
import { MappingIterator, ValidateOnlyIterator } from './mapping-iterator';
import type { BatchPassOptions, MappingData, MappingOutcome, PassOptions } from './types';

const marshalIterator = new MappingIterator(marshalDirection);
const serializeIterator = new MappingIterator(serializeDirection);
const marshalValidator = new ValidateOnlyIterator(marshalDirection);
const serializeValidator = new ValidateOnlyIterator(serializeDirection);

function isIterable(value: unknown): value is Iterable<unknown> {
	return (
		typeof value === 'object' &&
		value !== null &&
		Symbol.iterator in value &&
		typeof value[Symbol.iterator] === 'function'
	);
}

function toBatch(data: unknown): Iterable<unknown> {
	if (!isIterable(data)) {
		throw new MappingFault('Batch input must be an iterable of instances');
	}
	return data;
}

/**
 * Convert external data to the internal shape of `mapping`.
 */
export function marshal(mapping: Mapping, data: unknown, options?: PassOptions): MappingData;
export function marshal(mapping: Mapping, data: Iterable<unknown>, options: BatchPassOptions): MappingOutcome[];
export function marshal(
	mapping: Mapping,
	data: unknown,
	options: PassOptions | BatchPassOptions = {}
): MappingData | MappingOutcome[] {
	return options.many ? marshalIterator.runMany(mapping, toBatch(data)) : marshalIterator.run(mapping, data);
}

/**
 * Convert internal data (records, Maps or class instances) to the external
 * shape of `mapping`.
 */
export function serialize(mapping: Mapping, data: unknown, options?: PassOptions): MappingData;
export function serialize(mapping: Mapping, data: Iterable<unknown>, options: BatchPassOptions): MappingOutcome[];
export function serialize(
	mapping: Mapping,
	data: unknown,
	options: PassOptions | BatchPassOptions = {}
): MappingData | MappingOutcome[] {
	return options.many
		? serializeIterator.runMany(mapping, toBatch(data))
		: serializeIterator.run(mapping, data);
}

/**
 * Check external data against `mapping` without building output.
 */
export function validateForMarshal(mapping: Mapping, data: unknown, options?: PassOptions): void;
export function validateForMarshal(
	mapping: Mapping,
	data: Iterable<unknown>,
	options: BatchPassOptions
): MappingOutcome<undefined>[];
export function validateForMarshal(
	mapping: Mapping,
	data: unknown,
	options: PassOptions | BatchPassOptions = {}
): void | MappingOutcome<undefined>[] {
	if (options.many) {
		return marshalValidator.runMany(mapping, toBatch(data));
	}
	marshalValidator.run(mapping, data);
}

/**
 * Check internal data against `mapping` without building output.
 */
export function validateForSerialize(mapping: Mapping, data: unknown, options?: PassOptions): void;
export function validateForSerialize(
	mapping: Mapping,
	data: Iterable<unknown>,
	options: BatchPassOptions
): MappingOutcome<undefined>[];
export function validateForSerialize(
	mapping: Mapping,
	data: unknown,
	options: PassOptions | BatchPassOptions = {}
): void | MappingOutcome<undefined>[] {
	if (options.many) {
		return serializeValidator.runMany(mapping, toBatch(data));
	}
	serializeValidator.run(mapping, data);
}

/**
 * Values of a fully successful batch.
 *
 * @throws BatchMappingErrors with one error map per item (`{}` for items that succeeded)
 */
export function unwrapOutcomes<T>(outcomes: readonly MappingOutcome<T>[]): T[] {
	const values: T[] = [];
	let failed = false;

	for (const outcome of outcomes) {
		if (outcome.ok) {
			values.push(outcome.value);
		} else {
			failed = true;
		}
	}

	if (failed) {
		throw new BatchMappingErrors(outcomes.map((outcome) => (outcome.ok ? {} : outcome.error.errors)));
	}
	return values;
}
