/**
 * Mapping Iterators
 *
 * A pass visits every field of a mapping in order. Field failures are
 * collected, never fatal to the pass; once every field has been attempted the
 * pass either returns its output or throws one MappingErrors.
 *
 * MappingIterator builds output. ValidateOnlyIterator runs the same checks and
 * discards it. Both share traverse() and differ only in what they do with a
 * successful field.
 */

import { isEmptyValue, resolveAttribute } from './attribute-resolver';
import type { DirectionStrategy, OwnedRecords } from './direction';
import type { Mapping } from './mapping';
import { FieldValidationError, MappingErrors, MappingFault, flattenErrorMap } from './mapping-errors';
import type { ErrorMap, FieldResult, MappedField, MappingData, MappingOutcome } from './types';

/** Error key used when a mapping validator fails without naming a field. */
export const MAPPING_ERROR_KEY = '__mapping__';

type FieldSink = (field: MappedField, value: unknown) => void;

/**
 * Accumulates messages per key, preserving first-failure order.
 */
class ErrorCollector {
	private readonly entries = new Map<string, string[]>();

	public add(key: string, messages: readonly string[]): void {
		const existing = this.entries.get(key);
		if (existing) {
			existing.push(...messages);
		} else {
			this.entries.set(key, [...messages]);
		}
	}

	public get empty(): boolean {
		return this.entries.size === 0;
	}

	public toErrorMap(): ErrorMap {
		return Object.fromEntries(this.entries);
	}
}

function failureMessages(error: unknown): string[] | null {
	if (error instanceof FieldValidationError) return error.messages;
	if (error instanceof MappingErrors) return flattenErrorMap(error.errors);
	return null;
}

/**
 * Resolve, validate and coerce one field.
 *
 * An absent value on an optional field skips validation and coercion; the
 * field's default (coerced) or null stands in. An empty value that passed
 * validation is replaced by the default when one is set. The result then has
 * to pass the direction's output check.
 */
export function processField(field: MappedField, data: unknown, direction: DirectionStrategy): FieldResult {
	const raw = resolveAttribute(data, direction.inputKey(field));
	const hasDefault = field.default !== undefined;

	try {
		let value: unknown;
		if ((raw === null || raw === undefined) && !field.required) {
			value = hasDefault ? direction.coerce(field, field.default) : null;
		} else {
			direction.validate(field, raw);
			value = direction.coerce(field, isEmptyValue(raw) && hasDefault ? field.default : raw);
		}
		direction.check(field, value);
		return { ok: true, value };
	} catch (error) {
		const messages = failureMessages(error);
		if (!messages) {
			throw error;
		}
		return { ok: false, key: direction.errorKey(field), messages };
	}
}

function traverse(
	mapping: Mapping,
	data: unknown,
	direction: DirectionStrategy,
	sink: FieldSink | null
): ErrorCollector {
	const errors = new ErrorCollector();

	for (const field of mapping) {
		const key = direction.errorKey(field);
		try {
			const result = processField(field, data, direction);
			if (result.ok) {
				sink?.(field, result.value);
			} else {
				errors.add(result.key, result.messages);
			}
		} catch (error) {
			// Writer errors and faults from field logic
			const messages = failureMessages(error);
			if (!messages) {
				throw normalizeFault(mapping, direction, key, error);
			}
			errors.add(key, messages);
		}
	}

	return errors;
}

function normalizeFault(mapping: Mapping, direction: DirectionStrategy, key: string, error: unknown): MappingFault {
	if (error instanceof MappingFault) {
		return error;
	}

	const reason = error instanceof Error ? error.message : String(error);
	const fault = new MappingFault(`Unexpected error in field '${key}' during ${direction.name}: ${reason}`, {
		key,
		cause: error
	});
	mapping.logger.error('Field raised an unexpected error', {
		direction: direction.name,
		field: key,
		error
	});
	return fault;
}

function logPass(mapping: Mapping, direction: DirectionStrategy, errors: ErrorMap | null): void {
	if (!mapping.logger.isLevelEnabled('debug')) {
		return;
	}
	if (errors) {
		mapping.logger.debug('Mapping pass failed', {
			direction: direction.name,
			errors
		});
	} else {
		mapping.logger.debug('Mapping pass complete', {
			direction: direction.name,
			fields: mapping.size
		});
	}
}

/**
 * Run `pass` once per item in input order. MappingErrors become failed
 * outcomes; any other error stops the batch.
 */
function runBatch<T>(items: Iterable<unknown>, pass: (item: unknown) => T): MappingOutcome<T>[] {
	const outcomes: MappingOutcome<T>[] = [];
	for (const item of items) {
		try {
			outcomes.push({ ok: true, value: pass(item) });
		} catch (error) {
			if (!(error instanceof MappingErrors)) {
				throw error;
			}
			outcomes.push({ ok: false, error });
		}
	}
	return outcomes;
}

/**
 * Full pass: builds and returns the output.
 */
export class MappingIterator {
	public constructor(public readonly direction: DirectionStrategy) {}

	/**
	 * @throws MappingErrors when any field (or the mapping validator) fails
	 * @throws MappingFault when a field raises anything else
	 */
	public run(mapping: Mapping, data: unknown): MappingData {
		const output: MappingData = {};
		const owned: OwnedRecords = new WeakSet([output]);
		const errors = traverse(mapping, data, this.direction, (field, value) =>
			this.direction.write(output, field, value, owned)
		);

		if (errors.empty && mapping.validator) {
			this.runValidator(mapping, output, errors);
		}

		if (!errors.empty) {
			const map = errors.toErrorMap();
			logPass(mapping, this.direction, map);
			throw new MappingErrors(map);
		}

		logPass(mapping, this.direction, null);
		return output;
	}

	public runMany(mapping: Mapping, items: Iterable<unknown>): MappingOutcome[] {
		return runBatch(items, (item) => this.run(mapping, item));
	}

	private runValidator(mapping: Mapping, output: MappingData, errors: ErrorCollector): void {
		try {
			mapping.validator?.(output);
		} catch (error) {
			if (error instanceof MappingErrors) {
				logPass(mapping, this.direction, error.errors);
				throw error;
			}
			if (error instanceof FieldValidationError) {
				errors.add(error.key ?? MAPPING_ERROR_KEY, error.messages);
				return;
			}
			throw error;
		}
	}
}

/**
 * Check-only pass: same field processing, nothing written, no validator.
 */
export class ValidateOnlyIterator {
	public constructor(public readonly direction: DirectionStrategy) {}

	/**
	 * @throws MappingErrors when any field fails
	 */
	public run(mapping: Mapping, data: unknown): void {
		const errors = traverse(mapping, data, this.direction, null);

		if (!errors.empty) {
			const map = errors.toErrorMap();
			logPass(mapping, this.direction, map);
			throw new MappingErrors(map);
		}
		logPass(mapping, this.direction, null);
	}

	public runMany(mapping: Mapping, items: Iterable<unknown>): MappingOutcome<undefined>[] {
		return runBatch(items, (item) => {
			this.run(mapping, item);
			return undefined;
		});
	}
}
