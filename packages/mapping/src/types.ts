/**
 * Mapping Types
 *
 * The field capability protocol consumed by the core, plus the value shapes
 * that flow through a mapping pass.
 */

import type { MappingErrors } from './mapping-errors';

// --- Data ---

/** Output of a single pass, and the shape of dict-like input. */
export type MappingData = Record<string, unknown>;

/** Field key -> ordered list of messages. */
export type ErrorMap = Record<string, string[]>;

export type DirectionName = 'marshal' | 'serialize';

// --- Field Protocol ---

/**
 * Capability set a field must expose to take part in a mapping.
 *
 * `name` is the internal key (marshal input, serialize output).
 * `source` is the external key (marshal output, serialize input); it may be a
 * dotted path such as `user.company.name`, or `__self__`.
 *
 * Validation methods signal bad data by throwing `FieldValidationError`.
 * Anything else they throw is treated as a fault in the field itself.
 */
export interface MappedField {
	readonly name: string;
	readonly source: string;
	/** Substituted when the resolved value is empty */
	readonly default?: unknown;
	readonly required: boolean;

	validateForMarshal(value: unknown): void;
	validateForSerialize(value: unknown): void;
	marshalValue(value: unknown): unknown;
	serializeValue(value: unknown): unknown;
}

/**
 * Post-process hook run with the full output of a pass that had no field errors.
 * Throw `MappingErrors` or `FieldValidationError` to fail the pass.
 */
export type MappingValidator = (output: MappingData) => void;

// --- Results ---

/** Outcome of processing one field. */
export type FieldResult = { ok: true; value: unknown } | { ok: false; key: string; messages: string[] };

/** Outcome of one instance in a batch pass. */
export type MappingOutcome<T = MappingData> = { ok: true; value: T } | { ok: false; error: MappingErrors };

// --- Options ---

export interface PassOptions {
	many?: false;
}

export interface BatchPassOptions {
	many: true;
}
