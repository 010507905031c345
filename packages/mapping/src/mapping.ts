/**
 * Mapping
 *
 * A schema: an ordered collection of fields plus an optional post-process
 * validator. Built once, then read-only while passes run over it.
 *
 * @example
 * ```typescript
 * const UserMapping = new Mapping([
 *   field('name').string(),
 *   field('id').integer()
 * ]);
 *
 * const user = marshal(UserMapping, { name: 'foo', id: 1 });
 * ```
 */

import { Logger } from '@fieldmap/logging';
import type { MappedField, MappingValidator } from './types';

export interface MappingOptions {
	/**
	 * Container the fields are stored in (default: a new array).
	 * Pass a Set to drop duplicate field references; iteration then follows
	 * Set insertion order.
	 */
	collection?: MappedField[] | Set<MappedField>;
	/** Runs with the full output when a pass has no field errors */
	validator?: MappingValidator;
	/** Added to every log record as `mapping` (default: 'mapping') */
	name?: string;
	/** Receives pass diagnostics (default: Logger named 'Mapping') */
	logger?: Logger;
}

function isFunction(value: unknown): boolean {
	return typeof value === 'function';
}

/**
 * Runtime check for the field capability set.
 */
export function isMappedField(value: unknown): value is MappedField {
	return (
		typeof value === 'object' &&
		value !== null &&
		'name' in value &&
		typeof value.name === 'string' &&
		'source' in value &&
		typeof value.source === 'string' &&
		'required' in value &&
		typeof value.required === 'boolean' &&
		'validateForMarshal' in value &&
		isFunction(value.validateForMarshal) &&
		'validateForSerialize' in value &&
		isFunction(value.validateForSerialize) &&
		'marshalValue' in value &&
		isFunction(value.marshalValue) &&
		'serializeValue' in value &&
		isFunction(value.serializeValue)
	);
}

export class Mapping implements Iterable<MappedField> {
	public readonly fields: MappedField[] | Set<MappedField>;
	public readonly validator: MappingValidator | undefined;
	public readonly name: string;
	public readonly logger: Logger;

	/**
	 * @param fields - Entries that are not fields are ignored
	 */
	public constructor(fields: Iterable<unknown> = [], options: MappingOptions = {}) {
		this.fields = options.collection ?? [];
		this.validator = options.validator;
		this.name = options.name ?? 'mapping';
		this.logger = (options.logger ?? new Logger('Mapping')).with({ mapping: this.name });

		for (const entry of fields) {
			if (isMappedField(entry)) {
				this.addField(entry);
			}
		}
	}

	public addField(field: MappedField): this {
		if (this.fields instanceof Set) {
			this.fields.add(field);
		} else {
			this.fields.push(field);
		}
		return this;
	}

	public get size(): number {
		return this.fields instanceof Set ? this.fields.size : this.fields.length;
	}

	public [Symbol.iterator](): Iterator<MappedField> {
		return this.fields[Symbol.iterator]();
	}
}
