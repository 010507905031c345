/**
 * Mapping Errors
 *
 * - FieldValidationError: raised by field logic for invalid data; recovered per field
 * - MappingErrors: aggregate of every field failure in one pass
 * - MappingFault: anything unexpected thrown by field logic
 * - BatchMappingErrors: per-instance error maps of a failed batch
 *
 * @example
 * ```typescript
 * try {
 *   marshal(mapping, { name: 'foo', id: 'bar' });
 * } catch (error) {
 *   if (error instanceof MappingErrors) {
 *     error.errors; // { id: ['This field was of an incorrect type'] }
 *   }
 * }
 * ```
 */

import type { ErrorMap } from './types';

/**
 * Base class of every error raised by the mapping layer.
 */
export class MappingError extends Error {
	public override readonly name: string = 'MappingError';

	public constructor(message: string, options?: ErrorOptions) {
		super(message, options);

		// Maintains proper stack trace for where error was thrown (V8 engines)
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, new.target);
		}
	}
}

/**
 * Signals that a value is invalid for a field.
 * `key` is set when the thrower knows which output key the failure belongs to.
 */
export class FieldValidationError extends MappingError {
	public override readonly name: string = 'FieldValidationError';
	public readonly messages: string[];
	public readonly key: string | undefined;

	public constructor(messages: string | readonly string[], options: { key?: string } = {}) {
		super(typeof messages === 'string' ? messages : messages.join('; '));
		this.messages = typeof messages === 'string' ? [messages] : [...messages];
		this.key = options.key;
	}
}

/**
 * Aggregate of all field failures in one pass.
 * Marshal passes key errors by field source, serialize passes by field name.
 */
export class MappingErrors extends MappingError {
	public override readonly name: string = 'MappingErrors';

	public constructor(public readonly errors: ErrorMap) {
		super(MappingErrors.formatMessage(errors));
	}

	/** Field keys that failed, in failure order. */
	public get keys(): string[] {
		return Object.keys(this.errors);
	}

	public toJSON(): Record<string, unknown> {
		return { name: this.name, message: this.message, errors: this.errors };
	}

	private static formatMessage(errors: ErrorMap): string {
		const keys = Object.keys(errors);
		return `Mapping failed: ${keys.length} invalid field(s) [${keys.join(', ')}]`;
	}
}

/**
 * Something other than a validation failure went wrong while mapping:
 * a field implementation threw, or the mapping itself is malformed.
 */
export class MappingFault extends MappingError {
	public override readonly name: string = 'MappingFault';
	public readonly key: string | undefined;

	public constructor(message: string, options: { key?: string; cause?: unknown } = {}) {
		super(message, options.cause === undefined ? undefined : { cause: options.cause });
		this.key = options.key;
	}
}

/**
 * Raised by unwrapOutcomes() when any instance of a batch failed.
 * One error map per input index; successful instances have `{}`.
 */
export class BatchMappingErrors extends MappingError {
	public override readonly name: string = 'BatchMappingErrors';

	public constructor(public readonly errors: ErrorMap[]) {
		super(BatchMappingErrors.formatMessage(errors));
	}

	private static formatMessage(errors: ErrorMap[]): string {
		const failed = errors.filter((map) => Object.keys(map).length > 0).length;
		return `Batch mapping failed: ${failed} of ${errors.length} instance(s) invalid`;
	}
}

/**
 * Flatten an error map into `key: message` strings, used when one mapping's
 * failures surface as a single field's messages in another.
 */
export function flattenErrorMap(errors: ErrorMap): string[] {
	const messages: string[] = [];
	for (const [key, list] of Object.entries(errors)) {
		for (const message of list) {
			messages.push(`${key}: ${message}`);
		}
	}
	return messages;
}
