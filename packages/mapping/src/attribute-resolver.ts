/**
 * Attribute Resolver
 *
 * Reads one key from mapping input, whatever its shape:
 * - `__self__` resolves to the data itself
 * - `Map` instances are looked up by key
 * - plain records expose their own properties only
 * - other objects (class instances) expose own and inherited attributes,
 *   including getters, but not members of Object.prototype
 *
 * Absence is always `null`; the resolver never throws.
 */

export const SELF_KEY = '__self__';

type DataShape =
	| { kind: 'map'; data: Map<unknown, unknown> }
	| { kind: 'record'; data: object }
	| { kind: 'object'; data: object }
	| { kind: 'none' };

/**
 * True for `{}` literals, JSON.parse output and `Object.create(null)` objects.
 */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
	if (typeof value !== 'object' || value === null || Array.isArray(value)) {
		return false;
	}
	const proto: unknown = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

function classify(data: unknown): DataShape {
	if (data instanceof Map) return { kind: 'map', data };
	if (isPlainRecord(data)) return { kind: 'record', data };
	if (typeof data === 'object' && data !== null) return { kind: 'object', data };
	return { kind: 'none' };
}

function present(value: unknown): unknown {
	return value === undefined ? null : value;
}

export function resolveAttribute(data: unknown, key: string): unknown {
	if (key === SELF_KEY) {
		return data;
	}

	const shape = classify(data);
	switch (shape.kind) {
		case 'map':
			return present(shape.data.get(key));
		case 'record':
			return Object.hasOwn(shape.data, key) ? present(Reflect.get(shape.data, key)) : null;
		case 'object':
			if (!(key in shape.data) || (key in Object.prototype && !Object.hasOwn(shape.data, key))) {
				return null;
			}
			return present(Reflect.get(shape.data, key));
		case 'none':
			return null;
	}
}

/**
 * Empty values: absent, or the empty string.
 */
export function isEmptyValue(value: unknown): boolean {
	return value === null || value === undefined || value === '';
}
