/**
 * Prototype-pollution-safe JSON helpers.
 *
 * Payloads handed to marshal() usually come straight from JSON.parse, so
 * schema checks and nested merges run on sanitized copies.
 *
 * @module json
 */

/**
 * Keys that can trigger prototype pollution when used with Object.assign,
 * spread operators, or bracket notation assignment.
 */
export const DANGEROUS_KEYS: ReadonlySet<string> = new Set(['__proto__', 'constructor', 'prototype']);

function isBuiltIn(obj: object): boolean {
	return (
		obj instanceof Date ||
		obj instanceof RegExp ||
		obj instanceof Map ||
		obj instanceof Set ||
		obj instanceof Error
	);
}

/**
 * Recursively copies plain data, dropping dangerous keys.
 * Primitives, null and built-in types are returned as is.
 */
function sanitize<T>(obj: T): T {
	if (obj === null || typeof obj !== 'object' || isBuiltIn(obj)) {
		return obj;
	}

	if (Array.isArray(obj)) {
		return obj.map(sanitize) as T;
	}

	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		if (DANGEROUS_KEYS.has(key)) {
			continue;
		}
		result[key] = sanitize(value);
	}

	return result as T;
}

export const Json = {
	/**
	 * Sanitize an already-parsed value.
	 */
	sanitize<T>(obj: T): T {
		return sanitize(obj);
	}
} as const;
