import { describe, it, expect } from 'vitest';
import { Json } from '../src/json';

describe('Json', () => {
	describe('sanitize', () => {
		it('should pass primitives and null through', () => {
			expect(Json.sanitize(42)).toBe(42);
			expect(Json.sanitize(null)).toBeNull();
			expect(Json.sanitize('x')).toBe('x');
		});

		it('should keep built-in instances as is', () => {
			const date = new Date(0);
			const map = new Map([['a', 1]]);
			expect(Json.sanitize(date)).toBe(date);
			expect(Json.sanitize(map)).toBe(map);
		});

		it('should strip dangerous keys from nested objects and arrays', () => {
			const input = JSON.parse('{"user": {"__proto__": {"x": 1}, "name": "ok"}, "tags": [{"prototype": 1, "t": 2}], "constructor": 1}');
			expect(Json.sanitize(input)).toEqual({ user: { name: 'ok' }, tags: [{ t: 2 }] });
			expect(Object.prototype.hasOwnProperty.call(Object.prototype, 'x')).toBe(false);
		});

		it('should return a copy of plain objects', () => {
			const input = { name: 'foo' };
			const result = Json.sanitize(input);
			expect(result).toEqual(input);
			expect(result).not.toBe(input);
		});
	});
});
