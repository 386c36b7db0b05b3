import { describe, expect, it } from 'vitest';
import { redact } from './redact.js';

describe('redact', () => {
	it('should redact sensitive keys', () => {
		const input = {
			DB_PASSWORD: 'test-password',
			GITHUB_TOKEN: 'test-token',
			SESSION_ID: 'abcde',
			BASIC_AUTH: 'user:pass',
			client_secret: 'hidden',
			STRIPE_API_KEY: 'test-key',
			'aws-credentials': 'test',
		};
		expect(redact(input)).toEqual({
			DB_PASSWORD: '[REDACTED]',
			GITHUB_TOKEN: '[REDACTED]',
			SESSION_ID: '[REDACTED]',
			BASIC_AUTH: '[REDACTED]',
			client_secret: '[REDACTED]',
			STRIPE_API_KEY: '[REDACTED]',
			'aws-credentials': '[REDACTED]',
		});
	});

	it('should redact environment values inside a resolved config', () => {
		const config = {
			command: 'mvn clean verify',
			runs: 30,
			env: { MAVEN_OPTS: '-Xmx2g', DB_PASSWORD: 'test-password' },
			prepare: ['mvn clean'],
		};
		expect(redact(config)).toEqual({
			command: 'mvn clean verify',
			runs: 30,
			env: { MAVEN_OPTS: '-Xmx2g', DB_PASSWORD: '[REDACTED]' },
			prepare: ['mvn clean'],
		});
	});

	it('should walk arrays instead of blanking them', () => {
		const input = {
			tokens: ['abc', 'def'],
			users: [
				{ id: 1, password: 'p1' },
				{ id: 2, password: 'p2' },
			],
		};
		expect(redact(input)).toEqual({
			tokens: ['abc', 'def'],
			users: [
				{ id: 1, password: '[REDACTED]' },
				{ id: 2, password: '[REDACTED]' },
			],
		});
	});

	it('should redact an entire object under a sensitive key', () => {
		expect(redact({ auth: { user: 'ci', pass: 'x' } })).toEqual({ auth: '[REDACTED]' });
	});

	it('should return untouched input as the same object', () => {
		const input = { runs: 30, env: { MAVEN_OPTS: '-Xmx2g' }, beforeEach: ['./reset.sh'] };
		expect(redact(input)).toBe(input);
	});

	it('should leave the input unmodified', () => {
		const input = { env: { DB_PASSWORD: 'test-password' } };
		redact(input);
		expect(input.env.DB_PASSWORD).toBe('test-password');
	});

	it('should handle null and primitives', () => {
		expect(redact(null)).toBe(null);
		expect(redact(123)).toBe(123);
		expect(redact('string')).toBe('string');
		expect(redact(true)).toBe(true);
	});
});
