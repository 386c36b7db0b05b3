import { describe, expect, it } from 'vitest';
import { classifyFailure } from './failure-classifier.js';

describe('classifyFailure', () => {
	it('should classify by the exception type first', () => {
		expect(
			classifyFailure({
				verdict: 'error',
				failureType: 'org.openqa.selenium.NoSuchElementException',
				failureDetail: 'expected x but was y',
			}),
		).toBe('element');
		expect(
			classifyFailure({ verdict: 'fail', failureType: 'org.opentest4j.AssertionFailedError' }),
		).toBe('assertion');
		expect(classifyFailure({ verdict: 'error', failureType: 'java.lang.NullPointerException' })).toBe(
			'script',
		);
	});

	it('should recognize synchronization failures', () => {
		expect(
			classifyFailure({ verdict: 'error', failureType: 'org.openqa.selenium.TimeoutException' }),
		).toBe('timeout');
		expect(
			classifyFailure({
				verdict: 'error',
				failureType: 'org.openqa.selenium.ElementClickInterceptedException',
			}),
		).toBe('actionability');
	});

	it('should fall back to the message text', () => {
		expect(
			classifyFailure({
				verdict: 'error',
				failureType: 'java.lang.RuntimeException',
				failureDetail: 'Connection refused: localhost/127.0.0.1:8080',
			}),
		).toBe('network');
		expect(classifyFailure({ verdict: 'error', failureDetail: 'Page load Timed Out after 30s' })).toBe(
			'timeout',
		);
		expect(
			classifyFailure({ verdict: 'error', failureDetail: 'expected:<Welcome> but was:<Login>' }),
		).toBe('assertion');
	});

	it('should treat a bare failure as an assertion and a bare error as unknown', () => {
		expect(classifyFailure({ verdict: 'fail' })).toBe('assertion');
		expect(classifyFailure({ verdict: 'error' })).toBe('unknown');
	});
});
