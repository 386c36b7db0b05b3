// ============================================================================
// Failure Classifier — categorizes a reported failure for diagnosis
//
// Works on what a JUnit report carries: the failure `type` attribute
// (usually an exception class name) and the message/trace text.
// Pure pattern matching, no external deps.
//
// Rules:
// - Assertion failures → the test's own expectation did not hold
// - Element/actionability/timeout/network → environment or synchronization
// - Script errors (NPE, ClassCast, ...) → defects in test or subject code
// ============================================================================

import type { Verdict } from './types.js';

export type FailureCategory =
	| 'assertion'
	| 'element'
	| 'actionability'
	| 'timeout'
	| 'network'
	| 'script'
	| 'unknown';

export interface ReportedFailure {
	verdict: Verdict;
	failureType?: string;
	failureDetail?: string;
}

/** Exception simple names, checked in order before the message text */
const TYPE_CATEGORIES: ReadonlyArray<[FailureCategory, ReadonlySet<string>]> = [
	[
		'assertion',
		new Set([
			'AssertionError',
			'AssertionFailedError',
			'ComparisonFailure',
			'MultipleFailuresError',
		]),
	],
	[
		'element',
		new Set(['NoSuchElementException', 'StaleElementReferenceException', 'ElementNotFoundError']),
	],
	[
		'actionability',
		new Set([
			'ElementNotInteractableException',
			'ElementClickInterceptedException',
			'ElementNotVisibleException',
			'ElementNotActionableError',
		]),
	],
	['timeout', new Set(['TimeoutException', 'TimeoutError', 'ScriptTimeoutException'])],
	[
		'network',
		new Set([
			'ConnectException',
			'SocketTimeoutException',
			'UnreachableBrowserException',
			'SessionNotCreatedException',
			'NetworkError',
		]),
	],
	[
		'script',
		new Set([
			'NullPointerException',
			'ClassCastException',
			'IllegalStateException',
			'IllegalArgumentException',
			'IndexOutOfBoundsException',
			'TypeError',
			'ReferenceError',
		]),
	],
];

/**
 * Classify a failing or erroring test result.
 *
 * ```ts
 * classifyFailure({ verdict: 'error', failureType: 'org.openqa.selenium.TimeoutException' });
 * // → 'timeout'
 * ```
 */
export function classifyFailure(failure: ReportedFailure): FailureCategory {
	const type = simpleName(failure.failureType ?? '');
	for (const [category, types] of TYPE_CATEGORIES) {
		if (types.has(type)) return category;
	}

	// --- Fall back to the message text ---

	const msg = (failure.failureDetail ?? '').toLowerCase();

	if (
		msg.includes('expected') &&
		(msg.includes('but was') ||
			msg.includes('to equal') ||
			msg.includes('to be') ||
			msg.includes('but got') ||
			msg.includes('but received'))
	) {
		return 'assertion';
	}
	if (msg.includes('timed out') || msg.includes('timeout')) {
		return 'timeout';
	}
	if (msg.includes('no such element') || msg.includes('unable to locate element')) {
		return 'element';
	}
	if (
		msg.includes('connection refused') ||
		msg.includes('econnrefused') ||
		msg.includes('econnreset') ||
		msg.includes('network')
	) {
		return 'network';
	}

	// A bare <failure> is an assertion in every JUnit-producing runner
	return failure.verdict === 'fail' ? 'assertion' : 'unknown';
}

/** `org.openqa.selenium.TimeoutException` → `TimeoutException` */
function simpleName(type: string): string {
	const trimmed = type.trim();
	const lastDot = trimmed.lastIndexOf('.');
	return lastDot === -1 ? trimmed : trimmed.slice(lastDot + 1);
}
