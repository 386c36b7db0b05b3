// ============================================================================
// JUnit Parser — reads JUnit XML test reports into per-test outcomes.
//
// Supports the dialects Java build tools usually emit:
// - Maven Surefire / Failsafe (TEST-*.xml, one <testsuite> per class)
// - <testsuites> wrappers with nested <testsuite> elements
// - Cucumber's JUnit formatter (feature as classname, scenario as name)
// - <failure>, <error>, <skipped> children with message/type attributes
//
// Tokenizing is fast-xml-parser's job; mapping to verdicts is ours.
// ============================================================================

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { MalformedReportError, type Verdict } from 'flakeprobe-runner';

// ---------------------------------------------------------------------------
// Result Types
// ---------------------------------------------------------------------------

export interface JUnitTestCase {
	className: string;
	name: string;
	verdict: Verdict;
	/** Duration in milliseconds */
	duration: number;
	/** Message followed by the trace, only for fail/error */
	failureDetail?: string;
	/** The failure/error `type` attribute */
	failureType?: string;
}

// ---------------------------------------------------------------------------
// XML tokenizer setup
// ---------------------------------------------------------------------------

const ATTR = '@_';
const TEXT = '#text';

/** Elements that may repeat and are always read as arrays */
const REPEATED = new Set(['testsuite', 'testcase', 'failure', 'error', 'skipped']);

const xmlParser = new XMLParser({
	ignoreAttributes: false,
	attributeNamePrefix: ATTR,
	textNodeName: TEXT,
	parseTagValue: false,
	parseAttributeValue: false,
	trimValues: false,
	isArray: (tagName, _jpath, _isLeafNode, isAttribute) => !isAttribute && REPEATED.has(tagName),
});

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Child elements of a given tag; text-only elements come back as strings */
function children(node: XmlNode, tag: string): unknown[] {
	const value = node[tag];
	if (value === undefined) return [];
	return Array.isArray(value) ? value : [value];
}

function attribute(node: unknown, name: string): string | undefined {
	if (!isNode(node)) return undefined;
	const value = node[`${ATTR}${name}`];
	return typeof value === 'string' ? value : undefined;
}

function text(node: unknown): string {
	if (typeof node === 'string') return node;
	if (isNode(node)) {
		const value = node[TEXT];
		return typeof value === 'string' ? value : '';
	}
	return '';
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

/**
 * Parse one JUnit XML document into test cases, in document order per suite.
 *
 * ```ts
 * const cases = parseJUnitXml(readFileSync('TEST-LoginIT.xml', 'utf-8'), 'TEST-LoginIT.xml');
 * ```
 *
 * @throws MalformedReportError when the document is empty, not well-formed,
 *   or has no testsuite root
 */
export function parseJUnitXml(xml: string, source?: string): JUnitTestCase[] {
	const where = source ? ` (${source})` : '';

	if (xml.trim() === '') {
		throw new MalformedReportError({ message: `Report is empty${where}`, file: source });
	}

	const validation = XMLValidator.validate(xml);
	if (validation !== true) {
		const { msg, line } = validation.err;
		throw new MalformedReportError({
			message: `Report is not well-formed XML${where}: ${msg} at line ${line}`,
			file: source,
		});
	}

	const document: unknown = xmlParser.parse(xml);
	if (!isNode(document)) {
		throw new MalformedReportError({
			message: `Report has no root element${where}`,
			file: source,
		});
	}

	let suites: unknown[];
	const wrapper = document.testsuites;
	if (wrapper !== undefined) {
		suites = isNode(wrapper) ? children(wrapper, 'testsuite') : [];
	} else if (document.testsuite !== undefined) {
		suites = children(document, 'testsuite');
	} else {
		throw new MalformedReportError({
			message: `Report has neither <testsuites> nor <testsuite> at its root${where}`,
			file: source,
		});
	}

	const cases: JUnitTestCase[] = [];
	for (const suite of suites) {
		collectSuite(suite, cases, where, source);
	}
	return cases;
}

function collectSuite(
	suite: unknown,
	into: JUnitTestCase[],
	where: string,
	source: string | undefined,
): void {
	if (!isNode(suite)) return;

	for (const testcase of children(suite, 'testcase')) {
		into.push(parseTestCase(testcase, where, source));
	}

	// Nested suites (some runners group by feature, then rule)
	for (const nested of children(suite, 'testsuite')) {
		collectSuite(nested, into, where, source);
	}
}

function parseTestCase(
	testcase: unknown,
	where: string,
	source: string | undefined,
): JUnitTestCase {
	const name = attribute(testcase, 'name');
	if (!isNode(testcase) || name === undefined || name.trim() === '') {
		throw new MalformedReportError({
			message: `<testcase> without a name${where}`,
			file: source,
		});
	}

	const className = attribute(testcase, 'classname') ?? '';
	const duration = parseSeconds(attribute(testcase, 'time'));

	// <failure> wins over <error>, which wins over <skipped>
	const failure = children(testcase, 'failure')[0];
	if (failure !== undefined) {
		return { className, name, duration, verdict: 'fail', ...describeFailure(failure) };
	}

	const error = children(testcase, 'error')[0];
	if (error !== undefined) {
		return { className, name, duration, verdict: 'error', ...describeFailure(error) };
	}

	if (children(testcase, 'skipped').length > 0) {
		return { className, name, duration, verdict: 'skipped' };
	}

	return { className, name, duration, verdict: 'pass' };
}

function describeFailure(element: unknown): Pick<JUnitTestCase, 'failureDetail' | 'failureType'> {
	const message = attribute(element, 'message')?.trim() ?? '';
	const failureDetail = joinDetail(message, text(element).trim());
	const type = attribute(element, 'type')?.trim();

	return {
		...(failureDetail !== '' ? { failureDetail } : {}),
		...(type ? { failureType: type } : {}),
	};
}

/** Traces often repeat the message on their first line */
function joinDetail(message: string, trace: string): string {
	if (message === '') return trace;
	if (trace === '') return message;
	return trace.includes(message) ? trace : `${message}\n${trace}`;
}

/**
 * JUnit `time` is seconds as a decimal, sometimes with thousands separators
 * (`1,234.5`). Returns milliseconds; 0 when missing or unparsable.
 */
export function parseSeconds(value: string | undefined): number {
	if (value === undefined) return 0;
	const seconds = Number.parseFloat(value.replace(/,/g, '').trim());
	if (!Number.isFinite(seconds) || seconds < 0) return 0;
	return Math.round(seconds * 1000);
}
