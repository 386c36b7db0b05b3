import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MalformedReportError, type RunRecord } from 'flakeprobe-runner';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
	type ReportLocation,
	clearReports,
	findReportFiles,
	parseRunResults,
	patternToRegExp,
	toTestId,
} from './report-files.js';

let cwd: string;
let location: ReportLocation;

beforeEach(async () => {
	cwd = await mkdtemp(join(tmpdir(), 'flakeprobe-reports-'));
	location = {
		cwd,
		reportDirs: ['target/surefire-reports', 'target/failsafe-reports'],
		reportPattern: 'TEST-*.xml',
	};
});

afterEach(async () => {
	await rm(cwd, { recursive: true, force: true });
});

async function report(dir: string, file: string, content: string): Promise<string> {
	const absDir = join(cwd, dir);
	await mkdir(absDir, { recursive: true });
	const path = join(absDir, file);
	await writeFile(path, content, 'utf-8');
	return path;
}

function suite(className: string, cases: string): string {
	return `<testsuite name="${className}">${cases}</testsuite>`;
}

function record(runIndex: number): RunRecord {
	return {
		runIndex,
		startedAt: '2026-03-14T09:00:00.000Z',
		endedAt: '2026-03-14T09:10:00.000Z',
		duration: 600_000,
		exitStatus: 'non-zero',
		exitCode: 1,
		signal: null,
		rawOutputRef: join(cwd, `run-${runIndex}.output.log`),
	};
}

describe('toTestId', () => {
	it('should join class and name, or use the name alone', () => {
		expect(toTestId('com.shop.LoginIT', 'login_valid')).toBe('com.shop.LoginIT#login_valid');
		expect(toTestId('', 'login_valid')).toBe('login_valid');
	});
});

describe('patternToRegExp', () => {
	it('should support * and ? wildcards', () => {
		const matcher = patternToRegExp('TEST-*.xml');
		expect(matcher.test('TEST-com.shop.LoginIT.xml')).toBe(true);
		expect(matcher.test('TEST-LoginIT.txt')).toBe(false);
		expect(matcher.test('xTEST-LoginIT.xml')).toBe(false);
		expect(patternToRegExp('run-?.xml').test('run-1.xml')).toBe(true);
		expect(patternToRegExp('run-?.xml').test('run-12.xml')).toBe(false);
	});
});

describe('findReportFiles', () => {
	it('should list matching files per directory in name order', async () => {
		const b = await report('target/surefire-reports', 'TEST-b.xml', '');
		const a = await report('target/surefire-reports', 'TEST-a.xml', '');
		await report('target/surefire-reports', 'b.txt', '');
		const it1 = await report('target/failsafe-reports', 'TEST-LoginIT.xml', '');

		expect(await findReportFiles(location)).toEqual([a, b, it1]);
	});

	it('should skip missing directories', async () => {
		expect(await findReportFiles(location)).toEqual([]);
	});
});

describe('clearReports', () => {
	it('should remove only matching report files', async () => {
		const stale = await report('target/surefire-reports', 'TEST-a.xml', '');
		const other = await report('target/surefire-reports', 'a-summary.txt', '');

		expect(await clearReports(location)).toBe(1);
		expect(existsSync(stale)).toBe(false);
		expect(existsSync(other)).toBe(true);
	});
});

describe('parseRunResults', () => {
	it('should read every report of a run into frozen results', async () => {
		await report(
			'target/surefire-reports',
			'TEST-CartTest.xml',
			suite('CartTest', '<testcase name="adds" classname="CartTest" time="0.01"/>'),
		);
		await report(
			'target/failsafe-reports',
			'TEST-LoginIT.xml',
			suite(
				'LoginIT',
				'<testcase name="login_valid" classname="LoginIT" time="2"><failure message="no"/></testcase>',
			),
		);

		const results = await parseRunResults(record(2), location);

		expect(results).toEqual([
			{
				testId: 'CartTest#adds',
				runIndex: 2,
				className: 'CartTest',
				name: 'adds',
				duration: 10,
				verdict: 'pass',
			},
			{
				testId: 'LoginIT#login_valid',
				runIndex: 2,
				className: 'LoginIT',
				name: 'login_valid',
				duration: 2000,
				verdict: 'fail',
				failureDetail: 'no',
			},
		]);
		expect(results.every((r) => Object.isFrozen(r))).toBe(true);
	});

	it('should fail when the run left no report', async () => {
		await expect(parseRunResults(record(0), location)).rejects.toThrow(
			'No report files matching TEST-*.xml in target/surefire-reports, target/failsafe-reports after run 0 (non-zero)',
		);
	});

	it('should fail the whole run when one report is garbled', async () => {
		await report(
			'target/surefire-reports',
			'TEST-A.xml',
			suite('A', '<testcase name="ok" classname="A"/>'),
		);
		const broken = await report('target/surefire-reports', 'TEST-B.xml', '<testsuite name="B"><testc');

		const failure = parseRunResults(record(1), location);

		await expect(failure).rejects.toBeInstanceOf(MalformedReportError);
		await expect(failure).rejects.toMatchObject({ file: broken });
	});
});
