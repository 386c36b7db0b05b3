// ============================================================================
// Flakeprobe JUnit - Report Files
// Finds, clears and parses the JUnit reports one run leaves behind.
// ============================================================================

import type { Dirent } from 'node:fs';
import { readFile, readdir, rm } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { MalformedReportError, type RunRecord, type TestCaseResult } from 'flakeprobe-runner';
import { parseJUnitXml } from './junit-parser.js';

/** Where a run's reports live */
export interface ReportLocation {
	/** Subject working directory; reportDirs are relative to it */
	cwd: string;
	/** e.g. ['target/surefire-reports', 'target/failsafe-reports'] */
	reportDirs: string[];
	/** File name pattern with * and ? wildcards, e.g. 'TEST-*.xml' */
	reportPattern: string;
}

/**
 * Build the stable test identifier from the two report attributes.
 */
export function toTestId(className: string, name: string): string {
	return className === '' ? name : `${className}#${name}`;
}

/**
 * Turn a file name pattern like 'TEST-*.xml' into an anchored RegExp.
 */
export function patternToRegExp(pattern: string): RegExp {
	let source = '';
	for (const char of pattern) {
		if (char === '*') source += '[^/]*';
		else if (char === '?') source += '[^/]';
		else source += char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
	}
	return new RegExp(`^${source}$`);
}

/**
 * List report files, directory by directory in configured order, sorted by
 * name within a directory. Missing directories are skipped.
 */
export async function findReportFiles(location: ReportLocation): Promise<string[]> {
	const matcher = patternToRegExp(location.reportPattern);
	const files: string[] = [];

	for (const dir of location.reportDirs) {
		const absDir = resolve(location.cwd, dir);

		let entries: Dirent[];
		try {
			entries = await readdir(absDir, { withFileTypes: true });
		} catch (err) {
			if (isMissing(err)) continue;
			throw new MalformedReportError({
				message: `Could not list report directory ${absDir}`,
				cause: err,
			});
		}

		const matches = entries
			.filter((entry) => entry.isFile() && matcher.test(entry.name))
			.map((entry) => entry.name)
			.sort();

		for (const name of matches) {
			files.push(join(absDir, name));
		}
	}

	return files;
}

/**
 * Delete existing report files so a stale report can never be attributed
 * to the next run. Returns the number of files removed.
 */
export async function clearReports(location: ReportLocation): Promise<number> {
	const files = await findReportFiles(location);
	for (const file of files) {
		await rm(file, { force: true });
	}
	return files.length;
}

/**
 * Parse every report of a finished run into TestCaseResults.
 *
 * All-or-nothing: one unreadable or garbled file makes the whole run count
 * as unreported, so a half-read run never looks like a run where tests
 * silently went missing.
 *
 * @throws MalformedReportError when no report exists or one cannot be parsed
 */
export async function parseRunResults(
	record: RunRecord,
	location: ReportLocation,
): Promise<TestCaseResult[]> {
	const files = await findReportFiles(location);
	if (files.length === 0) {
		throw new MalformedReportError({
			message:
				`No report files matching ${location.reportPattern} in ` +
				`${location.reportDirs.join(', ')} after run ${record.runIndex} (${record.exitStatus})`,
		});
	}

	const results: TestCaseResult[] = [];

	for (const file of files) {
		let xml: string;
		try {
			xml = await readFile(file, 'utf-8');
		} catch (err) {
			throw new MalformedReportError({ message: `Could not read ${file}`, file, cause: err });
		}

		for (const testCase of parseJUnitXml(xml, file)) {
			results.push(
				Object.freeze({
					testId: toTestId(testCase.className, testCase.name),
					runIndex: record.runIndex,
					...testCase,
				}),
			);
		}
	}

	return results;
}

function isMissing(err: unknown): boolean {
	return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
