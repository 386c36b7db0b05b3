// ============================================================================
// Flakeprobe - Report Writer
// Turns the experiment into the four artifacts of the output directory:
//
//   flakiness_tests.log   timestamped progress and the final summary
//   build_stats.csv       one row per run
//   failing_tests.csv     one row per failing/erroring test per run
//   flaky_tests.csv       one row per flaky test
//
// The log is appended as the experiment goes; the tables are written once,
// at finalize, each through a temp file renamed into place.
// ============================================================================

import { rename, writeFile } from 'node:fs/promises';
import { join, relative } from 'node:path';
import {
	type AggregateSummary,
	type ExperimentOutcome,
	type ExperimentReporter,
	HarnessIOError,
	type RunRecord,
	classifyFailure,
	computeDurationStats,
} from 'flakeprobe-runner';
import { type CsvValue, toCsv } from './csv.js';
import { ProgressLog, type ProgressLogOptions } from './progress-log.js';

export const ARTIFACTS = {
	log: 'flakiness_tests.log',
	buildStats: 'build_stats.csv',
	failingTests: 'failing_tests.csv',
	flakyTests: 'flaky_tests.csv',
} as const;

export const BUILD_STATS_HEADER = [
	'run_index',
	'started_at',
	'ended_at',
	'duration_ms',
	'exit_status',
	'exit_code',
	'signal',
	'tests_observed',
	'output_log',
] as const;

export const FAILING_TESTS_HEADER = [
	'run_index',
	'test_id',
	'class_name',
	'name',
	'verdict',
	'duration_ms',
	'failure_category',
	'failure_detail',
] as const;

export const FLAKY_TESTS_HEADER = [
	'test_id',
	'class_name',
	'name',
	'pass_count',
	'fail_count',
	'error_count',
	'skip_count',
	'total_observed',
] as const;

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

/**
 * One row per run, in run order. `output_log` is made relative to `baseDir`
 * when given.
 */
export function renderBuildStats(
	records: readonly RunRecord[],
	summary: AggregateSummary,
	baseDir?: string,
): string {
	const observed = new Map<number, number>();
	for (const entry of summary.entries) {
		for (const obs of entry.observations) {
			observed.set(obs.runIndex, (observed.get(obs.runIndex) ?? 0) + 1);
		}
	}

	const rows = [...records]
		.sort((a, b) => a.runIndex - b.runIndex)
		.map((record): CsvValue[] => [
			record.runIndex,
			record.startedAt,
			record.endedAt,
			record.duration,
			record.exitStatus,
			record.exitCode,
			record.signal,
			observed.get(record.runIndex) ?? 0,
			baseDir ? relative(baseDir, record.rawOutputRef) : record.rawOutputRef,
		]);

	return toCsv(BUILD_STATS_HEADER, rows);
}

/**
 * One row per (run, test) with verdict fail or error, ordered by run, then
 * test id.
 */
export function renderFailingTests(summary: AggregateSummary): string {
	const rows: Array<{ runIndex: number; values: CsvValue[] }> = [];

	for (const entry of summary.entries) {
		for (const obs of entry.observations) {
			if (obs.verdict !== 'fail' && obs.verdict !== 'error') continue;
			const category = classifyFailure(obs);
			rows.push({
				runIndex: obs.runIndex,
				values: [
					obs.runIndex,
					entry.testId,
					entry.className,
					entry.name,
					obs.verdict,
					obs.duration,
					category,
					obs.failureDetail,
				],
			});
		}
	}

	// Entries are already sorted by test id; a stable sort keeps that per run
	rows.sort((a, b) => a.runIndex - b.runIndex);

	return toCsv(
		FAILING_TESTS_HEADER,
		rows.map((row) => row.values),
	);
}

/** One row per flaky test, ordered by test id */
export function renderFlakyTests(summary: AggregateSummary): string {
	const rows = summary.entries
		.filter((entry) => entry.classification === 'flaky')
		.map((entry): CsvValue[] => [
			entry.testId,
			entry.className,
			entry.name,
			entry.passCount,
			entry.failCount,
			entry.errorCount,
			entry.skipCount,
			entry.totalObserved,
		]);

	return toCsv(FLAKY_TESTS_HEADER, rows);
}

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

export function formatDuration(ms: number): string {
	const rounded = Math.round(ms);
	if (rounded < 1000) return `${rounded}ms`;
	if (rounded < 60_000) return `${(rounded / 1000).toFixed(1)}s`;
	const minutes = Math.floor(rounded / 60_000);
	const seconds = ((rounded % 60_000) / 1000).toFixed(1);
	return `${minutes}m ${seconds}s`;
}

/**
 * The closing lines of the progress log.
 */
export function summarize(outcome: ExperimentOutcome): string[] {
	const { records, summary, runs } = outcome;
	const count = (status: RunRecord['exitStatus']) =>
		records.filter((r) => r.exitStatus === status).length;

	const lines: string[] = [
		`Finished ${records.length} of ${runs} run(s): ${count('ordinary')} ordinary, ` +
			`${count('non-zero')} non-zero, ${count('crashed')} crashed, ${count('timed_out')} timed out.`,
	];

	if (records.length > 0) {
		const stats = computeDurationStats(records.map((r) => r.duration));
		lines.push(
			`Run duration: mean ${formatDuration(stats.mean)}, std dev ${formatDuration(stats.stdDev)}.`,
		);
	}

	const { totals } = summary;
	lines.push(
		`Tests: ${totals['stable-passing']} stable-passing, ${totals['stable-failing']} stable-failing, ` +
			`${totals.flaky} flaky, ${totals['never-observed']} never-observed.`,
	);

	const flaky = summary.entries.filter((entry) => entry.classification === 'flaky');
	if (flaky.length > 0) {
		lines.push('Flaky tests:');
		for (const entry of flaky) {
			lines.push(
				`  ${entry.testId}: ${entry.passCount} pass, ${entry.failCount} fail, ` +
					`${entry.errorCount} error of ${entry.totalObserved}`,
			);
		}
	}

	return lines;
}

// ---------------------------------------------------------------------------
// Writer
// ---------------------------------------------------------------------------

/**
 * ReportWriter is the experiment's reporter: progress lines go to the log
 * right away, tables and the summary at finalize.
 *
 * ```ts
 * const writer = new ReportWriter(resolve('log'));
 * const runner = new ExperimentRunner({ ..., reporter: writer });
 * ```
 */
export class ReportWriter implements ExperimentReporter {
	readonly outputDir: string;
	private readonly log: ProgressLog;

	/**
	 * @throws HarnessIOError when the output directory cannot be created
	 */
	constructor(outputDir: string, options: ProgressLogOptions = {}) {
		this.outputDir = outputDir;
		this.log = new ProgressLog(join(outputDir, ARTIFACTS.log), options);
	}

	info(message: string): void {
		this.log.info(message);
	}

	warn(message: string): void {
		this.log.warn(message);
	}

	runFinished(record: RunRecord, observed: number, runs: number): void {
		const exit =
			record.exitCode !== null
				? ` (exit ${record.exitCode})`
				: record.signal
					? ` (${record.signal})`
					: '';

		this.log.info(
			`Finished execution ${record.runIndex + 1} of ${runs} in ${formatDuration(record.duration)}: ` +
				`${record.exitStatus}${exit}, ${observed} test(s) observed.`,
		);
	}

	/**
	 * Write all three tables, then the summary. A table that cannot be written
	 * does not stop the others; the first failure is rethrown at the end.
	 *
	 * @throws HarnessIOError
	 */
	async finalize(outcome: ExperimentOutcome): Promise<void> {
		const tables: Array<[string, string]> = [
			[ARTIFACTS.buildStats, renderBuildStats(outcome.records, outcome.summary, this.outputDir)],
			[ARTIFACTS.failingTests, renderFailingTests(outcome.summary)],
			[ARTIFACTS.flakyTests, renderFlakyTests(outcome.summary)],
		];

		let firstError: unknown;
		for (const [name, content] of tables) {
			try {
				await writeAtomic(join(this.outputDir, name), content);
			} catch (err) {
				firstError ??= err;
			}
		}

		for (const line of summarize(outcome)) {
			this.log.info(line);
		}

		if (firstError !== undefined) {
			throw firstError;
		}
	}
}

async function writeAtomic(path: string, content: string): Promise<void> {
	const tmp = `${path}.tmp`;
	try {
		await writeFile(tmp, content, 'utf-8');
		await rename(tmp, path);
	} catch (err) {
		throw new HarnessIOError({ path, cause: err });
	}
}
