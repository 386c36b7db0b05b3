// ============================================================================
// Flakeprobe Runner - Run Orchestrator
// Drives N sequential executions of the subject and feeds the aggregator.
//
// The orchestrator does NOT import the JUnit parser or the report writer.
// Both are handed in by the CLI, which keeps the data flow one-way:
// orchestrator → capture → parser → aggregator → reporter.
//
// Runs are strictly sequential: the subject owns one shared browser session
// per run, and overlapping runs would turn resource contention into
// flakiness of its own.
// ============================================================================

import { join } from 'node:path';
import type { EventBus, HookPhase } from './event-bus.js';
import { MalformedReportError, SubjectCrashError, SubjectTimeoutError } from './errors.js';
import { type SpawnSubject, captureExecution } from './execution-capture.js';
import { FlakinessAggregator } from './flakiness-aggregator.js';
import type { AggregateSummary, RunRecord, SubjectOptions, TestCaseResult } from './types.js';

/** Parses the test report of a run that exited ordinary or non-zero */
export type ResultParser = (record: RunRecord) => Promise<TestCaseResult[]>;

/** Everything the reporter needs to write the final artifacts */
export interface ExperimentOutcome {
	records: readonly RunRecord[];
	summary: AggregateSummary;
	runs: number;
	cancelled: boolean;
	bailed: boolean;
}

/**
 * Receives progress as it happens and the final state once.
 * Implemented by the CLI package's ReportWriter.
 */
export interface ExperimentReporter {
	/** Append a line to the human-readable log. Throws HarnessIOError. */
	info(message: string): void;
	/** Append a warning to the human-readable log. Throws HarnessIOError. */
	warn(message: string): void;
	/** Log the progress line for a finished run */
	runFinished(record: RunRecord, observed: number, runs: number): void;
	/** Write the tabular artifacts and the summary */
	finalize(outcome: ExperimentOutcome): Promise<void>;
}

export interface ExperimentOptions {
	subject: SubjectOptions;
	/** Number of runs N */
	runs: number;
	/** Directory receiving per-run output logs */
	outputDir: string;
	parseResults: ResultParser;
	reporter: ExperimentReporter;
	/** Removes stale report files before each run */
	clearReports?: () => Promise<void>;
	/** Commands run once before the first run */
	prepare?: string[];
	/** Commands run before every run */
	beforeEach?: string[];
	/** Stop after this many consecutive crashed/timed-out runs (0 = never) */
	bail?: number;
	bus?: EventBus;
	aggregator?: FlakinessAggregator;
	signal?: AbortSignal;
	/** Aborting SIGKILLs the current subject without waiting out the grace period */
	forceKill?: AbortSignal;
	spawn?: SpawnSubject;
}

export interface ExperimentResult extends ExperimentOutcome {
	/** Runs that exited ordinary or non-zero */
	completedRuns: number;
	duration: number;
}

/**
 * ExperimentRunner performs the runs, contains every per-run failure at the
 * run boundary, and finalizes reports even when cancelled or halted.
 *
 * ```ts
 * const runner = new ExperimentRunner({
 *   subject,
 *   runs: 30,
 *   outputDir: 'log',
 *   parseResults: (record) => parseRunResults(record, reportOptions),
 *   reporter: new ReportWriter('log'),
 * });
 * const result = await runner.run();
 * ```
 */
export class ExperimentRunner {
	private readonly options: ExperimentOptions;
	private readonly aggregator: FlakinessAggregator;

	constructor(options: ExperimentOptions) {
		if (!Number.isInteger(options.runs) || options.runs < 0) {
			throw new RangeError(`Run count must be a non-negative integer, got ${options.runs}`);
		}
		this.options = options;
		this.aggregator = options.aggregator ?? new FlakinessAggregator();
	}

	/**
	 * Run the whole experiment.
	 *
	 * @throws HarnessIOError when an artifact cannot be written; reports are
	 *   still finalized on a best-effort basis before it propagates
	 */
	async run(): Promise<ExperimentResult> {
		const { subject, runs, reporter, bus, signal } = this.options;
		const startTime = Date.now();
		const records: RunRecord[] = [];
		let cancelled = false;
		let bailed = false;
		let fatal: unknown;

		bus?.emit('experiment:start', { runs, command: subject.command, cwd: subject.cwd });

		try {
			reporter.info(`Starting new set of flakiness tests: ${runs} run(s) of \`${subject.command}\``);

			await this.runHooks('prepare', this.options.prepare ?? [], null);

			let consecutiveCrashes = 0;

			for (let runIndex = 0; runIndex < runs; runIndex++) {
				await this.runHooks('beforeEach', this.options.beforeEach ?? [], runIndex);
				if (signal?.aborted) {
					cancelled = true;
					break;
				}

				const record = await this.runOnce(runIndex);
				records.push(record);

				if (record.exitStatus === 'crashed' && record.detail === 'cancelled') {
					cancelled = true;
					break;
				}

				consecutiveCrashes =
					record.exitStatus === 'crashed' || record.exitStatus === 'timed_out'
						? consecutiveCrashes + 1
						: 0;

				const bail = this.options.bail ?? 0;
				if (bail > 0 && consecutiveCrashes >= bail && runIndex < runs - 1) {
					reporter.warn(`Stopping early: ${consecutiveCrashes} consecutive runs did not complete.`);
					bailed = true;
					break;
				}
			}

			if (cancelled) {
				reporter.warn(`Experiment cancelled after ${records.length} of ${runs} run(s).`);
			}
		} catch (err) {
			fatal = err;
		}

		const summary = this.aggregator.finalize();
		const outcome: ExperimentOutcome = { records, summary, runs, cancelled, bailed };

		try {
			await reporter.finalize(outcome);
		} catch (err) {
			fatal ??= err;
		}

		const duration = Date.now() - startTime;
		bus?.emit('experiment:end', { summary, records, cancelled, duration });

		if (fatal !== undefined) {
			throw fatal;
		}

		return {
			...outcome,
			completedRuns: records.filter((r) => isCompleted(r)).length,
			duration,
		};
	}

	// -----------------------------------------------------------------------
	// One run
	// -----------------------------------------------------------------------

	private async runOnce(runIndex: number): Promise<RunRecord> {
		const { subject, runs, reporter, bus, signal } = this.options;

		if (this.options.clearReports) {
			try {
				await this.options.clearReports();
			} catch (err) {
				reporter.warn(
					`Run ${runIndex}: could not clear old reports (${err instanceof Error ? err.message : String(err)})`,
				);
			}
		}

		bus?.emit('run:start', { runIndex, runs });
		reporter.info(`Starting execution ${runIndex + 1} of ${runs}.`);

		const record = await captureExecution({
			...subject,
			runIndex,
			outputFile: join(this.options.outputDir, `run-${runIndex}.output.log`),
			signal,
			forceKill: this.options.forceKill,
			spawn: this.options.spawn,
		});
		bus?.emit('run:end', record);

		let results: TestCaseResult[] = [];

		if (isCompleted(record)) {
			try {
				results = await this.options.parseResults(record);
			} catch (err) {
				// Whatever went wrong reading this run's report stays with this run
				const malformed = asMalformedReport(err);
				reporter.warn(`Run ${runIndex}: ${malformed.message.split('\n')[0]}`);
				bus?.emit('run:malformed', { runIndex, error: malformed });
			}
		} else if (record.detail !== 'cancelled') {
			const error =
				record.exitStatus === 'timed_out'
					? new SubjectTimeoutError(record, subject.timeout)
					: new SubjectCrashError(record);
			reporter.warn(error.message.split('\n')[0] ?? error.message);
		}

		// Crashed and timed-out runs are appended empty: the run happened,
		// nothing was observed
		this.aggregator.append(runIndex, results);
		bus?.emit('run:results', { runIndex, results });
		reporter.runFinished(record, results.length, runs);

		return record;
	}

	// -----------------------------------------------------------------------
	// Setup commands
	// -----------------------------------------------------------------------

	/**
	 * Run setup commands one after another. A failing command is logged and
	 * the experiment carries on; only I/O errors on our own files propagate.
	 */
	private async runHooks(
		phase: HookPhase,
		commands: string[],
		runIndex: number | null,
	): Promise<void> {
		const { subject, reporter, bus, signal } = this.options;

		for (const [i, command] of commands.entries()) {
			if (signal?.aborted) return;

			bus?.emit('hook:start', { phase, command, runIndex });
			reporter.info(`Running ${phase} command \`${command}\``);

			const suffix = runIndex === null ? `${phase}-${i}` : `run-${runIndex}.${phase}-${i}`;
			const record = await captureExecution({
				...subject,
				command,
				runIndex: runIndex ?? 0,
				outputFile: join(this.options.outputDir, `${suffix}.output.log`),
				signal,
				forceKill: this.options.forceKill,
				spawn: this.options.spawn,
			});

			if (record.exitStatus !== 'ordinary') {
				bus?.emit('hook:fail', { phase, command, runIndex, record });
				reporter.warn(
					`${phase} command \`${command}\` ended ${record.exitStatus}` +
						`${record.exitCode !== null ? ` (exit ${record.exitCode})` : ''}; continuing.`,
				);
			}
		}
	}
}

function isCompleted(record: RunRecord): boolean {
	return record.exitStatus === 'ordinary' || record.exitStatus === 'non-zero';
}

function asMalformedReport(err: unknown): MalformedReportError {
	if (err instanceof MalformedReportError) return err;
	const reason = err instanceof Error ? err.message : String(err);
	return new MalformedReportError({ message: `Could not read the test report (${reason})`, cause: err });
}
