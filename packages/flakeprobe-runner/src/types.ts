// ============================================================================
// Flakeprobe Runner - Types
// ============================================================================

/**
 * How one suite execution ended.
 *
 * Only `ordinary` and `non-zero` guarantee that the subject got as far as
 * writing its test reports.
 */
export type ExitStatus = 'ordinary' | 'non-zero' | 'crashed' | 'timed_out';

/** Outcome of a single test case within one run */
export type Verdict = 'pass' | 'fail' | 'error' | 'skipped';

/** One execution of the full suite. Frozen once the execution finishes. */
export interface RunRecord {
	/** 0-based, unique, monotonic */
	readonly runIndex: number;
	/** ISO-8601 timestamp */
	readonly startedAt: string;
	/** ISO-8601 timestamp */
	readonly endedAt: string;
	/** Wall-clock duration in milliseconds */
	readonly duration: number;
	readonly exitStatus: ExitStatus;
	/** Process exit code, null when the process died from a signal or never started */
	readonly exitCode: number | null;
	/** Signal name when the process was killed by one */
	readonly signal: string | null;
	/** Path of the file holding the combined stdout/stderr of the run */
	readonly rawOutputRef: string;
	/** Human-readable note, e.g. "killed by SIGKILL" or "cancelled" */
	readonly detail?: string;
}

/** One test case's outcome within one run. Frozen on creation. */
export interface TestCaseResult {
	/** Stable identifier: `className#name`, or `name` when there is no class */
	readonly testId: string;
	readonly className: string;
	readonly name: string;
	/** Back-reference to the run this result came from */
	readonly runIndex: number;
	readonly verdict: Verdict;
	/** Duration in milliseconds */
	readonly duration: number;
	/** Message and trace, only for fail/error */
	readonly failureDetail?: string;
	/** The report's failure/error `type` attribute, when present */
	readonly failureType?: string;
}

/** Per-test classification at the end of an experiment */
export type Classification = 'stable-passing' | 'stable-failing' | 'flaky' | 'never-observed';

/** One verdict of one test in one run, as kept by the aggregator */
export interface Observation {
	runIndex: number;
	verdict: Verdict;
	duration: number;
	failureDetail?: string;
	failureType?: string;
}

/** Everything the aggregator knows about one test id */
export interface AggregateEntry {
	testId: string;
	className: string;
	name: string;
	/** In append order; only kept for diagnostics */
	observations: Observation[];
	passCount: number;
	failCount: number;
	errorCount: number;
	skipCount: number;
	totalObserved: number;
}

export interface ClassifiedEntry extends AggregateEntry {
	classification: Classification;
}

/** Aggregator state after the experiment ends */
export interface AggregateSummary {
	/** Sorted by testId */
	entries: ClassifiedEntry[];
	/** Run indices that were appended, ascending */
	runs: number[];
	totals: Record<Classification, number>;
}

/** Options for the subject invocation, supplied once at experiment start */
export interface SubjectOptions {
	/** Shell command performing a full build-and-test cycle */
	command: string;
	/** Working directory of the subject */
	cwd: string;
	/** Extra environment variables, merged over the harness environment */
	env: Record<string, string>;
	/** Per-run timeout in ms */
	timeout: number;
	/** Grace period between SIGTERM and SIGKILL in ms */
	killGrace: number;
}
