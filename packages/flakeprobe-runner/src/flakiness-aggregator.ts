// ============================================================================
// Flakeprobe Runner — Flakiness Aggregator
// Accumulates per-test verdicts across runs and classifies every test id.
//
// Produces:
// - Per-test observation lists with pass/fail/error/skip counts
// - Classification: stable-passing, stable-failing, flaky, never-observed
// - Duration statistics for run timing (min, max, mean, stddev, p95)
// ============================================================================

import type {
	AggregateEntry,
	AggregateSummary,
	Classification,
	ClassifiedEntry,
	TestCaseResult,
	Verdict,
} from './types.js';

/** When a report lists one test id twice in a run, the higher rank wins */
const VERDICT_RANK: Record<Verdict, number> = {
	skipped: 0,
	pass: 1,
	fail: 2,
	error: 3,
};

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

/**
 * Classify a test from its final counts. Observation order never matters.
 *
 * A test that never reached a pass/fail/error verdict (absent from every
 * completed run, or only ever skipped) is `never-observed`.
 */
export function classify(
	entry: Pick<AggregateEntry, 'passCount' | 'failCount' | 'errorCount'>,
): Classification {
	const failures = entry.failCount + entry.errorCount;
	if (entry.passCount >= 1 && failures >= 1) return 'flaky';
	if (entry.passCount === 0 && failures >= 1) return 'stable-failing';
	if (entry.passCount >= 1) return 'stable-passing';
	return 'never-observed';
}

// ---------------------------------------------------------------------------
// FlakinessAggregator
// ---------------------------------------------------------------------------

/**
 * Builds AggregateEntry records incrementally as runs complete.
 *
 * ```ts
 * const aggregator = new FlakinessAggregator();
 * aggregator.append(0, resultsOfRun0);
 * aggregator.append(1, []); // crashed run: nothing observed
 * const summary = aggregator.finalize();
 * console.log(`Flaky: ${summary.totals.flaky}`);
 * ```
 */
export class FlakinessAggregator {
	private readonly entries = new Map<string, AggregateEntry>();
	private readonly runs = new Set<number>();

	/**
	 * Record the results of one run.
	 *
	 * Idempotent per run index: appending a run that was already appended
	 * changes nothing and returns false.
	 */
	append(runIndex: number, results: readonly TestCaseResult[]): boolean {
		if (!Number.isInteger(runIndex) || runIndex < 0) {
			throw new RangeError(`Run index must be a non-negative integer, got ${runIndex}`);
		}
		if (this.runs.has(runIndex)) return false;

		const mismatched = results.find((r) => r.runIndex !== runIndex);
		if (mismatched) {
			throw new Error(
				`Result for "${mismatched.testId}" belongs to run ${mismatched.runIndex}, not run ${runIndex}`,
			);
		}

		this.runs.add(runIndex);

		for (const result of dedupe(results)) {
			const entry: AggregateEntry = this.entries.get(result.testId) ?? {
				testId: result.testId,
				className: result.className,
				name: result.name,
				observations: [],
				passCount: 0,
				failCount: 0,
				errorCount: 0,
				skipCount: 0,
				totalObserved: 0,
			};

			entry.observations.push({
				runIndex,
				verdict: result.verdict,
				duration: result.duration,
				...(result.failureDetail !== undefined ? { failureDetail: result.failureDetail } : {}),
				...(result.failureType !== undefined ? { failureType: result.failureType } : {}),
			});
			switch (result.verdict) {
				case 'pass':
					entry.passCount++;
					break;
				case 'fail':
					entry.failCount++;
					break;
				case 'error':
					entry.errorCount++;
					break;
				case 'skipped':
					entry.skipCount++;
					break;
			}
			entry.totalObserved++;

			this.entries.set(result.testId, entry);
		}

		return true;
	}

	/** Whether a run index has been appended */
	has(runIndex: number): boolean {
		return this.runs.has(runIndex);
	}

	/** Number of distinct runs appended so far */
	get runCount(): number {
		return this.runs.size;
	}

	/**
	 * Snapshot of every test id observed so far, classified.
	 * Safe to call more than once; later appends show up in later snapshots.
	 */
	finalize(): AggregateSummary {
		const totals: Record<Classification, number> = {
			'stable-passing': 0,
			'stable-failing': 0,
			flaky: 0,
			'never-observed': 0,
		};

		const entries: ClassifiedEntry[] = [...this.entries.values()]
			.sort((a, b) => (a.testId < b.testId ? -1 : a.testId > b.testId ? 1 : 0))
			.map((entry) => {
				const classification = classify(entry);
				totals[classification]++;
				return {
					...entry,
					observations: entry.observations.map((o) => ({ ...o })),
					classification,
				};
			});

		return {
			entries,
			runs: [...this.runs].sort((a, b) => a - b),
			totals,
		};
	}
}

/**
 * Collapse repeated test ids within one run to a single result, keeping the
 * first result with the highest-ranked verdict.
 */
function dedupe(results: readonly TestCaseResult[]): TestCaseResult[] {
	const byId = new Map<string, TestCaseResult>();
	for (const result of results) {
		const existing = byId.get(result.testId);
		if (!existing || VERDICT_RANK[result.verdict] > VERDICT_RANK[existing.verdict]) {
			byId.set(result.testId, result);
		}
	}
	return [...byId.values()];
}

// ---------------------------------------------------------------------------
// Duration statistics
// ---------------------------------------------------------------------------

export interface DurationStats {
	mean: number;
	/** Sample standard deviation; 0 with fewer than two samples */
	stdDev: number;
}

/**
 * Mean and spread of run durations (ms).
 */
export function computeDurationStats(durations: readonly number[]): DurationStats {
	if (durations.length === 0) {
		return { mean: 0, stdDev: 0 };
	}

	const mean = durations.reduce((sum, d) => sum + d, 0) / durations.length;
	const variance =
		durations.length > 1
			? durations.reduce((sum, d) => sum + (d - mean) ** 2, 0) / (durations.length - 1)
			: 0;

	return { mean, stdDev: Math.sqrt(variance) };
}
