// ============================================================================
// Flakeprobe Runner - Error System
// Every error says what failed and what to look at next.
//
// Per-run errors (crash, timeout, malformed report) are contained at the run
// boundary. Only HarnessIOError and ConfigError stop an experiment.
// ============================================================================

import type { RunRecord } from './types.js';

/**
 * Base error class for all Flakeprobe errors.
 */
export class FlakeprobeError extends Error {
	override readonly name: string = 'FlakeprobeError';

	/** Hint for how to fix the issue */
	readonly hint?: string;

	constructor(options: { message: string; hint?: string; cause?: unknown }) {
		const parts: string[] = [options.message];
		if (options.hint) {
			parts.push(`Hint: ${options.hint}`);
		}

		super(parts.join('\n'));
		this.hint = options.hint;
		if (options.cause !== undefined) {
			this.cause = options.cause;
		}
	}
}

/**
 * The subject process terminated abnormally.
 */
export class SubjectCrashError extends FlakeprobeError {
	override readonly name = 'SubjectCrashError';
	readonly runIndex: number;

	constructor(record: RunRecord) {
		super({
			message: `Run ${record.runIndex} crashed${record.detail ? ` (${record.detail})` : ''}.`,
			hint: `Inspect ${record.rawOutputRef} for the last output of the subject.`,
		});
		this.runIndex = record.runIndex;
	}
}

/**
 * The subject process exceeded its time budget and was killed.
 */
export class SubjectTimeoutError extends FlakeprobeError {
	override readonly name = 'SubjectTimeoutError';
	readonly runIndex: number;

	constructor(record: RunRecord, timeout: number) {
		super({
			message: `Run ${record.runIndex} timed out after ${timeout}ms and was killed.`,
			hint: 'Raise the timeout if the suite is just slow, or check for a hung browser session.',
		});
		this.runIndex = record.runIndex;
	}
}

/**
 * The test report is missing or unparsable although the exit status says the
 * subject should have written one.
 */
export class MalformedReportError extends FlakeprobeError {
	override readonly name = 'MalformedReportError';
	/** The report file at fault, when one was found */
	readonly file?: string;

	constructor(options: { message: string; file?: string; cause?: unknown }) {
		super({
			message: options.message,
			hint: 'Check reportDirs and reportPattern, and that the build writes JUnit XML reports.',
			cause: options.cause,
		});
		this.file = options.file;
	}
}

/**
 * An output artifact could not be written. Fatal: results would otherwise be
 * lost silently.
 */
export class HarnessIOError extends FlakeprobeError {
	override readonly name = 'HarnessIOError';
	readonly path: string;

	constructor(options: { path: string; cause?: unknown }) {
		const reason = options.cause instanceof Error ? `: ${options.cause.message}` : '';
		super({
			message: `Could not write ${options.path}${reason}`,
			hint: 'Check that the output directory exists, is writable, and the disk is not full.',
			cause: options.cause,
		});
		this.path = options.path;
	}
}

/**
 * The resolved configuration is invalid.
 */
export class ConfigError extends FlakeprobeError {
	override readonly name = 'ConfigError';
	readonly issues: string[];

	constructor(issues: string[], source?: string) {
		super({
			message: `Invalid configuration${source ? ` in ${source}` : ''}:\n${issues.map((i) => `  - ${i}`).join('\n')}`,
			hint: 'Run "flakeprobe --help" for the list of options.',
		});
		this.issues = issues;
	}
}
