// ============================================================================
// Flakeprobe - Progress Log
// Appends timestamped lines to flakiness_tests.log as things happen, so a
// crash of the harness itself still leaves a trail up to the last run.
// ============================================================================

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { HarnessIOError } from 'flakeprobe-runner';

export interface ProgressLogOptions {
	/** Clock for timestamps (default: () => new Date()) */
	now?: () => Date;
}

/**
 * `2026-03-14 09:26:53,589`: local time, comma before the milliseconds.
 */
export function formatTimestamp(date: Date): string {
	const pad = (n: number, width = 2) => String(n).padStart(width, '0');
	return (
		`${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
		`${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())},` +
		pad(date.getMilliseconds(), 3)
	);
}

export class ProgressLog {
	readonly file: string;
	private readonly now: () => Date;

	/**
	 * @throws HarnessIOError when the log directory cannot be created
	 */
	constructor(file: string, options: ProgressLogOptions = {}) {
		this.file = file;
		this.now = options.now ?? (() => new Date());

		try {
			mkdirSync(dirname(file), { recursive: true });
		} catch (err) {
			throw new HarnessIOError({ path: dirname(file), cause: err });
		}
	}

	info(message: string): void {
		this.append(`${formatTimestamp(this.now())} ${message}`);
	}

	warn(message: string): void {
		this.append(`${formatTimestamp(this.now())} WARNING ${message}`);
	}

	private append(line: string): void {
		try {
			appendFileSync(this.file, `${line}\n`, 'utf-8');
		} catch (err) {
			throw new HarnessIOError({ path: this.file, cause: err });
		}
	}
}
