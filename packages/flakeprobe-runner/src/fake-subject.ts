// ============================================================================
// Flakeprobe Runner - Fake Subject
// An in-process stand-in for the subject process. Scripts what each spawn
// prints, how it exits, and what it leaves on disk, without starting a
// shell. Published as flakeprobe-runner/testing for test suites.
//
// const fake = new FakeSubject((_cmd, call) => ({ exitCode: call === 1 ? 1 : 0 }));
// await captureExecution({ ...options, spawn: fake.spawn });
// ============================================================================

import type { SpawnOptions } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import type { SpawnSubject, SubjectProcess } from './execution-capture.js';

/** How one scripted process behaves */
export interface FakeRun {
	stdout?: string[];
	stderr?: string[];
	/** Exit code when it exits on its own (default: 0) */
	exitCode?: number;
	/** Die from this signal instead of exiting */
	signal?: NodeJS.Signals;
	/** ms before exiting; 'never' waits to be killed (default: 0) */
	delay?: number | 'never';
	/** Fail to start with this message */
	spawnError?: string;
	/** Only SIGKILL ends it */
	ignoreTerm?: boolean;
	/** Runs after start, before any output; e.g. writes report files */
	onStart?: (command: string, options: SpawnOptions) => void | Promise<void>;
}

class FakeChildProcess extends EventEmitter implements SubjectProcess {
	readonly pid: number | undefined = undefined;
	readonly stdout = new PassThrough();
	readonly stderr = new PassThrough();
	private exited = false;

	get hasExited(): boolean {
		return this.exited;
	}

	constructor(
		private readonly onKill: (signal: NodeJS.Signals) => void,
		private readonly ignoreTerm: boolean,
	) {
		super();
	}

	kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
		this.onKill(signal);
		if (this.exited) return false;
		if (signal === 'SIGTERM' && this.ignoreTerm) return true;
		this.exit(null, signal);
		return true;
	}

	exit(code: number | null, signal: NodeJS.Signals | null): void {
		if (this.exited) return;
		this.exited = true;
		this.stdout.end();
		this.stderr.end();
		setImmediate(() => this.emit('exit', code, signal));
	}
}

export class FakeSubject {
	/** Every spawn, in order */
	readonly calls: Array<{ command: string; options: SpawnOptions }> = [];
	/** Every signal sent to any fake process, in order */
	readonly kills: NodeJS.Signals[] = [];

	private readonly script: (command: string, call: number) => FakeRun;

	constructor(script: (command: string, call: number) => FakeRun = () => ({})) {
		this.script = script;
	}

	readonly spawn: SpawnSubject = (command, options) => {
		const call = this.calls.length;
		this.calls.push({ command, options });
		const run = this.script(command, call);

		const child = new FakeChildProcess((signal) => this.kills.push(signal), run.ignoreTerm ?? false);

		const start = async () => {
			if (run.spawnError !== undefined) {
				child.emit('error', new Error(run.spawnError));
				return;
			}
			await run.onStart?.(command, options);
			if (child.hasExited) return;
			for (const chunk of run.stdout ?? []) child.stdout.write(chunk);
			for (const chunk of run.stderr ?? []) child.stderr.write(chunk);

			const delay = run.delay ?? 0;
			if (delay === 'never') return;
			setTimeout(() => {
				if (run.signal) child.exit(null, run.signal);
				else child.exit(run.exitCode ?? 0, null);
			}, delay);
		};

		setImmediate(() => {
			start().catch((err: unknown) => {
				child.emit('error', err instanceof Error ? err : new Error(String(err)));
			});
		});

		return child;
	};
}
