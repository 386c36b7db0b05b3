// ============================================================================
// Flakeprobe Runner - Execution Capture
// Runs one full suite execution as a subprocess and seals it into a RunRecord.
//
// The subject is started through the shell, in its own process group on
// POSIX, so that a timeout or cancellation takes down the whole build
// (maven, the forked test JVM, the browser driver) and not just the shell.
// The run ends when the shell exits. Anything it left behind in the group
// gets a short window to flush its output and is then killed.
// ============================================================================

import { type SpawnOptions, spawn } from 'node:child_process';
import { once } from 'node:events';
import { createWriteStream } from 'node:fs';
import { constants } from 'node:os';
import type { Readable } from 'node:stream';
import { finished } from 'node:stream/promises';
import { HarnessIOError } from './errors.js';
import type { ExitStatus, RunRecord, SubjectOptions } from './types.js';

/** How long output may keep flowing after the subject exited */
const OUTPUT_DRAIN_MS = 1_000;

/** The part of a ChildProcess that capture relies on */
export interface SubjectProcess {
	readonly pid?: number;
	readonly stdout: Readable | null;
	readonly stderr: Readable | null;
	kill(signal?: NodeJS.Signals): boolean;
	once(
		event: 'exit',
		listener: (code: number | null, signal: NodeJS.Signals | null) => void,
	): unknown;
	once(event: 'error', listener: (err: Error) => void): unknown;
}

/** Starts the subject. Replaced by an in-process fake in tests. */
export type SpawnSubject = (command: string, options: SpawnOptions) => SubjectProcess;

export interface CaptureOptions extends SubjectOptions {
	runIndex: number;
	/** File receiving the combined stdout/stderr */
	outputFile: string;
	/** Aborting terminates the subject; the run is recorded as crashed */
	signal?: AbortSignal;
	/** Aborting sends SIGKILL to the subject at once, skipping the grace period */
	forceKill?: AbortSignal;
	spawn?: SpawnSubject;
}

export interface ProcessOutcome {
	code: number | null;
	signal: NodeJS.Signals | null;
	spawnError?: Error;
}

export type StopReason = 'timeout' | 'cancelled';

const defaultSpawn: SpawnSubject = (command, options) => spawn(command, options);

/**
 * Run the subject command once and block until it exits or the timeout
 * elapses.
 *
 * ```ts
 * const record = await captureExecution({
 *   command: 'mvn clean verify',
 *   cwd: '/work/app',
 *   env: {},
 *   timeout: 40 * 60_000,
 *   killGrace: 5_000,
 *   runIndex: 0,
 *   outputFile: 'log/run-0.output.log',
 * });
 * ```
 *
 * @throws HarnessIOError when the output file cannot be written
 */
export async function captureExecution(options: CaptureOptions): Promise<RunRecord> {
	const out = createWriteStream(options.outputFile, { flags: 'w' });
	let writeError: unknown;
	try {
		await once(out, 'open');
	} catch (err) {
		throw new HarnessIOError({ path: options.outputFile, cause: err });
	}
	out.on('error', (err) => {
		writeError = err;
	});

	const startTime = Date.now();
	const append = (chunk: Buffer | string) => {
		out.write(chunk);
	};

	let stopReason: StopReason | null = null;
	let outcome: ProcessOutcome;

	if (options.signal?.aborted) {
		stopReason = 'cancelled';
		outcome = { code: null, signal: null };
	} else {
		outcome = await runSubject(options, append, (reason) => {
			stopReason ??= reason;
		});
	}

	const endTime = Date.now();

	out.end();
	try {
		await finished(out);
	} catch (err) {
		writeError ??= err;
	}
	if (writeError !== undefined) {
		throw new HarnessIOError({ path: options.outputFile, cause: writeError });
	}

	const { exitStatus, detail } = classifyExit(outcome, stopReason, options.timeout);

	const record: RunRecord = Object.freeze({
		runIndex: options.runIndex,
		startedAt: new Date(startTime).toISOString(),
		endedAt: new Date(endTime).toISOString(),
		duration: endTime - startTime,
		exitStatus,
		exitCode: outcome.code,
		signal: outcome.signal,
		rawOutputRef: options.outputFile,
		...(detail ? { detail } : {}),
	});
	return record;
}

// ---------------------------------------------------------------------------
// Process supervision
// ---------------------------------------------------------------------------

async function runSubject(
	options: CaptureOptions,
	onOutput: (chunk: Buffer | string) => void,
	onStop: (reason: StopReason) => void,
): Promise<ProcessOutcome> {
	const spawnSubject = options.spawn ?? defaultSpawn;
	const useGroup = process.platform !== 'win32';

	const child = spawnSubject(options.command, {
		cwd: options.cwd,
		env: { ...process.env, ...options.env },
		shell: true,
		detached: useGroup,
		stdio: ['ignore', 'pipe', 'pipe'],
	});

	const streams = [child.stdout, child.stderr].filter((s): s is Readable => s !== null);
	for (const stream of streams) stream.on('data', onOutput);

	const outcome = await new Promise<ProcessOutcome>((resolve) => {
		let settled = false;
		let stopping = false;
		let graceTimer: NodeJS.Timeout | undefined;

		const stop = (reason: StopReason) => {
			if (settled || stopping) return;
			stopping = true;
			onStop(reason);
			terminate(child, 'SIGTERM', useGroup);
			// Give it killGrace ms to die, then force kill
			graceTimer = setTimeout(() => terminate(child, 'SIGKILL', useGroup), options.killGrace);
		};

		const timeoutTimer = setTimeout(() => stop('timeout'), options.timeout);
		const onAbort = () => stop('cancelled');
		const onForceKill = () => {
			stop('cancelled');
			if (!settled) terminate(child, 'SIGKILL', useGroup);
		};
		options.signal?.addEventListener('abort', onAbort, { once: true });
		options.forceKill?.addEventListener('abort', onForceKill, { once: true });

		const settle = (result: ProcessOutcome) => {
			if (settled) return;
			settled = true;
			clearTimeout(timeoutTimer);
			if (graceTimer) clearTimeout(graceTimer);
			options.signal?.removeEventListener('abort', onAbort);
			options.forceKill?.removeEventListener('abort', onForceKill);
			resolve(result);
		};

		// Settle on 'exit': leftover processes may hold the pipes open past it
		child.once('exit', (code, signal) => settle({ code, signal }));
		child.once('error', (err) => {
			// Only a failed spawn ends the run here; a failed kill still gets 'exit'
			if (child.pid === undefined) {
				settle({ code: null, signal: null, spawnError: err });
			}
		});
	});

	if (outcome.spawnError === undefined) {
		// Reap whatever the subject left running in its group
		const reap = () => {
			if (useGroup && child.pid !== undefined) signalGroup(child.pid, 'SIGKILL');
		};
		options.forceKill?.addEventListener('abort', reap, { once: true });
		await drainOutput(streams, OUTPUT_DRAIN_MS);
		options.forceKill?.removeEventListener('abort', reap);
		reap();
	}
	for (const stream of streams) stream.destroy();

	return outcome;
}

/** Wait at most `ms` for the streams to end */
async function drainOutput(streams: Readable[], ms: number): Promise<void> {
	let timer: NodeJS.Timeout | undefined;
	const expired = new Promise<void>((resolve) => {
		timer = setTimeout(resolve, ms);
	});
	// A read error ends a stream too; either way there is nothing more to copy
	const drained = Promise.allSettled(streams.map((s) => finished(s)));
	try {
		await Promise.race([drained, expired]);
	} finally {
		clearTimeout(timer);
	}
}

function terminate(child: SubjectProcess, signal: NodeJS.Signals, group: boolean): void {
	if (group && child.pid !== undefined && signalGroup(child.pid, signal)) return;
	child.kill(signal);
}

/** Signal a whole process group. False when the group is already gone. */
function signalGroup(pid: number, signal: NodeJS.Signals): boolean {
	try {
		process.kill(-pid, signal);
		return true;
	} catch {
		return false;
	}
}

// ---------------------------------------------------------------------------
// Exit classification
// ---------------------------------------------------------------------------

/**
 * Map a process outcome to an exit status.
 *
 * A shell reports a child killed by signal N as exit code 128 + N, so
 * those codes count as crashes too.
 */
export function classifyExit(
	outcome: ProcessOutcome,
	stopReason: StopReason | null,
	timeout: number,
): { exitStatus: ExitStatus; detail?: string } {
	if (stopReason === 'timeout') {
		return { exitStatus: 'timed_out', detail: `killed after ${timeout}ms timeout` };
	}
	if (stopReason === 'cancelled') {
		return { exitStatus: 'crashed', detail: 'cancelled' };
	}
	if (outcome.spawnError) {
		return { exitStatus: 'crashed', detail: `failed to start: ${outcome.spawnError.message}` };
	}
	if (outcome.signal) {
		return { exitStatus: 'crashed', detail: `killed by ${outcome.signal}` };
	}
	if (outcome.code === 0) {
		return { exitStatus: 'ordinary' };
	}
	if (outcome.code !== null && outcome.code > 128) {
		const signalName = signalNameOf(outcome.code - 128);
		if (signalName) {
			return { exitStatus: 'crashed', detail: `exited with ${outcome.code} (${signalName})` };
		}
	}
	return { exitStatus: 'non-zero' };
}

function signalNameOf(signalNumber: number): string | undefined {
	for (const [name, value] of Object.entries(constants.signals)) {
		if (value === signalNumber) return name;
	}
	return undefined;
}
