// ============================================================================
// Flakeprobe - Run Command
// Wires config, runner, parser and writer together for `flakeprobe run`.
// Kept apart from cli.ts so the whole pipeline can run in tests without
// touching process state.
// ============================================================================

import { resolve } from 'node:path';
import {
	ConfigError,
	EventBus,
	type ExperimentResult,
	ExperimentRunner,
	type SpawnSubject,
} from 'flakeprobe-runner';
import { type ReportLocation, clearReports, parseRunResults } from 'flakeprobe-junit';
import { type UserConfig, configFromEnv, loadConfigFile, resolveConfig } from './config.js';
import { attachConsoleReporter } from './console-reporter.js';
import { redact } from './redact.js';
import { ReportWriter } from './report-writer.js';

// ---------------------------------------------------------------------------
// Flags
// ---------------------------------------------------------------------------

export interface CLIFlags {
	runs?: number;
	command?: string;
	cwd?: string;
	timeout?: number;
	output?: string;
	config?: string;
	bail?: number;
	debug?: boolean;
}

/**
 * Parse `flakeprobe run` options. Numbers are passed through unchecked;
 * the config schema rejects bad ones.
 *
 * @throws ConfigError on an unknown option or a missing value
 */
export function parseFlags(args: string[]): CLIFlags {
	const flags: CLIFlags = {};

	const value = (i: number, flag: string): string => {
		const next = args[i];
		if (next === undefined || next.startsWith('--')) {
			throw new ConfigError([`${flag} needs a value`]);
		}
		return next;
	};

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		switch (arg) {
			case '--runs':
			case '-n':
				flags.runs = Number(value(++i, arg));
				break;
			case '--command':
			case '-c':
				flags.command = value(++i, arg);
				break;
			case '--cwd':
				flags.cwd = value(++i, arg);
				break;
			case '--timeout':
				flags.timeout = Number(value(++i, arg));
				break;
			case '--output':
			case '-o':
				flags.output = value(++i, arg);
				break;
			case '--config':
				flags.config = value(++i, arg);
				break;
			case '--bail':
				flags.bail = Number(value(++i, arg));
				break;
			case '--debug':
				flags.debug = true;
				break;
			default:
				throw new ConfigError([`unknown option: ${arg}`]);
		}
	}

	return flags;
}

/** The config layer contributed by CLI flags */
export function flagsToConfig(flags: CLIFlags): UserConfig {
	return {
		runs: flags.runs,
		command: flags.command,
		cwd: flags.cwd,
		timeout: flags.timeout,
		outputDir: flags.output,
		bail: flags.bail,
		debug: flags.debug,
	};
}

// ---------------------------------------------------------------------------
// Command
// ---------------------------------------------------------------------------

export interface RunCommandOptions {
	/** Directory config files and relative paths are resolved against */
	cwd: string;
	env: NodeJS.ProcessEnv;
	/** Aborted on SIGINT/SIGTERM */
	signal?: AbortSignal;
	/** Aborted on a second SIGINT/SIGTERM; kills the subject outright */
	forceKill?: AbortSignal;
	/** Console sink (default: console.log) */
	write?: (line: string) => void;
	/** Replaces child_process spawn; used by tests */
	spawn?: SpawnSubject;
}

/**
 * Run an experiment as `flakeprobe run <args>` would.
 *
 * @throws ConfigError before any run starts
 * @throws HarnessIOError when an artifact cannot be written
 */
export async function runCommand(
	args: string[],
	options: RunCommandOptions,
): Promise<ExperimentResult> {
	const flags = parseFlags(args);
	const file = await loadConfigFile(options.cwd, flags.config);
	const config = resolveConfig(file?.config, configFromEnv(options.env), flagsToConfig(flags));

	const outputDir = resolve(options.cwd, config.outputDir);
	const location: ReportLocation = {
		cwd: resolve(options.cwd, config.cwd),
		reportDirs: config.reportDirs,
		reportPattern: config.reportPattern,
	};

	const writer = new ReportWriter(outputDir);
	if (config.debug) {
		writer.info(
			`Resolved configuration${file ? ` from ${file.path}` : ''}: ${JSON.stringify(redact(config))}`,
		);
	}

	const bus = new EventBus();
	const detach = attachConsoleReporter(bus, options.write);

	try {
		const runner = new ExperimentRunner({
			subject: {
				command: config.command,
				cwd: location.cwd,
				env: config.env,
				timeout: config.timeout,
				killGrace: config.killGrace,
			},
			runs: config.runs,
			outputDir,
			parseResults: (record) => parseRunResults(record, location),
			reporter: writer,
			clearReports: config.clearReports
				? async () => {
						await clearReports(location);
					}
				: undefined,
			prepare: config.prepare,
			beforeEach: config.beforeEach,
			bail: config.bail,
			bus,
			signal: options.signal,
			forceKill: options.forceKill,
			spawn: options.spawn,
		});

		return await runner.run();
	} finally {
		detach();
	}
}

/**
 * 0 when every run completed (failing tests included) or there were none,
 * 130 when cancelled, 1 when no run completed at all.
 */
export function exitCodeFor(result: ExperimentResult): number {
	if (result.cancelled) return 130;
	if (result.runs > 0 && result.completedRuns === 0) return 1;
	return 0;
}
