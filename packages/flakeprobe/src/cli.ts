#!/usr/bin/env node
// ============================================================================
// Flakeprobe - CLI
// Runs a test suite N times and reports which tests flip between runs.
//
// flakeprobe run                         # 30 runs of `mvn clean verify`
// flakeprobe run --runs 10 --debug       # Fewer runs, resolved config logged
// flakeprobe --help                      # Show help
// ============================================================================

import { ConfigError, HarnessIOError } from 'flakeprobe-runner';
import { exitCodeFor, runCommand } from './run-command.js';

const VERSION = '0.1.0';

async function main(): Promise<number> {
	const args = process.argv.slice(2);

	if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
		printHelp();
		return 0;
	}

	if (args.includes('--version') || args.includes('-v')) {
		console.log(`flakeprobe v${VERSION}`);
		return 0;
	}

	const command = args[0];

	switch (command) {
		case 'run':
			return runExperiment(args.slice(1));
		default:
			console.error(`Unknown command: ${command}`);
			console.error('Run "flakeprobe --help" for usage information.');
			return 2;
	}
}

// ---------------------------------------------------------------------------
// Run Command
// ---------------------------------------------------------------------------

async function runExperiment(args: string[]): Promise<number> {
	const controller = new AbortController();
	const force = new AbortController();

	// First signal: stop the current run and still write the reports.
	// Second signal: SIGKILL the subject's process group, then give up.
	const onSignal = (signal: NodeJS.Signals) => {
		if (controller.signal.aborted) {
			// Abort listeners run synchronously, so the kill is sent before exit
			force.abort();
			process.exit(130);
		}
		console.error(`\n  \x1b[33mReceived ${signal}, stopping the current run and writing reports...\x1b[0m`);
		controller.abort();
	};
	process.on('SIGINT', onSignal);
	process.on('SIGTERM', onSignal);

	try {
		const result = await runCommand(args, {
			cwd: process.cwd(),
			env: process.env,
			signal: controller.signal,
			forceKill: force.signal,
		});
		return exitCodeFor(result);
	} finally {
		process.off('SIGINT', onSignal);
		process.off('SIGTERM', onSignal);
	}
}

// ---------------------------------------------------------------------------
// Help
// ---------------------------------------------------------------------------

function printHelp() {
	console.log(`
  flakeprobe v${VERSION} -- find flaky tests by running the suite again and again

  Usage:
    flakeprobe run [options]

  Commands:
    run                 Run the experiment and write reports to the output directory

  Options:
    -n, --runs <n>      Number of runs (default: 30)
    -c, --command <cmd> Build-and-test command (default: "mvn clean verify")
    --cwd <dir>         Working directory of the command (default: .)
    --timeout <ms>      Per-run timeout in milliseconds (default: 2400000)
    -o, --output <dir>  Output directory (default: log)
    --config <file>     Config file (default: flakeprobe.config.{json,js,mjs})
    --bail <n>          Stop after n consecutive crashed runs (default: 0, never)
    --debug             Log the resolved configuration
    -h, --help          Show this help message
    -v, --version       Show version

  Environment:
    FLAKEPROBE_RUNS, FLAKEPROBE_TIMEOUT, FLAKEPROBE_OUTPUT_DIR

  Output:
    flakiness_tests.log   progress and summary
    build_stats.csv       one row per run
    failing_tests.csv     failing tests per run
    flaky_tests.csv       tests that both passed and failed
    run-<i>.output.log    raw output of each run

  Exit codes:
    0  all runs completed, 1  no run completed, 2  configuration or I/O error,
    130  cancelled

  Examples:
    flakeprobe run
    flakeprobe run --runs 50 --command "mvn verify -Dit.test=LoginIT"
    flakeprobe run --cwd ../shop --output ../shop-flakiness --bail 3
`);
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

main()
	.then((code) => {
		process.exitCode = code;
	})
	.catch((err: unknown) => {
		if (err instanceof ConfigError || err instanceof HarnessIOError) {
			console.error(`\x1b[31m${err.message}\x1b[0m`);
			process.exitCode = 2;
			return;
		}
		console.error('Fatal error:', err instanceof Error ? err.message : String(err));
		process.exitCode = 1;
	});
