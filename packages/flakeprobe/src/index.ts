// ============================================================================
// Flakeprobe - Public API
// Run a test suite N times, find the tests that flip.
//
// // flakeprobe.config.mjs
// import { defineConfig } from 'flakeprobe';
//
// export default defineConfig({
//   runs: 30,
//   command: 'mvn clean verify',
//   beforeEach: ['./reset-db.sh'],
// });
// ============================================================================

// Configuration
export { defineConfig, resolveConfig, configFromEnv, loadConfigFile } from './config.js';
export type { FlakeprobeConfig, UserConfig } from './config.js';

// Running
export { runCommand, parseFlags, flagsToConfig, exitCodeFor } from './run-command.js';
export type { CLIFlags, RunCommandOptions } from './run-command.js';

// Reports
export {
	ReportWriter,
	ARTIFACTS,
	BUILD_STATS_HEADER,
	FAILING_TESTS_HEADER,
	FLAKY_TESTS_HEADER,
	renderBuildStats,
	renderFailingTests,
	renderFlakyTests,
	summarize,
	formatDuration,
} from './report-writer.js';
export { ProgressLog, formatTimestamp } from './progress-log.js';
export type { ProgressLogOptions } from './progress-log.js';
export { attachConsoleReporter, formatConsoleSummary } from './console-reporter.js';
export { toCsv, csvRow, csvField } from './csv.js';
export type { CsvValue } from './csv.js';
export { redact } from './redact.js';

// Re-exports for programmatic use
export {
	ExperimentRunner,
	EventBus,
	FlakinessAggregator,
	ConfigError,
	HarnessIOError,
	MalformedReportError,
	SubjectCrashError,
	SubjectTimeoutError,
} from 'flakeprobe-runner';
export type {
	AggregateSummary,
	Classification,
	ExitStatus,
	RunRecord,
	TestCaseResult,
	Verdict,
} from 'flakeprobe-runner';
export { parseJUnitXml, parseRunResults } from 'flakeprobe-junit';
