// ============================================================================
// Flakeprobe Runner - Public API
// Run orchestration, execution capture, aggregation and classification.
// ============================================================================

export { ExperimentRunner } from './orchestrator.js';
export type {
	ExperimentOptions,
	ExperimentOutcome,
	ExperimentReporter,
	ExperimentResult,
	ResultParser,
} from './orchestrator.js';

export { captureExecution, classifyExit } from './execution-capture.js';
export type {
	CaptureOptions,
	ProcessOutcome,
	SpawnSubject,
	StopReason,
	SubjectProcess,
} from './execution-capture.js';

export { FlakinessAggregator, classify, computeDurationStats } from './flakiness-aggregator.js';
export type { DurationStats } from './flakiness-aggregator.js';

export { EventBus } from './event-bus.js';
export type { EventListener, ExperimentEvents, HookPhase } from './event-bus.js';

export { classifyFailure } from './failure-classifier.js';
export type {
	FailureCategory,
	ReportedFailure,
} from './failure-classifier.js';

export {
	ConfigError,
	FlakeprobeError,
	HarnessIOError,
	MalformedReportError,
	SubjectCrashError,
	SubjectTimeoutError,
} from './errors.js';

export type {
	AggregateEntry,
	AggregateSummary,
	Classification,
	ClassifiedEntry,
	ExitStatus,
	Observation,
	RunRecord,
	SubjectOptions,
	TestCaseResult,
	Verdict,
} from './types.js';
