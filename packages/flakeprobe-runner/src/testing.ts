// ============================================================================
// Flakeprobe Runner - Test Helpers
// In-process stand-ins for the subject, for suites that drive the runner
// without starting real builds.
// ============================================================================

export { FakeSubject } from './fake-subject.js';
export type { FakeRun } from './fake-subject.js';
