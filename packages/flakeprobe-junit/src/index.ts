// ============================================================================
// Flakeprobe JUnit - Public API
// ============================================================================

export { parseJUnitXml, parseSeconds } from './junit-parser.js';
export type { JUnitTestCase } from './junit-parser.js';

export {
	clearReports,
	findReportFiles,
	parseRunResults,
	patternToRegExp,
	toTestId,
} from './report-files.js';
export type { ReportLocation } from './report-files.js';
