// ============================================================================
// Flakeprobe - Console Reporter
// Live progress on stdout, driven by the runner's EventBus. The log file
// gets the plain record; this is the view for whoever is watching.
// ============================================================================

import type { EventBus, ExperimentEvents, RunRecord } from 'flakeprobe-runner';
import { formatDuration } from './report-writer.js';

function statusIcon(status: RunRecord['exitStatus']): string {
	switch (status) {
		case 'ordinary':
			return '\x1b[32m+\x1b[0m';
		case 'non-zero':
			return '\x1b[31mx\x1b[0m';
		default:
			return '\x1b[33m!\x1b[0m';
	}
}

/**
 * Print progress for every experiment event. Returns a function that
 * detaches all listeners.
 */
export function attachConsoleReporter(
	bus: EventBus,
	write: (line: string) => void = console.log,
): () => void {
	let runs = 0;
	const finished = new Map<number, RunRecord>();

	const unsubscribers = [
		bus.on('experiment:start', (e) => {
			runs = e.runs;
			write(`\n  flakeprobe: ${e.runs} run(s) of \`${e.command}\`\n  in ${e.cwd}\n`);
		}),
		bus.on('hook:start', (e) => {
			write(`  \x1b[90m$ ${e.command}\x1b[0m`);
		}),
		bus.on('hook:fail', (e) => {
			write(`  \x1b[33m!\x1b[0m ${e.phase} command ended ${e.record.exitStatus}`);
		}),
		bus.on('run:end', (record) => {
			finished.set(record.runIndex, record);
		}),
		bus.on('run:malformed', (e) => {
			write(`  \x1b[33m!\x1b[0m run ${e.runIndex + 1}: no usable test report`);
		}),
		bus.on('run:results', (e) => {
			const record = finished.get(e.runIndex);
			if (!record) return;
			const detail = record.detail ? `, ${record.detail}` : '';
			write(
				`  ${statusIcon(record.exitStatus)} run ${e.runIndex + 1}/${runs}  ` +
					`${record.exitStatus}${detail}  ${e.results.length} test(s)  (${formatDuration(record.duration)})`,
			);
		}),
		bus.on('experiment:end', (e) => {
			write(formatConsoleSummary(e));
		}),
	];

	return () => {
		for (const unsubscribe of unsubscribers) unsubscribe();
	};
}

/**
 * Format a concise summary block for console output.
 */
export function formatConsoleSummary(e: ExperimentEvents['experiment:end']): string {
	const { totals } = e.summary;
	const lines: string[] = [];

	lines.push('');
	lines.push('  ═══════════════════════════════════════');
	lines.push(`  Runs:     ${e.records.length}${e.cancelled ? ' (cancelled)' : ''}`);

	const parts: string[] = [];
	if (totals['stable-passing'] > 0) parts.push(`\x1b[32m${totals['stable-passing']} stable\x1b[0m`);
	if (totals['stable-failing'] > 0) parts.push(`\x1b[31m${totals['stable-failing']} failing\x1b[0m`);
	if (totals.flaky > 0) parts.push(`\x1b[33m${totals.flaky} flaky\x1b[0m`);
	if (totals['never-observed'] > 0) parts.push(`\x1b[90m${totals['never-observed']} unobserved\x1b[0m`);
	lines.push(`  Tests:    ${parts.length > 0 ? parts.join(', ') : 'none observed'}`);

	for (const entry of e.summary.entries) {
		if (entry.classification !== 'flaky') continue;
		lines.push(
			`    \x1b[33m~\x1b[0m ${entry.testId} (${entry.passCount}/${entry.totalObserved} passed)`,
		);
	}

	lines.push(`  Duration: ${formatDuration(e.duration)}`);
	lines.push('  ═══════════════════════════════════════');
	lines.push('');

	return lines.join('\n');
}
