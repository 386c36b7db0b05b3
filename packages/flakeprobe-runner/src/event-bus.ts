// ============================================================================
// Flakeprobe Runner — EventBus
// Type-safe event system for the experiment loop.
// The CLI console reporter and tests plug into these events.
// ============================================================================

import type { MalformedReportError } from './errors.js';
import type { AggregateSummary, RunRecord, TestCaseResult } from './types.js';

// ---------------------------------------------------------------------------
// Event Map — every event and its payload
// ---------------------------------------------------------------------------

export type HookPhase = 'prepare' | 'beforeEach';

export interface ExperimentEvents {
	// Experiment lifecycle
	'experiment:start': { runs: number; command: string; cwd: string };
	'experiment:end': {
		summary: AggregateSummary;
		records: readonly RunRecord[];
		cancelled: boolean;
		duration: number;
	};

	// Setup commands
	'hook:start': { phase: HookPhase; command: string; runIndex: number | null };
	'hook:fail': { phase: HookPhase; command: string; runIndex: number | null; record: RunRecord };

	// Run lifecycle
	'run:start': { runIndex: number; runs: number };
	'run:end': RunRecord;
	'run:results': { runIndex: number; results: readonly TestCaseResult[] };
	'run:malformed': { runIndex: number; error: MalformedReportError };
}

// ---------------------------------------------------------------------------
// Listener type helper
// ---------------------------------------------------------------------------

export type EventListener<K extends keyof ExperimentEvents> = (payload: ExperimentEvents[K]) => void;

type AnyListener = (payload: never) => void;

// ---------------------------------------------------------------------------
// EventBus
// ---------------------------------------------------------------------------

/**
 * Synchronous event bus. Listeners see events in emission order.
 *
 * ```ts
 * const bus = new EventBus();
 * bus.on('run:end', (record) => console.log(record.exitStatus));
 * ```
 */
export class EventBus {
	private listeners = new Map<keyof ExperimentEvents, Set<AnyListener>>();
	private history: Array<{ event: keyof ExperimentEvents; payload: unknown; timestamp: number }> =
		[];
	private recordHistory = false;

	/**
	 * Register a listener for an event.
	 * Returns an unsubscribe function.
	 */
	on<K extends keyof ExperimentEvents>(event: K, listener: EventListener<K>): () => void {
		const set = this.listeners.get(event) ?? new Set<AnyListener>();
		this.listeners.set(event, set);
		set.add(listener);

		return () => {
			set.delete(listener);
			if (set.size === 0) this.listeners.delete(event);
		};
	}

	/**
	 * Register a one-time listener.
	 */
	once<K extends keyof ExperimentEvents>(event: K, listener: EventListener<K>): () => void {
		const unsubscribe = this.on(event, (payload: ExperimentEvents[K]) => {
			unsubscribe();
			listener(payload);
		});
		return unsubscribe;
	}

	/**
	 * Remove all listeners for a specific event, or all events.
	 */
	off<K extends keyof ExperimentEvents>(event?: K): void {
		if (event) {
			this.listeners.delete(event);
		} else {
			this.listeners.clear();
		}
	}

	/**
	 * Emit an event synchronously to all registered listeners.
	 * A throwing listener is reported on stderr and does not stop the others.
	 */
	emit<K extends keyof ExperimentEvents>(event: K, payload: ExperimentEvents[K]): void {
		if (this.recordHistory) {
			this.history.push({ event, payload, timestamp: Date.now() });
		}

		const set = this.listeners.get(event);
		if (!set) return;

		for (const listener of set) {
			try {
				(listener as EventListener<K>)(payload);
			} catch (err) {
				console.error(
					`[flakeprobe] listener for "${event}" threw: ${err instanceof Error ? err.message : String(err)}`,
				);
			}
		}
	}

	// -----------------------------------------------------------------------
	// History (for debugging / test assertions)
	// -----------------------------------------------------------------------

	enableHistory(): void {
		this.recordHistory = true;
	}

	/**
	 * Get events of a specific type from history.
	 */
	getEventsOfType<K extends keyof ExperimentEvents>(event: K): Array<ExperimentEvents[K]> {
		return this.history
			.filter((h) => h.event === event)
			.map((h) => h.payload as ExperimentEvents[K]);
	}
}
