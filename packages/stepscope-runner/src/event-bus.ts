// ============================================================================
// stepscope Runner - EventBus
// Type-safe event system for batch execution.
// The CLI progress line and any reporter plug into these events.
// ============================================================================

import { errorMessage, silentLogger } from 'stepscope-bdd';
import type { Logger, RunStatus } from 'stepscope-bdd';
import type { BatchProgressSnapshot, BatchResult } from './types.js';

// ---------------------------------------------------------------------------
// Event Map - every event and its payload
// ---------------------------------------------------------------------------

export interface BatchEvents {
	// Batch lifecycle
	'batch:start': { total: number; workers: number; parallel: boolean };
	'batch:end': { result: BatchResult };

	// Feature lifecycle
	'feature:start': { path: string; worker: string };
	'feature:end': {
		path: string;
		worker: string;
		status: RunStatus;
		durationMs: number;
		error?: string;
	};

	// Progress
	'progress': BatchProgressSnapshot;
}

export type BatchEventName = keyof BatchEvents;

// ---------------------------------------------------------------------------
// Listener type helper
// ---------------------------------------------------------------------------

export type EventListener<K extends BatchEventName> = (payload: BatchEvents[K]) => void;

type ListenerTable = { [K in BatchEventName]?: Set<EventListener<K>> };
type HistoryTable = { [K in BatchEventName]?: Array<{ payload: BatchEvents[K]; timestamp: number }> };

// ---------------------------------------------------------------------------
// EventBus
// ---------------------------------------------------------------------------

/**
 * Synchronous, typed event bus. Listeners always see events in emission
 * order. A throwing listener is logged and does not reach the emitter.
 *
 * ```ts
 * const bus = new EventBus();
 * bus.on('feature:end', ({ path, status }) => { ... });
 * bus.on('batch:end', ({ result }) => { ... });
 * ```
 */
export class EventBus {
	private listeners: ListenerTable = {};
	private history: HistoryTable = {};
	private order: Array<{ event: BatchEventName; timestamp: number }> = [];
	private recordHistory = false;
	private readonly logger: Logger;

	constructor(options: { logger?: Logger } = {}) {
		this.logger = options.logger ?? silentLogger;
	}

	// -----------------------------------------------------------------------
	// Subscription
	// -----------------------------------------------------------------------

	/**
	 * Register a listener for an event.
	 * Returns an unsubscribe function.
	 */
	on<K extends BatchEventName>(event: K, listener: EventListener<K>): () => void {
		const set = this.listenersFor(event);
		set.add(listener);

		return () => {
			set.delete(listener);
		};
	}

	/**
	 * Register a one-time listener. Removed after the first call.
	 */
	once<K extends BatchEventName>(event: K, listener: EventListener<K>): () => void {
		const unsubscribe = this.on(event, (payload) => {
			unsubscribe();
			listener(payload);
		});
		return unsubscribe;
	}

	/**
	 * Remove all listeners for one event, or for every event.
	 */
	off(event?: BatchEventName): void {
		if (event) {
			delete this.listeners[event];
		} else {
			this.listeners = {};
		}
	}

	// -----------------------------------------------------------------------
	// Emission
	// -----------------------------------------------------------------------

	emit<K extends BatchEventName>(event: K, payload: BatchEvents[K]): void {
		if (this.recordHistory) {
			const timestamp = Date.now();
			this.historyFor(event).push({ payload, timestamp });
			this.order.push({ event, timestamp });
		}

		const set: Set<EventListener<K>> | undefined = this.listeners[event];
		if (!set) return;

		for (const listener of [...set]) {
			try {
				listener(payload);
			} catch (err) {
				this.logger.warn(`listener for '${event}' threw: ${errorMessage(err)}`);
			}
		}
	}

	// -----------------------------------------------------------------------
	// Introspection
	// -----------------------------------------------------------------------

	listenerCount(event?: BatchEventName): number {
		if (event) {
			return this.listeners[event]?.size ?? 0;
		}
		return this.eventNames().reduce((total, name) => total + this.listenerCount(name), 0);
	}

	/** Events that currently have listeners. */
	eventNames(): BatchEventName[] {
		const names: BatchEventName[] = ['batch:start', 'batch:end', 'feature:start', 'feature:end', 'progress'];
		return names.filter((name) => (this.listeners[name]?.size ?? 0) > 0);
	}

	// -----------------------------------------------------------------------
	// History (for debugging / test assertions)
	// -----------------------------------------------------------------------

	enableHistory(): void {
		this.recordHistory = true;
	}

	/** Stop recording and forget what was recorded. */
	disableHistory(): void {
		this.recordHistory = false;
		this.clearHistory();
	}

	/** Event names in emission order. */
	getHistory(): ReadonlyArray<{ event: BatchEventName; timestamp: number }> {
		return this.order;
	}

	getEventsOfType<K extends BatchEventName>(
		event: K,
	): ReadonlyArray<{ payload: BatchEvents[K]; timestamp: number }> {
		const entries: Array<{ payload: BatchEvents[K]; timestamp: number }> | undefined = this.history[event];
		return entries ?? [];
	}

	clearHistory(): void {
		this.history = {};
		this.order = [];
	}

	// -----------------------------------------------------------------------
	// Internals
	// -----------------------------------------------------------------------

	private listenersFor<K extends BatchEventName>(event: K): Set<EventListener<K>> {
		const existing: Set<EventListener<K>> | undefined = this.listeners[event];
		if (existing) return existing;
		const created = new Set<EventListener<K>>();
		const table: { [P in K]?: Set<EventListener<P>> } = this.listeners;
		table[event] = created;
		return created;
	}

	private historyFor<K extends BatchEventName>(
		event: K,
	): Array<{ payload: BatchEvents[K]; timestamp: number }> {
		const existing: Array<{ payload: BatchEvents[K]; timestamp: number }> | undefined = this.history[event];
		if (existing) return existing;
		const created: Array<{ payload: BatchEvents[K]; timestamp: number }> = [];
		const table: { [P in K]?: Array<{ payload: BatchEvents[P]; timestamp: number }> } = this.history;
		table[event] = created;
		return created;
	}
}
