// ============================================================================
// stepscope Runner - Worker Pool
// A fixed number of logical workers pulling items from one shared queue.
//
// - Each item is taken by exactly one worker
// - A worker picks up the next item as soon as it finishes the last one
// - Once the signal aborts, no further items are dequeued; whatever is left
//   in the queue is handed back as undispatched
// ============================================================================

import { toError } from 'stepscope-bdd';

// ---------------------------------------------------------------------------
// Worker State
// ---------------------------------------------------------------------------

export type WorkerState = 'idle' | 'busy' | 'stopped';

export interface WorkerInfo {
	/** e.g. "worker-0" */
	id: string;
	/** 0-based index within the pool */
	index: number;
}

export interface Worker<T> {
	info: WorkerInfo;
	state: WorkerState;
	/** The item currently being processed (if busy) */
	currentItem: T | null;
	completedCount: number;
}

/** Processes one item on one worker */
export type TaskExecutor<T, R> = (item: T, worker: WorkerInfo) => Promise<R>;

export type TaskOutcome<T, R> =
	| { item: T; worker: WorkerInfo; ok: true; value: R }
	| { item: T; worker: WorkerInfo; ok: false; error: Error };

export interface PoolRun<T, R> {
	/** In completion order */
	outcomes: Array<TaskOutcome<T, R>>;
	/** Items still queued when the signal aborted, in queue order */
	undispatched: T[];
}

export interface WorkerPoolConfig {
	/** Number of workers (minimum 1) */
	size: number;
}

// ---------------------------------------------------------------------------
// WorkerPool
// ---------------------------------------------------------------------------

/**
 * ```ts
 * const pool = new WorkerPool<string, ExecutionResult>({ size: 4 });
 * const { outcomes } = await pool.run(paths, async (path, worker) => runFeature(path));
 * ```
 */
export class WorkerPool<T, R> {
	private readonly workers: Array<Worker<T>> = [];

	constructor(config: WorkerPoolConfig) {
		const size = Math.max(1, Math.floor(config.size));
		for (let i = 0; i < size; i++) {
			this.workers.push({
				info: { id: `worker-${i}`, index: i },
				state: 'idle',
				currentItem: null,
				completedCount: 0,
			});
		}
	}

	// -----------------------------------------------------------------------
	// Pool info
	// -----------------------------------------------------------------------

	getWorkers(): ReadonlyArray<Readonly<Worker<T>>> {
		return this.workers;
	}

	getIdleWorkers(): ReadonlyArray<Readonly<Worker<T>>> {
		return this.workers.filter((w) => w.state === 'idle');
	}

	get size(): number {
		return this.workers.length;
	}

	// -----------------------------------------------------------------------
	// Run
	// -----------------------------------------------------------------------

	/**
	 * Process every item. Resolves once every dispatched item has reported.
	 * A rejected task becomes an `ok: false` outcome; it never stops the run.
	 */
	async run(items: readonly T[], executor: TaskExecutor<T, R>, signal?: AbortSignal): Promise<PoolRun<T, R>> {
		const queue = [...items];
		const outcomes: Array<TaskOutcome<T, R>> = [];

		if (queue.length > 0) {
			await Promise.all(
				this.workers
					.slice(0, queue.length)
					.map((worker) => this.workerLoop(worker, queue, outcomes, executor, signal)),
			);
		}

		return { outcomes, undispatched: queue };
	}

	// -----------------------------------------------------------------------
	// Worker loop
	// -----------------------------------------------------------------------

	/**
	 * Each worker runs this loop: pull from queue → execute → repeat.
	 */
	private async workerLoop(
		worker: Worker<T>,
		queue: T[],
		outcomes: Array<TaskOutcome<T, R>>,
		executor: TaskExecutor<T, R>,
		signal: AbortSignal | undefined,
	): Promise<void> {
		while (queue.length > 0 && !signal?.aborted) {
			const item = queue.shift();
			if (item === undefined) break;

			worker.state = 'busy';
			worker.currentItem = item;

			try {
				const value = await executor(item, worker.info);
				outcomes.push({ item, worker: worker.info, ok: true, value });
			} catch (err) {
				outcomes.push({ item, worker: worker.info, ok: false, error: toError(err) });
			}

			worker.completedCount++;
			worker.currentItem = null;
			worker.state = 'idle';
		}

		if (signal?.aborted) {
			worker.state = 'stopped';
		}
	}
}
