// ============================================================================
// Batch Executor - runs many feature files and aggregates the outcome.
//
// Flow:
//   1. Emit batch:start
//   2. Dispatch paths to a WorkerPool (size 1 for sequential runs)
//   3. Each task: feature:start → runner (with timeout) → feature:end
//   4. The progress collector records every finished feature
//   5. Undispatched paths (cancellation) become `cancelled` errors
//   6. Sum the FeatureResult rows once and emit batch:end
//
// A failing feature never stops the batch.
// ============================================================================

import { availableParallelism } from 'node:os';
import { basename, extname } from 'node:path';
import { errorMessage, silentLogger } from 'stepscope-bdd';
import type { Logger } from 'stepscope-bdd';
import { EventBus } from './event-bus.js';
import type {
	BatchConfig,
	BatchError,
	BatchProgressSnapshot,
	BatchResult,
	FeatureOutcome,
	FeatureResult,
	FeatureRunner,
} from './types.js';
import { WorkerPool } from './worker-pool.js';

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_BATCH_CONFIG: Readonly<BatchConfig> = Object.freeze({
	parallel: true,
	workers: availableParallelism(),
	timeoutMs: 300_000,
});

export interface BatchExecuteOptions {
	/** Stops dispatching new features; running ones see their signal abort */
	signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Progress collector
// ---------------------------------------------------------------------------

/** The single place finished features are recorded. */
export class BatchProgress {
	readonly total: number;
	private readonly startedAt: number;
	private readonly features: FeatureResult[] = [];
	private readonly errors: BatchError[] = [];

	constructor(total: number, startedAt: number = Date.now()) {
		this.total = total;
		this.startedAt = startedAt;
	}

	record(feature: FeatureResult, error?: BatchError): BatchProgressSnapshot {
		this.features.push(feature);
		if (error) this.errors.push(error);
		return this.snapshot();
	}

	get completed(): number {
		return this.features.length;
	}

	snapshot(): BatchProgressSnapshot {
		return {
			completed: this.features.length,
			total: this.total,
			fraction: this.total === 0 ? 0 : this.features.length / this.total,
			elapsedMs: Date.now() - this.startedAt,
		};
	}

	collectResults(): FeatureResult[] {
		return [...this.features];
	}

	collectErrors(): BatchError[] {
		return [...this.errors];
	}
}

// ---------------------------------------------------------------------------
// Executor
// ---------------------------------------------------------------------------

/**
 * ```ts
 * const executor = new BatchExecutor({ workers: 4 });
 * executor.bus.on('progress', (p) => render(p));
 * const result = await executor.execute(paths, async (path, ctx) => ({ ok: true, value: await run(path) }));
 * ```
 */
export class BatchExecutor {
	readonly config: BatchConfig;
	readonly bus: EventBus;
	private readonly logger: Logger;

	constructor(config: Partial<BatchConfig> = {}, options: { bus?: EventBus; logger?: Logger } = {}) {
		this.config = { ...DEFAULT_BATCH_CONFIG, ...config };
		this.logger = options.logger ?? silentLogger;
		this.bus = options.bus ?? new EventBus({ logger: this.logger });
	}

	async execute(
		paths: readonly string[],
		runner: FeatureRunner,
		options: BatchExecuteOptions = {},
	): Promise<BatchResult> {
		const start = Date.now();
		const parallel = this.config.parallel && paths.length > 1;
		const workers = parallel ? Math.min(Math.max(1, this.config.workers), paths.length) : 1;
		const progress = new BatchProgress(paths.length, start);
		const { signal } = options;

		this.bus.emit('batch:start', { total: paths.length, workers, parallel });
		this.logger.debug(`batch: ${paths.length} features on ${workers} worker(s)`);

		const pool = new WorkerPool<string, void>({ size: workers });
		const { outcomes, undispatched } = await pool.run(
			paths,
			async (path, worker) => {
				this.bus.emit('feature:start', { path, worker: worker.id });
				const featureStart = Date.now();
				const outcome = await this.runOne(path, worker.id, runner, signal);
				const feature = toFeatureResult(path, outcome, Date.now() - featureStart);
				const error = outcome.ok ? undefined : batchError(path, outcome.error);

				this.bus.emit('feature:end', {
					path,
					worker: worker.id,
					status: feature.status,
					durationMs: feature.duration_ms,
					...(error ? { error: error.error } : {}),
				});
				if (error) this.logger.warn(`${path}: ${error.error}`);
				this.bus.emit('progress', progress.record(feature, error));
			},
			signal,
		);

		for (const outcome of outcomes) {
			// runOne never rejects; anything caught here is an internal fault
			if (!outcome.ok) this.logger.error(`${outcome.item}: ${outcome.error.message}`);
		}

		for (const path of undispatched) {
			const feature = toFeatureResult(path, { ok: false, error: 'cancelled' }, 0);
			this.bus.emit('progress', progress.record(feature, batchError(path, 'cancelled')));
		}

		const result = aggregate(progress.collectResults(), progress.collectErrors(), Date.now() - start);
		this.bus.emit('batch:end', { result });
		return result;
	}

	/** Run one feature with its own abort signal and timeout. Never rejects. */
	private async runOne(
		path: string,
		worker: string,
		runner: FeatureRunner,
		batchSignal: AbortSignal | undefined,
	): Promise<FeatureOutcome> {
		const controller = new AbortController();
		const forward = () => controller.abort();
		batchSignal?.addEventListener('abort', forward, { once: true });

		try {
			return await this.withTimeout(
				runner(path, { signal: controller.signal, worker }),
				this.config.timeoutMs,
				`timed out after ${this.config.timeoutMs}ms`,
				controller,
			);
		} catch (err) {
			return { ok: false, error: errorMessage(err) };
		} finally {
			batchSignal?.removeEventListener('abort', forward);
		}
	}

	// -----------------------------------------------------------------------
	// Utilities
	// -----------------------------------------------------------------------

	private withTimeout<T>(
		promise: Promise<T>,
		ms: number,
		message: string,
		controller: AbortController,
	): Promise<T> {
		return new Promise<T>((resolve, reject) => {
			const timer = setTimeout(() => {
				controller.abort();
				reject(new Error(message));
			}, ms);

			promise
				.then((value) => {
					clearTimeout(timer);
					resolve(value);
				})
				.catch((err: unknown) => {
					clearTimeout(timer);
					reject(err);
				});
		});
	}
}

// ---------------------------------------------------------------------------
// Aggregation
// ---------------------------------------------------------------------------

/** Feature name shown in reports: the file name without its extension. */
export function featureName(path: string): string {
	const base = basename(path);
	return base.slice(0, base.length - extname(base).length) || base;
}

function toFeatureResult(path: string, outcome: FeatureOutcome, durationMs: number): FeatureResult {
	if (!outcome.ok) {
		return {
			name: featureName(path),
			path,
			status: 'failed',
			scenarios_passed: 0,
			scenarios_failed: 0,
			scenarios_skipped: 0,
			duration_ms: durationMs,
		};
	}

	const { summary, status } = outcome.value;
	return {
		name: featureName(path),
		path,
		status,
		scenarios_passed: summary.passed_scenarios,
		scenarios_failed: summary.failed_scenarios,
		scenarios_skipped: summary.skipped_scenarios,
		duration_ms: durationMs,
		result: outcome.value,
	};
}

function batchError(path: string, error: string): BatchError {
	return { path, error, timestamp: new Date().toISOString() };
}

/** Sum finished features once, after every task has reported. */
export function aggregate(results: FeatureResult[], errors: BatchError[], durationMs: number): BatchResult {
	let passedScenarios = 0;
	let failedScenarios = 0;
	let skippedScenarios = 0;
	for (const r of results) {
		passedScenarios += r.scenarios_passed;
		failedScenarios += r.scenarios_failed;
		skippedScenarios += r.scenarios_skipped;
	}

	return {
		total_features: results.length,
		passed_features: results.filter((r) => r.status === 'passed').length,
		failed_features: results.filter((r) => r.status === 'failed').length,
		total_scenarios: passedScenarios + failedScenarios + skippedScenarios,
		passed_scenarios: passedScenarios,
		failed_scenarios: failedScenarios,
		total_duration_ms: durationMs,
		results,
		errors,
	};
}

/** Results in path order, for callers that need a stable listing after a parallel run. */
export function sortByPath(results: readonly FeatureResult[]): FeatureResult[] {
	return [...results].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
