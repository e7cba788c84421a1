// ============================================================================
// stepscope Runner - Types
// Batch records are serialised as-is, hence the snake_case fields.
// ============================================================================

import type { ExecutionResult, RunStatus } from 'stepscope-bdd';

/** Outcome of running one feature file */
export type FeatureOutcome = { ok: true; value: ExecutionResult } | { ok: false; error: string };

/** Handed to the feature runner for each path */
export interface FeatureRunContext {
	/**
	 * Aborted on batch cancellation or when the feature times out.
	 * A timed-out feature frees its worker slot at once, so a runner that
	 * keeps working after the abort runs beside the next feature and the
	 * batch can exceed `workers`. Runners should stop on abort.
	 */
	signal: AbortSignal;
	/** Id of the worker running the feature */
	worker: string;
}

/** Runs one feature file. Throwing or rejecting counts as `{ ok: false }`. */
export type FeatureRunner = (path: string, ctx: FeatureRunContext) => Promise<FeatureOutcome>;

/** One row per input path */
export interface FeatureResult {
	/** File stem */
	name: string;
	path: string;
	status: RunStatus;
	scenarios_passed: number;
	scenarios_failed: number;
	scenarios_skipped: number;
	duration_ms: number;
	/** Absent when the runner failed */
	result?: ExecutionResult;
}

export interface BatchError {
	path: string;
	error: string;
	timestamp: string;
}

export interface BatchResult {
	total_features: number;
	passed_features: number;
	failed_features: number;
	total_scenarios: number;
	passed_scenarios: number;
	failed_scenarios: number;
	total_duration_ms: number;
	results: FeatureResult[];
	errors: BatchError[];
}

export interface BatchProgressSnapshot {
	completed: number;
	total: number;
	/** completed / total, 0 for an empty batch */
	fraction: number;
	elapsedMs: number;
}

export interface BatchConfig {
	/** Run features concurrently (default: true) */
	parallel: boolean;
	/** Upper bound on concurrent features (default: available parallelism) */
	workers: number;
	/** Per-feature timeout in ms (default: 300000) */
	timeoutMs: number;
}
