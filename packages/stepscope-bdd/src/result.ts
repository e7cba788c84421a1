// ============================================================================
// Result Model - hierarchical pass/fail/timing records.
//
// Feature run → scenarios → steps. Step status is set by whoever ran the
// step; scenario and feature status are always derived, never assigned.
// The summary is produced by `summarize` and nothing else.
//
// Builders accumulate, `build()` hands out a frozen snapshot that every
// downstream consumer (comparison, alerts, batch aggregation) reads only.
// ============================================================================

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type StepStatus = 'passed' | 'failed' | 'skipped';
export type ScenarioStatus = 'pending' | StepStatus;
export type RunStatus = ScenarioStatus;

export interface ErrorInfo {
	readonly code: string;
	readonly message: string;
	readonly suggestions: readonly string[];
}

export interface StepResult {
	readonly text: string;
	readonly keyword: string;
	readonly status: StepStatus;
	readonly duration_ms: number;
	readonly output?: string;
	readonly error?: ErrorInfo;
}

export interface ScenarioResult {
	readonly name: string;
	readonly status: ScenarioStatus;
	readonly duration_ms: number;
	readonly steps: readonly StepResult[];
}

export interface FeatureInfo {
	readonly name: string;
	readonly file?: string;
	readonly description?: string;
}

export interface ExecutionSummary {
	readonly total_scenarios: number;
	readonly passed_scenarios: number;
	readonly failed_scenarios: number;
	readonly skipped_scenarios: number;
	readonly total_steps: number;
	readonly passed_steps: number;
	readonly failed_steps: number;
	readonly skipped_steps: number;
}

export interface ExecutionResult {
	readonly status: RunStatus;
	readonly timestamp: string;
	readonly duration_ms: number;
	readonly feature: FeatureInfo;
	readonly scenarios: readonly ScenarioResult[];
	readonly summary: ExecutionSummary;
}

// ---------------------------------------------------------------------------
// Status derivation
// ---------------------------------------------------------------------------

/**
 * Failed if any step failed, else skipped if every step was skipped (a
 * scenario with no steps counts as all-skipped), else passed if any passed.
 */
export function deriveScenarioStatus(steps: readonly StepResult[]): ScenarioStatus {
	if (steps.some((s) => s.status === 'failed')) return 'failed';
	if (steps.every((s) => s.status === 'skipped')) return 'skipped';
	if (steps.some((s) => s.status === 'passed')) return 'passed';
	return 'pending';
}

export function deriveRunStatus(summary: ExecutionSummary): RunStatus {
	if (summary.failed_steps > 0) return 'failed';
	if (summary.passed_steps > 0) return 'passed';
	return 'skipped';
}

/** Fold scenarios and their steps into counts. */
export function summarize(scenarios: readonly ScenarioResult[]): ExecutionSummary {
	let passedScenarios = 0;
	let failedScenarios = 0;
	let skippedScenarios = 0;
	let totalSteps = 0;
	let passedSteps = 0;
	let failedSteps = 0;
	let skippedSteps = 0;

	for (const scenario of scenarios) {
		if (scenario.status === 'passed') passedScenarios++;
		else if (scenario.status === 'failed') failedScenarios++;
		else if (scenario.status === 'skipped') skippedScenarios++;

		for (const step of scenario.steps) {
			totalSteps++;
			if (step.status === 'passed') passedSteps++;
			else if (step.status === 'failed') failedSteps++;
			else skippedSteps++;
		}
	}

	return Object.freeze({
		total_scenarios: scenarios.length,
		passed_scenarios: passedScenarios,
		failed_scenarios: failedScenarios,
		skipped_scenarios: skippedScenarios,
		total_steps: totalSteps,
		passed_steps: passedSteps,
		failed_steps: failedSteps,
		skipped_steps: skippedSteps,
	});
}

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

export interface StepResultOptions {
	durationMs?: number;
	output?: string;
	error?: { code: string; message: string; suggestions?: readonly string[] };
}

/** Create a frozen step record. */
export function stepResult(
	text: string,
	keyword: string,
	status: StepStatus,
	options: StepResultOptions = {},
): StepResult {
	const step: {
		text: string;
		keyword: string;
		status: StepStatus;
		duration_ms: number;
		output?: string;
		error?: ErrorInfo;
	} = {
		text,
		keyword,
		status,
		duration_ms: options.durationMs ?? 0,
	};
	if (options.output !== undefined) step.output = options.output;
	if (options.error) {
		step.error = Object.freeze({
			code: options.error.code,
			message: options.error.message,
			suggestions: Object.freeze([...(options.error.suggestions ?? [])]),
		});
	}
	return Object.freeze(step);
}

export class ScenarioResultBuilder {
	readonly name: string;
	private readonly steps: StepResult[] = [];
	private currentStatus: ScenarioStatus = deriveScenarioStatus([]);
	private durationMs: number | null = null;

	constructor(name: string) {
		this.name = name;
	}

	/** Append a step; the scenario status is re-derived immediately. */
	addStep(step: StepResult): this {
		this.steps.push(step);
		this.currentStatus = deriveScenarioStatus(this.steps);
		return this;
	}

	/** Wall time of the scenario. Defaults to the sum of its step durations. */
	duration(ms: number): this {
		this.durationMs = ms;
		return this;
	}

	get status(): ScenarioStatus {
		return this.currentStatus;
	}

	get stepCount(): number {
		return this.steps.length;
	}

	build(): ScenarioResult {
		const steps = Object.freeze([...this.steps]);
		return Object.freeze({
			name: this.name,
			status: this.currentStatus,
			duration_ms: this.durationMs ?? steps.reduce((sum, s) => sum + s.duration_ms, 0),
			steps,
		});
	}
}

export class ExecutionResultBuilder {
	private readonly feature: FeatureInfo;
	private readonly timestamp: string;
	private readonly scenarios: ScenarioResult[] = [];
	private currentSummary: ExecutionSummary = summarize([]);
	private currentStatus: RunStatus = deriveRunStatus(this.currentSummary);
	private durationMs = 0;

	constructor(feature: FeatureInfo, options: { timestamp?: string } = {}) {
		this.feature = Object.freeze({ ...feature });
		this.timestamp = options.timestamp ?? new Date().toISOString();
	}

	/** Append a scenario; summary and run status are recomputed. */
	addScenario(scenario: ScenarioResult | ScenarioResultBuilder): this {
		this.scenarios.push(scenario instanceof ScenarioResultBuilder ? scenario.build() : scenario);
		this.currentSummary = summarize(this.scenarios);
		this.currentStatus = deriveRunStatus(this.currentSummary);
		return this;
	}

	duration(ms: number): this {
		this.durationMs = ms;
		return this;
	}

	get status(): RunStatus {
		return this.currentStatus;
	}

	get summary(): ExecutionSummary {
		return this.currentSummary;
	}

	build(): ExecutionResult {
		const summary = summarize(this.scenarios);
		return Object.freeze({
			status: deriveRunStatus(summary),
			timestamp: this.timestamp,
			duration_ms: this.durationMs,
			feature: this.feature,
			scenarios: Object.freeze([...this.scenarios]),
			summary,
		});
	}
}

// ---------------------------------------------------------------------------
// Rebuilding from documents
// ---------------------------------------------------------------------------

/** Structural shape of a report document after schema validation. */
export interface ReportLike {
	timestamp: string;
	duration_ms: number;
	feature: { name: string; file?: string | null; description?: string | null };
	scenarios: Array<{
		name: string;
		duration_ms: number;
		steps: Array<{
			text: string;
			keyword: string;
			status: StepStatus;
			duration_ms: number;
			output?: string | null;
			error?: { code: string; message: string; suggestions: string[] } | null;
		}>;
	}>;
}

/**
 * Rebuild a result from a parsed report. Statuses and the summary are
 * recomputed from the steps; whatever the document says about them is ignored.
 */
export function fromReport(doc: ReportLike): ExecutionResult {
	const builder = new ExecutionResultBuilder(
		{
			name: doc.feature.name,
			...(doc.feature.file != null ? { file: doc.feature.file } : {}),
			...(doc.feature.description != null ? { description: doc.feature.description } : {}),
		},
		{ timestamp: doc.timestamp },
	).duration(doc.duration_ms);

	for (const scenario of doc.scenarios) {
		const sb = new ScenarioResultBuilder(scenario.name).duration(scenario.duration_ms);
		for (const step of scenario.steps) {
			sb.addStep(
				stepResult(step.text, step.keyword, step.status, {
					durationMs: step.duration_ms,
					...(step.output != null ? { output: step.output } : {}),
					...(step.error != null ? { error: step.error } : {}),
				}),
			);
		}
		builder.addScenario(sb);
	}

	return builder.build();
}
