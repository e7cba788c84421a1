// ============================================================================
// Scenario Executor - runs a parsed feature against a step backend.
//
// - Background steps are prepended to every scenario
// - Steps run strictly in order, one at a time
// - Step text is interpolated from the scenario's VariableStore, matched
//   against the registry and dispatched to the backend by identifier
// - The first failing step fails the scenario; the rest are skipped
// ============================================================================

import { StepscopeError, UnmatchedStepError, errorMessage } from './errors.js';
import type { FeatureDocument, FeatureScenario, FeatureStep } from './feature-reader.js';
import type { StepBackend, StepContext } from './handlers.js';
import { silentLogger } from './logger.js';
import type { Logger } from './logger.js';
import { ExecutionResultBuilder, ScenarioResultBuilder, stepResult } from './result.js';
import type { ExecutionResult, ScenarioResult, StepResult } from './result.js';
import type { StepRegistry } from './step-registry.js';
import { VariableStore } from './variable-store.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ScenarioExecutorOptions {
	backend: StepBackend;
	registry: StepRegistry;
	/** Cancels the run; steps not yet started are recorded as skipped */
	signal?: AbortSignal;
	logger?: Logger;
	/** Called after each step is recorded */
	onStepEnd?: (result: StepResult, scenarioName: string) => void;
	/** Called after each scenario is recorded */
	onScenarioEnd?: (result: ScenarioResult) => void;
}

// ---------------------------------------------------------------------------
// Executor
// ---------------------------------------------------------------------------

export class ScenarioExecutor {
	private readonly options: ScenarioExecutorOptions;
	private readonly logger: Logger;

	constructor(options: ScenarioExecutorOptions) {
		this.options = options;
		this.logger = options.logger ?? silentLogger;
	}

	async runFeature(feature: FeatureDocument): Promise<ExecutionResult> {
		const start = Date.now();
		const builder = new ExecutionResultBuilder({
			name: feature.name,
			...(feature.uri ? { file: feature.uri } : {}),
			...(feature.description ? { description: feature.description } : {}),
		});

		for (const scenario of feature.scenarios) {
			const result = await this.runScenario(scenario, feature.background);
			builder.addScenario(result);
			this.options.onScenarioEnd?.(result);
		}

		return builder.duration(Date.now() - start).build();
	}

	async runScenario(
		scenario: FeatureScenario,
		background: readonly FeatureStep[] = [],
	): Promise<ScenarioResult> {
		const start = Date.now();
		const builder = new ScenarioResultBuilder(scenario.name);
		const ctx: StepContext = {
			variables: new VariableStore(),
			scenario: scenario.name,
			...(this.options.signal ? { signal: this.options.signal } : {}),
		};

		this.logger.debug(`scenario: ${scenario.name}`);

		let failed = false;
		for (const step of [...background, ...scenario.steps]) {
			let result: StepResult;
			if (failed || this.options.signal?.aborted) {
				result = stepResult(step.text, step.keyword, 'skipped');
			} else {
				result = await this.runStep(step, ctx);
				failed = result.status === 'failed';
			}
			builder.addStep(result);
			this.options.onStepEnd?.(result, scenario.name);
		}

		return builder.duration(Date.now() - start).build();
	}

	private async runStep(step: FeatureStep, ctx: StepContext): Promise<StepResult> {
		const stepStart = Date.now();
		const text = ctx.variables.interpolate(step.text);
		const match = this.options.registry.match(text);

		if (!match) {
			const err = new UnmatchedStepError(text, this.options.registry.suggest(text));
			this.logger.debug(err.message);
			return stepResult(step.text, step.keyword, 'failed', {
				durationMs: Date.now() - stepStart,
				error: { code: err.code, message: err.message, suggestions: err.suggestions },
			});
		}

		try {
			const output = await this.options.backend.execute(match.identifier, match.parameters, ctx);
			return stepResult(step.text, step.keyword, 'passed', {
				durationMs: Date.now() - stepStart,
				output,
			});
		} catch (err) {
			this.logger.debug(`step '${text}' failed: ${errorMessage(err)}`);
			return stepResult(step.text, step.keyword, 'failed', {
				durationMs: Date.now() - stepStart,
				error: {
					code: err instanceof StepscopeError ? err.code : 'STEP_EXECUTION_ERROR',
					message: errorMessage(err),
					suggestions: err instanceof StepscopeError && err.hint ? [err.hint] : [],
				},
			});
		}
	}
}
