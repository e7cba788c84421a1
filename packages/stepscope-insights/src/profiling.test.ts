import { describe, expect, it } from 'vitest';
import { ExecutionResultBuilder, ScenarioResultBuilder, stepResult } from 'stepscope-bdd';
import type { ExecutionResult, ScenarioResult } from 'stepscope-bdd';
import { analyzeExecution, formatProfile } from './profiling.js';

function scenario(name: string, durationMs: number, steps: Array<[string, number]>): ScenarioResult {
	const builder = new ScenarioResultBuilder(name);
	for (const [text, ms] of steps) builder.addStep(stepResult(text, 'Given', 'passed', { durationMs: ms }));
	return builder.duration(durationMs).build();
}

function run(durationMs: number, scenarios: ScenarioResult[]): ExecutionResult {
	const builder = new ExecutionResultBuilder({ name: 'Profiled' });
	for (const s of scenarios) builder.addScenario(s);
	return builder.duration(durationMs).build();
}

const NAVIGATE = 'I navigate to "/home"';

describe('analyzeExecution', () => {
	const result = run(1000, [
		scenario('Scenario 1', 600, [
			[NAVIGATE, 400],
			['I click "Save"', 200],
		]),
		scenario('Scenario 2', 400, [
			[NAVIGATE, 300],
			['I wait 2 seconds', 100],
		]),
	]);

	it('should measure each step against its scenario', () => {
		const [first] = analyzeExecution(result).scenarios;
		expect(first?.step_count).toBe(2);
		expect(first?.passed).toBe(true);
		expect(first?.steps[0]?.percentage).toBeCloseTo(66.67, 2);
		expect(first?.steps[1]?.percentage).toBeCloseTo(33.33, 2);
		expect(first?.slowest_step).toEqual({ text: NAVIGATE, total_ms: 400, calls: 1, average_ms: 400 });
	});

	it('should merge repeated steps by text', () => {
		expect(analyzeExecution(result).slowest_steps).toEqual([
			{ text: NAVIGATE, total_ms: 700, calls: 2, average_ms: 350 },
			{ text: 'I click "Save"', total_ms: 200, calls: 1, average_ms: 200 },
			{ text: 'I wait 2 seconds', total_ms: 100, calls: 1, average_ms: 100 },
		]);
	});

	it('should name the bottleneck and suggest fixes', () => {
		expect(analyzeExecution(result).bottleneck_analysis).toEqual({
			top_bottleneck: NAVIGATE,
			slow_scenario: 'Scenario 1',
			suggestions: [
				`The '${NAVIGATE}' step takes 700ms - consider reducing wait times or optimizing navigation`,
				`Step '${NAVIGATE}' accounts for 70.0% of total execution time`,
				`Scenario 'Scenario 1' is the slowest at 600ms`,
			],
		});
	});

	it('should call out repeated fixed waits and outliers', () => {
		const waits = run(4200, [
			scenario('first', 2100, [
				['I wait 2 seconds', 2000],
				['I click "Go"', 100],
			]),
			scenario('second', 2100, [
				['I wait 2 seconds', 2000],
				['I click "Go"', 100],
			]),
		]);

		expect(analyzeExecution(waits).bottleneck_analysis.suggestions).toEqual([
			`The 'I wait 2 seconds' step takes 4000ms - consider reducing wait times or optimizing navigation`,
			`Step 'I wait 2 seconds' accounts for 95.2% of total execution time`,
			`Step 'I wait 2 seconds' waits 2000ms on average across 2 calls - wait for a condition instead of a fixed delay`,
			`Scenario 'first' is the slowest at 2100ms`,
			`Step 'I wait 2 seconds' is 3800ms slower than the next slowest step - investigate this outlier`,
		]);
	});

	it('should handle a run without scenarios', () => {
		const metrics = analyzeExecution(run(0, []));
		expect(metrics.slowest_steps).toEqual([]);
		expect(metrics.bottleneck_analysis).toEqual({ suggestions: [] });
	});

	it('should keep at most ten distinct steps', () => {
		const steps: Array<[string, number]> = Array.from({ length: 12 }, (_, i) => [`step ${i}`, i + 1]);
		const metrics = analyzeExecution(run(100, [scenario('many', 78, steps)]));
		expect(metrics.slowest_steps).toHaveLength(10);
		expect(metrics.slowest_steps[0]?.text).toBe('step 11');
	});
});

describe('formatProfile', () => {
	it('should list steps, scenarios and suggestions', () => {
		const metrics = analyzeExecution(run(300, [scenario('only', 300, [['I click "Go"', 300]])]));
		expect(formatProfile(metrics)).toBe(
			[
				'=== Execution Profile ===',
				'',
				'Total: 300ms',
				'',
				'--- Slowest Steps ---',
				'  1. I click "Go" - 300ms (1x, avg 300ms)',
				'',
				'--- Scenarios ---',
				'  only - 300ms (1 steps, slowest: I click "Go")',
				'',
				'--- Suggestions ---',
				'  - Click operations are slow - verify element selectors and page responsiveness',
				`  - Step 'I click "Go"' accounts for 100.0% of total execution time`,
				`  - Scenario 'only' is the slowest at 300ms`,
				'',
			].join('\n'),
		);
	});
});
