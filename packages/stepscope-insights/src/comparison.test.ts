import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { ExecutionResultBuilder, ScenarioResultBuilder, stepResult } from 'stepscope-bdd';
import type { ExecutionResult, ScenarioResult, StepStatus } from 'stepscope-bdd';
import { compare, percentChange } from './comparison.js';

function scenario(
	name: string,
	status: StepStatus,
	durationMs: number,
	steps: Array<[string, number]> = [['a step', 0]],
): ScenarioResult {
	const builder = new ScenarioResultBuilder(name);
	for (const [text, ms] of steps) builder.addStep(stepResult(text, 'Given', status, { durationMs: ms }));
	return builder.duration(durationMs).build();
}

function run(scenarios: ScenarioResult[], durationMs = 1000): ExecutionResult {
	const builder = new ExecutionResultBuilder({ name: 'Checkout' }, { timestamp: '2024-01-01T00:00:00.000Z' });
	for (const s of scenarios) builder.addScenario(s);
	return builder.duration(durationMs).build();
}

describe('compare', () => {
	it('should report identical runs as unchanged', () => {
		const result = run([scenario('login', 'passed', 1000)]);
		const diff = compare(result, result);

		expect(diff.status).toBe('unchanged');
		expect(diff.regressions).toEqual([]);
		expect(diff.improvements).toEqual([]);
		expect(diff.step_performance_changes).toEqual([]);
		expect(diff.scenario_changes.map((c) => c.change_type)).toEqual(['unchanged']);
	});

	it('should flag passed to failed as a critical regression', () => {
		const diff = compare(run([scenario('login', 'passed', 1000)]), run([scenario('login', 'failed', 1000)]));

		expect(diff.status).toBe('regression');
		expect(diff.regressions).toEqual([
			{
				description: `Scenario 'login' changed from passed to failed`,
				severity: 'critical',
				scenario_name: 'login',
				impact_value: 1,
				impact_unit: 'count',
			},
		]);
		expect(diff.scenario_changes[0]?.change_type).toBe('status_changed');
		expect(diff.metrics_diff.passed_scenarios_diff).toBe(-1);
		expect(diff.metrics_diff.failed_scenarios_diff).toBe(1);
		expect(diff.metrics_diff.failed_steps_diff).toBe(1);
	});

	it('should grade scenario duration regressions', () => {
		const baseline = run([scenario('login', 'passed', 1000)]);

		const high = compare(baseline, run([scenario('login', 'passed', 1510)]));
		expect(high.regressions.map((r) => [r.severity, r.description, r.impact_value])).toEqual([
			['high', `Scenario 'login' duration regressed by 51.0%`, 510],
		]);

		const medium = compare(baseline, run([scenario('login', 'passed', 1110)]));
		expect(medium.regressions.map((r) => r.severity)).toEqual(['medium']);

		const noise = compare(baseline, run([scenario('login', 'passed', 1050)]));
		expect(noise.regressions).toEqual([]);
		expect(noise.status).toBe('unchanged');
		expect(noise.scenario_changes[0]?.change_type).toBe('duration_regressed');
	});

	it('should record any duration decrease as an improvement', () => {
		const diff = compare(run([scenario('login', 'passed', 2000)]), run([scenario('login', 'passed', 1000)]));

		expect(diff.status).toBe('improvement');
		expect(diff.improvements).toEqual([
			{
				description: `Scenario 'login' duration improved by 50.0%`,
				scenario_name: 'login',
				improvement_value: 1000,
				improvement_unit: 'ms',
			},
		]);
		expect(diff.scenario_changes[0]?.change_type).toBe('duration_improved');
	});

	it('should prefer regression when both kinds are present', () => {
		const diff = compare(
			run([scenario('a', 'passed', 1000), scenario('b', 'passed', 1000)]),
			run([scenario('a', 'passed', 2000), scenario('b', 'passed', 500)]),
		);
		expect(diff.summary.regression_count).toBe(1);
		expect(diff.summary.improvement_count).toBe(1);
		expect(diff.status).toBe('regression');
	});

	it('should list removed scenarios in baseline order and new ones last', () => {
		const diff = compare(
			run([scenario('a', 'passed', 100), scenario('b', 'passed', 100)]),
			run([scenario('c', 'failed', 300), scenario('a', 'passed', 100)]),
		);

		expect(diff.scenario_changes).toEqual([
			{
				scenario_name: 'a',
				previous_status: 'passed',
				current_status: 'passed',
				previous_duration_ms: 100,
				current_duration_ms: 100,
				change_type: 'unchanged',
			},
			{
				scenario_name: 'b',
				previous_status: 'passed',
				current_status: 'removed',
				previous_duration_ms: 100,
				current_duration_ms: 0,
				change_type: 'removed',
			},
			{
				scenario_name: 'c',
				previous_status: 'new',
				current_status: 'failed',
				previous_duration_ms: 0,
				current_duration_ms: 300,
				change_type: 'new',
			},
		]);
		expect(diff.summary.scenario_changes_count).toBe(3);
	});

	it('should match a repeated scenario name by its last occurrence', () => {
		const diff = compare(
			run([scenario('dup', 'passed', 100), scenario('dup', 'passed', 300)]),
			run([scenario('dup', 'passed', 300)]),
		);
		expect(diff.scenario_changes.map((c) => [c.scenario_name, c.change_type])).toEqual([['dup', 'unchanged']]);
	});

	it('should compare step timings grouped by text', () => {
		const diff = compare(
			run([
				scenario('s', 'passed', 1000, [
					['I wait for the page', 100],
					['I click "Save"', 100],
					['I open the menu', 100],
				]),
			]),
			run([
				scenario('s', 'passed', 1000, [
					['I wait for the page', 200],
					['I click "Save"', 108],
					['I open the menu', 80],
				]),
			]),
		);

		expect(diff.step_performance_changes.map((c) => [c.step_text, c.is_regression])).toEqual([
			['I wait for the page', true],
			['I click "Save"', true],
			['I open the menu', false],
		]);
		expect(diff.regressions).toEqual([
			{
				description: `Step 'I wait for the page' duration regressed by 100.0%`,
				severity: 'high',
				step_text: 'I wait for the page',
				impact_value: 100,
				impact_unit: 'ms',
			},
		]);
		expect(diff.improvements).toEqual([
			{
				description: `Step 'I open the menu' duration improved by 20.0%`,
				step_text: 'I open the menu',
				improvement_value: 20,
				improvement_unit: 'ms',
			},
		]);
	});

	it('should treat a zero baseline as no change', () => {
		const diff = compare(run([scenario('s', 'passed', 0)], 0), run([scenario('s', 'passed', 500)], 500));
		expect(diff.metrics_diff.duration_diff_ms).toBe(500);
		expect(diff.metrics_diff.duration_change_percent).toBe(0);
		expect(diff.regressions).toEqual([]);
		expect(percentChange(0, 10)).toBe(0);
	});

	describe('properties', () => {
		const scenarioArb = fc
			.record({
				name: fc.constantFrom('login', 'logout', 'search', 'checkout'),
				status: fc.constantFrom<StepStatus>('passed', 'failed', 'skipped'),
				duration: fc.nat({ max: 10_000 }),
				stepMs: fc.array(fc.nat({ max: 2_000 }), { minLength: 1, maxLength: 4 }),
			})
			.map(({ name, status, duration, stepMs }) =>
				scenario(
					name,
					status,
					duration,
					stepMs.map((ms, i): [string, number] => [`step ${i}`, ms]),
				),
			);
		const runArb = fc
			.tuple(fc.array(scenarioArb, { maxLength: 6 }), fc.nat({ max: 60_000 }))
			.map(([scenarios, ms]) => run(scenarios, ms));

		it('should find nothing when a run is compared with itself', () => {
			fc.assert(
				fc.property(runArb, (result) => {
					const diff = compare(result, result);
					expect(diff.status).toBe('unchanged');
					expect(diff.regressions).toEqual([]);
					expect(diff.improvements).toEqual([]);
				}),
			);
		});

		it('should be deterministic', () => {
			fc.assert(
				fc.property(runArb, runArb, (a, b) => {
					expect(compare(a, b)).toEqual(compare(a, b));
				}),
			);
		});
	});
});
