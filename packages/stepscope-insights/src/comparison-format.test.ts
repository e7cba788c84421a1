import { describe, expect, it } from 'vitest';
import yaml from 'yaml';
import { formatComparison } from './comparison-format.js';
import type { ComparisonResult } from './comparison.js';

const result: ComparisonResult = {
	status: 'regression',
	summary: {
		baseline_timestamp: '2024-01-01T00:00:00.000Z',
		current_timestamp: '2024-01-02T00:00:00.000Z',
		scenario_changes_count: 1,
		step_changes_count: 1,
		regression_count: 1,
		improvement_count: 0,
	},
	metrics_diff: {
		passed_scenarios_diff: -1,
		failed_scenarios_diff: 1,
		skipped_scenarios_diff: 0,
		passed_steps_diff: -1,
		failed_steps_diff: 1,
		skipped_steps_diff: 0,
		duration_diff_ms: 250,
		duration_change_percent: 25,
	},
	scenario_changes: [
		{
			scenario_name: 'login',
			previous_status: 'passed',
			current_status: 'failed',
			previous_duration_ms: 1000,
			current_duration_ms: 1250,
			change_type: 'status_changed',
		},
	],
	step_performance_changes: [
		{
			step_text: 'I wait for the page',
			baseline_avg_ms: 100,
			current_avg_ms: 150,
			change_percent: 50,
			is_regression: true,
			occurrence_count: 2,
		},
	],
	regressions: [
		{
			description: `Scenario 'login' changed from passed to failed`,
			severity: 'critical',
			scenario_name: 'login',
			impact_value: 1,
			impact_unit: 'count',
		},
	],
	improvements: [],
};

describe('formatComparison', () => {
	it('should render the text report', () => {
		expect(formatComparison(result)).toBe(
			[
				'=== Comparison Report ===',
				'',
				'Status: REGRESSION',
				'',
				'--- Summary ---',
				'Baseline: 2024-01-01T00:00:00.000Z',
				'Current:  2024-01-02T00:00:00.000Z',
				'Scenarios Changed: 1',
				'Step Performance Changes: 1',
				'Regressions Detected: 1',
				'Improvements Detected: 0',
				'',
				'--- Metrics Change ---',
				'Passed Scenarios:  -1',
				'Failed Scenarios:  +1',
				'Skipped Scenarios: 0',
				'Passed Steps:      -1',
				'Failed Steps:      +1',
				'Skipped Steps:     0',
				'Duration:          +250ms (25.0%)',
				'',
				'--- Regressions ---',
				`  1. Scenario 'login' changed from passed to failed`,
				'     Severity: critical',
				'     Impact: 1.0 count',
				'     Scenario: login',
				'',
				'--- Scenario Changes ---',
				'  login: passed → failed',
				'     Duration: 1000ms → 1250ms',
				'     Change Type: status_changed',
				'',
				'--- Step Performance Changes ---',
				'  ↑ I wait for the page 50.0% (2x)',
				'     Baseline: 100.0ms → Current: 150.0ms',
				'',
				'',
			].join('\n'),
		);
	});

	it('should emit the whole result as JSON and YAML', () => {
		expect(JSON.parse(formatComparison(result, 'json'))).toEqual(result);
		expect(yaml.parse(formatComparison(result, 'yaml'))).toEqual(result);
	});
});
