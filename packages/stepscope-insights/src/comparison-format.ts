// ============================================================================
// Comparison output - console text, or the full result as JSON / YAML.
// ============================================================================

import yaml from 'yaml';
import type { ComparisonResult } from './comparison.js';

export type ComparisonOutputFormat = 'text' | 'json' | 'yaml';

export function formatComparison(result: ComparisonResult, format: ComparisonOutputFormat = 'text'): string {
	switch (format) {
		case 'json':
			return `${JSON.stringify(result, null, 2)}\n`;
		case 'yaml':
			return yaml.stringify(result);
		default:
			return formatText(result);
	}
}

function signed(n: number): string {
	return n > 0 ? `+${n}` : `${n}`;
}

function formatText(result: ComparisonResult): string {
	const { summary, metrics_diff: metrics } = result;
	const lines: string[] = [];

	lines.push('=== Comparison Report ===', '');
	lines.push(`Status: ${result.status.toUpperCase()}`, '');

	lines.push('--- Summary ---');
	lines.push(`Baseline: ${summary.baseline_timestamp}`);
	lines.push(`Current:  ${summary.current_timestamp}`);
	lines.push(`Scenarios Changed: ${summary.scenario_changes_count}`);
	lines.push(`Step Performance Changes: ${summary.step_changes_count}`);
	lines.push(`Regressions Detected: ${summary.regression_count}`);
	lines.push(`Improvements Detected: ${summary.improvement_count}`, '');

	lines.push('--- Metrics Change ---');
	lines.push(`Passed Scenarios:  ${signed(metrics.passed_scenarios_diff)}`);
	lines.push(`Failed Scenarios:  ${signed(metrics.failed_scenarios_diff)}`);
	lines.push(`Skipped Scenarios: ${signed(metrics.skipped_scenarios_diff)}`);
	lines.push(`Passed Steps:      ${signed(metrics.passed_steps_diff)}`);
	lines.push(`Failed Steps:      ${signed(metrics.failed_steps_diff)}`);
	lines.push(`Skipped Steps:     ${signed(metrics.skipped_steps_diff)}`);
	lines.push(
		`Duration:          ${signed(metrics.duration_diff_ms)}ms (${metrics.duration_change_percent.toFixed(1)}%)`,
		'',
	);

	if (result.regressions.length > 0) {
		lines.push('--- Regressions ---');
		result.regressions.forEach((r, i) => {
			lines.push(`  ${i + 1}. ${r.description}`);
			lines.push(`     Severity: ${r.severity}`);
			lines.push(`     Impact: ${r.impact_value.toFixed(1)} ${r.impact_unit}`);
			if (r.scenario_name !== undefined) lines.push(`     Scenario: ${r.scenario_name}`);
			if (r.step_text !== undefined) lines.push(`     Step: ${r.step_text}`);
			lines.push('');
		});
	}

	if (result.improvements.length > 0) {
		lines.push('--- Improvements ---');
		result.improvements.forEach((imp, i) => {
			lines.push(`  ${i + 1}. ${imp.description}`);
			lines.push(`     Value: ${imp.improvement_value.toFixed(1)} ${imp.improvement_unit}`);
			if (imp.scenario_name !== undefined) lines.push(`     Scenario: ${imp.scenario_name}`);
			if (imp.step_text !== undefined) lines.push(`     Step: ${imp.step_text}`);
			lines.push('');
		});
	}

	if (result.scenario_changes.length > 0) {
		lines.push('--- Scenario Changes ---');
		for (const change of result.scenario_changes) {
			lines.push(`  ${change.scenario_name}: ${change.previous_status} → ${change.current_status}`);
			lines.push(`     Duration: ${change.previous_duration_ms}ms → ${change.current_duration_ms}ms`);
			lines.push(`     Change Type: ${change.change_type}`, '');
		}
	}

	if (result.step_performance_changes.length > 0) {
		lines.push('--- Step Performance Changes ---');
		for (const change of result.step_performance_changes) {
			const arrow = change.is_regression ? '↑' : '↓';
			lines.push(
				`  ${arrow} ${change.step_text} ${Math.abs(change.change_percent).toFixed(1)}% (${change.occurrence_count}x)`,
			);
			lines.push(
				`     Baseline: ${change.baseline_avg_ms.toFixed(1)}ms → Current: ${change.current_avg_ms.toFixed(1)}ms`,
				'',
			);
		}
	}

	return `${lines.join('\n')}\n`;
}
