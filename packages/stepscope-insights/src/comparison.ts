// ============================================================================
// Comparison Engine - baseline vs current execution results.
//
// Three passes over the pair:
//   1. Metrics diff from the two summaries
//   2. Scenario matching by name (status flips, duration drift)
//   3. Step timing, grouped by exact step text and averaged
//
// Pure: the same pair always yields the same ComparisonResult.
// ============================================================================

import type { ExecutionResult, ScenarioResult, ScenarioStatus } from 'stepscope-bdd';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ComparisonStatus = 'regression' | 'improvement' | 'unchanged';

export type ChangeType =
	| 'status_changed'
	| 'duration_improved'
	| 'duration_regressed'
	| 'unchanged'
	| 'new'
	| 'removed';

export type RegressionSeverity = 'critical' | 'high' | 'medium' | 'low';

export type ImpactUnit = 'ms' | 'count' | '%';

export interface ComparisonSummary {
	baseline_timestamp: string;
	current_timestamp: string;
	/** Number of scenario change rows, including new and removed */
	scenario_changes_count: number;
	step_changes_count: number;
	regression_count: number;
	improvement_count: number;
}

/** Signed current − baseline deltas */
export interface MetricsDifference {
	passed_scenarios_diff: number;
	failed_scenarios_diff: number;
	skipped_scenarios_diff: number;
	passed_steps_diff: number;
	failed_steps_diff: number;
	skipped_steps_diff: number;
	duration_diff_ms: number;
	/** 0 when the baseline took 0 ms */
	duration_change_percent: number;
}

export interface ScenarioChange {
	scenario_name: string;
	previous_status: ScenarioStatus | 'new';
	current_status: ScenarioStatus | 'removed';
	previous_duration_ms: number;
	current_duration_ms: number;
	change_type: ChangeType;
}

export interface StepPerformanceChange {
	step_text: string;
	baseline_avg_ms: number;
	current_avg_ms: number;
	change_percent: number;
	/** Current mean is slower than the baseline mean */
	is_regression: boolean;
	/** Occurrences in the current run */
	occurrence_count: number;
}

export interface RegressionItem {
	description: string;
	severity: RegressionSeverity;
	scenario_name?: string;
	step_text?: string;
	impact_value: number;
	impact_unit: ImpactUnit;
}

export interface ImprovementItem {
	description: string;
	scenario_name?: string;
	step_text?: string;
	improvement_value: number;
	improvement_unit: ImpactUnit;
}

export interface ComparisonResult {
	status: ComparisonStatus;
	summary: ComparisonSummary;
	metrics_diff: MetricsDifference;
	scenario_changes: ScenarioChange[];
	step_performance_changes: StepPerformanceChange[];
	regressions: RegressionItem[];
	improvements: ImprovementItem[];
}

// ---------------------------------------------------------------------------
// Thresholds (percent of baseline)
// ---------------------------------------------------------------------------

/** Step timing changes at or below this are noise */
const STEP_CHANGE_PERCENT = 5;
/** Duration increases above this count as regressions */
const REGRESSION_PERCENT = 10;
/** Regressions above this are `high`, the rest `medium` */
const HIGH_SEVERITY_PERCENT = 50;

// ---------------------------------------------------------------------------
// compare
// ---------------------------------------------------------------------------

/**
 * Compare a current run against a baseline.
 *
 * ```ts
 * const diff = compare(loadReport('baseline.json'), loadReport('current.json'));
 * if (diff.status === 'regression') process.exitCode = 1;
 * ```
 */
export function compare(baseline: ExecutionResult, current: ExecutionResult): ComparisonResult {
	const regressions: RegressionItem[] = [];
	const improvements: ImprovementItem[] = [];

	const metrics_diff = metricsDiff(baseline, current);
	const scenario_changes = compareScenarios(baseline, current, regressions, improvements);
	const step_performance_changes = compareSteps(baseline, current, regressions, improvements);

	return {
		status: overallStatus(regressions, improvements),
		summary: {
			baseline_timestamp: baseline.timestamp,
			current_timestamp: current.timestamp,
			scenario_changes_count: scenario_changes.length,
			step_changes_count: step_performance_changes.length,
			regression_count: regressions.length,
			improvement_count: improvements.length,
		},
		metrics_diff,
		scenario_changes,
		step_performance_changes,
		regressions,
		improvements,
	};
}

/** Regressions win over improvements. */
export function overallStatus(
	regressions: readonly RegressionItem[],
	improvements: readonly ImprovementItem[],
): ComparisonStatus {
	if (regressions.length > 0) return 'regression';
	if (improvements.length > 0) return 'improvement';
	return 'unchanged';
}

/** `(current − baseline) / baseline × 100`, or 0 for a zero baseline. */
export function percentChange(baseline: number, current: number): number {
	return baseline > 0 ? ((current - baseline) / baseline) * 100 : 0;
}

function severityFor(percent: number): RegressionSeverity {
	return percent > HIGH_SEVERITY_PERCENT ? 'high' : 'medium';
}

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

function metricsDiff(baseline: ExecutionResult, current: ExecutionResult): MetricsDifference {
	const b = baseline.summary;
	const c = current.summary;
	return {
		passed_scenarios_diff: c.passed_scenarios - b.passed_scenarios,
		failed_scenarios_diff: c.failed_scenarios - b.failed_scenarios,
		skipped_scenarios_diff: c.skipped_scenarios - b.skipped_scenarios,
		passed_steps_diff: c.passed_steps - b.passed_steps,
		failed_steps_diff: c.failed_steps - b.failed_steps,
		skipped_steps_diff: c.skipped_steps - b.skipped_steps,
		duration_diff_ms: current.duration_ms - baseline.duration_ms,
		duration_change_percent: percentChange(baseline.duration_ms, current.duration_ms),
	};
}

// ---------------------------------------------------------------------------
// Scenarios
// ---------------------------------------------------------------------------

/** Name → scenario; a repeated name keeps its first position and its last value. */
function byName(scenarios: readonly ScenarioResult[]): Map<string, ScenarioResult> {
	const map = new Map<string, ScenarioResult>();
	for (const scenario of scenarios) map.set(scenario.name, scenario);
	return map;
}

function changeType(previous: ScenarioResult, current: ScenarioResult): ChangeType {
	if (previous.status !== current.status) return 'status_changed';
	if (current.duration_ms < previous.duration_ms) return 'duration_improved';
	if (current.duration_ms > previous.duration_ms) return 'duration_regressed';
	return 'unchanged';
}

function compareScenarios(
	baseline: ExecutionResult,
	current: ExecutionResult,
	regressions: RegressionItem[],
	improvements: ImprovementItem[],
): ScenarioChange[] {
	const before = byName(baseline.scenarios);
	const after = byName(current.scenarios);
	const changes: ScenarioChange[] = [];

	for (const [name, previous] of before) {
		const now = after.get(name);
		if (!now) {
			changes.push({
				scenario_name: name,
				previous_status: previous.status,
				current_status: 'removed',
				previous_duration_ms: previous.duration_ms,
				current_duration_ms: 0,
				change_type: 'removed',
			});
			continue;
		}

		if (previous.status === 'passed' && now.status === 'failed') {
			regressions.push({
				description: `Scenario '${name}' changed from passed to failed`,
				severity: 'critical',
				scenario_name: name,
				impact_value: 1,
				impact_unit: 'count',
			});
		}

		const deltaMs = now.duration_ms - previous.duration_ms;
		const percent = percentChange(previous.duration_ms, now.duration_ms);
		if (deltaMs < 0) {
			improvements.push({
				description: `Scenario '${name}' duration improved by ${Math.abs(percent).toFixed(1)}%`,
				scenario_name: name,
				improvement_value: -deltaMs,
				improvement_unit: 'ms',
			});
		} else if (deltaMs > 0 && percent > REGRESSION_PERCENT) {
			regressions.push({
				description: `Scenario '${name}' duration regressed by ${percent.toFixed(1)}%`,
				severity: severityFor(percent),
				scenario_name: name,
				impact_value: deltaMs,
				impact_unit: 'ms',
			});
		}

		changes.push({
			scenario_name: name,
			previous_status: previous.status,
			current_status: now.status,
			previous_duration_ms: previous.duration_ms,
			current_duration_ms: now.duration_ms,
			change_type: changeType(previous, now),
		});
	}

	for (const [name, now] of after) {
		if (before.has(name)) continue;
		changes.push({
			scenario_name: name,
			previous_status: 'new',
			current_status: now.status,
			previous_duration_ms: 0,
			current_duration_ms: now.duration_ms,
			change_type: 'new',
		});
	}

	return changes;
}

// ---------------------------------------------------------------------------
// Steps
// ---------------------------------------------------------------------------

function stepTimings(result: ExecutionResult): Map<string, number[]> {
	const timings = new Map<string, number[]>();
	for (const scenario of result.scenarios) {
		for (const step of scenario.steps) {
			const list = timings.get(step.text);
			if (list) list.push(step.duration_ms);
			else timings.set(step.text, [step.duration_ms]);
		}
	}
	return timings;
}

function mean(values: readonly number[]): number {
	return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

function compareSteps(
	baseline: ExecutionResult,
	current: ExecutionResult,
	regressions: RegressionItem[],
	improvements: ImprovementItem[],
): StepPerformanceChange[] {
	const before = stepTimings(baseline);
	const after = stepTimings(current);
	const changes: StepPerformanceChange[] = [];

	for (const [text, baselineTimes] of before) {
		const currentTimes = after.get(text);
		if (!currentTimes) continue;

		const baselineAvg = mean(baselineTimes);
		const currentAvg = mean(currentTimes);
		const percent = percentChange(baselineAvg, currentAvg);
		if (Math.abs(percent) <= STEP_CHANGE_PERCENT) continue;

		const isRegression = currentAvg > baselineAvg;
		if (isRegression && percent > REGRESSION_PERCENT) {
			regressions.push({
				description: `Step '${text}' duration regressed by ${percent.toFixed(1)}%`,
				severity: severityFor(percent),
				step_text: text,
				impact_value: currentAvg - baselineAvg,
				impact_unit: 'ms',
			});
		} else if (!isRegression && Math.abs(percent) > REGRESSION_PERCENT) {
			improvements.push({
				description: `Step '${text}' duration improved by ${Math.abs(percent).toFixed(1)}%`,
				step_text: text,
				improvement_value: baselineAvg - currentAvg,
				improvement_unit: 'ms',
			});
		}

		changes.push({
			step_text: text,
			baseline_avg_ms: baselineAvg,
			current_avg_ms: currentAvg,
			change_percent: percent,
			is_regression: isRegression,
			occurrence_count: currentTimes.length,
		});
	}

	return changes;
}
