// ============================================================================
// Profiling - where did the time go in one execution result?
// ============================================================================

import type { ExecutionResult, ScenarioResult, StepStatus } from 'stepscope-bdd';

export interface StepMetrics {
	text: string;
	duration_ms: number;
	/** Share of the scenario's duration, 0 when the scenario took 0 ms */
	percentage: number;
	status: StepStatus;
}

export interface StepTiming {
	text: string;
	total_ms: number;
	calls: number;
	/** Integer mean */
	average_ms: number;
}

export interface ScenarioMetrics {
	name: string;
	duration_ms: number;
	step_count: number;
	passed: boolean;
	steps: StepMetrics[];
	slowest_step?: StepTiming;
}

export interface BottleneckAnalysis {
	top_bottleneck?: string;
	slow_scenario?: string;
	suggestions: string[];
}

export interface ProfilingMetrics {
	total_duration_ms: number;
	scenarios: ScenarioMetrics[];
	/** Steps merged by text, slowest total first */
	slowest_steps: StepTiming[];
	bottleneck_analysis: BottleneckAnalysis;
}

const SLOWEST_STEP_LIMIT = 10;
/** Steps above this share of the run get a suggestion */
const DOMINANT_STEP_PERCENT = 30;
const OUTLIER_GAP_MS = 1000;
const SLOW_WAIT_MS = 1000;

export function analyzeExecution(result: ExecutionResult): ProfilingMetrics {
	const scenarios = result.scenarios.map(analyzeScenario);
	const slowest_steps = aggregateSteps(scenarios);

	return {
		total_duration_ms: result.duration_ms,
		scenarios,
		slowest_steps,
		bottleneck_analysis: analyzeBottlenecks(slowest_steps, scenarios, result.duration_ms),
	};
}

function analyzeScenario(scenario: ScenarioResult): ScenarioMetrics {
	const duration = scenario.duration_ms;
	const steps: StepMetrics[] = [];
	let slowest: StepTiming | undefined;

	for (const step of scenario.steps) {
		steps.push({
			text: step.text,
			duration_ms: step.duration_ms,
			percentage: duration > 0 ? (step.duration_ms / duration) * 100 : 0,
			status: step.status,
		});
		// Strictly greater: zero-length steps never count as slowest
		if (step.duration_ms > (slowest?.total_ms ?? 0)) {
			slowest = { text: step.text, total_ms: step.duration_ms, calls: 1, average_ms: step.duration_ms };
		}
	}

	return {
		name: scenario.name,
		duration_ms: duration,
		step_count: steps.length,
		passed: scenario.status === 'passed',
		steps,
		...(slowest ? { slowest_step: slowest } : {}),
	};
}

function aggregateSteps(scenarios: readonly ScenarioMetrics[]): StepTiming[] {
	const byText = new Map<string, StepTiming>();
	for (const scenario of scenarios) {
		for (const step of scenario.steps) {
			const entry = byText.get(step.text);
			if (entry) {
				entry.total_ms += step.duration_ms;
				entry.calls++;
				entry.average_ms = Math.floor(entry.total_ms / entry.calls);
			} else {
				byText.set(step.text, {
					text: step.text,
					total_ms: step.duration_ms,
					calls: 1,
					average_ms: step.duration_ms,
				});
			}
		}
	}

	return [...byText.values()].sort((a, b) => b.total_ms - a.total_ms).slice(0, SLOWEST_STEP_LIMIT);
}

function analyzeBottlenecks(
	slowestSteps: readonly StepTiming[],
	scenarios: readonly ScenarioMetrics[],
	totalMs: number,
): BottleneckAnalysis {
	const suggestions: string[] = [];
	const [top, second] = slowestSteps;

	if (top) {
		const text = top.text.toLowerCase();
		if (text.includes('navigate') || text.includes('wait')) {
			suggestions.push(
				`The '${top.text}' step takes ${top.total_ms}ms - consider reducing wait times or optimizing navigation`,
			);
		}
		if (text.includes('click')) {
			suggestions.push('Click operations are slow - verify element selectors and page responsiveness');
		}
	}

	if (totalMs > 0) {
		for (const step of slowestSteps) {
			const share = (step.total_ms / totalMs) * 100;
			if (share > DOMINANT_STEP_PERCENT) {
				suggestions.push(`Step '${step.text}' accounts for ${share.toFixed(1)}% of total execution time`);
			}
		}
	}

	for (const step of slowestSteps) {
		if (step.calls > 1 && step.average_ms >= SLOW_WAIT_MS && step.text.toLowerCase().includes('wait')) {
			suggestions.push(
				`Step '${step.text}' waits ${step.average_ms}ms on average across ${step.calls} calls - wait for a condition instead of a fixed delay`,
			);
		}
	}

	let slowScenario: ScenarioMetrics | undefined;
	for (const scenario of scenarios) {
		if (!slowScenario || scenario.duration_ms > slowScenario.duration_ms) slowScenario = scenario;
	}
	if (slowScenario) {
		suggestions.push(`Scenario '${slowScenario.name}' is the slowest at ${slowScenario.duration_ms}ms`);
	}

	if (top && second && top.total_ms - second.total_ms > OUTLIER_GAP_MS) {
		suggestions.push(
			`Step '${top.text}' is ${top.total_ms - second.total_ms}ms slower than the next slowest step - investigate this outlier`,
		);
	}

	return {
		...(top ? { top_bottleneck: top.text } : {}),
		...(slowScenario ? { slow_scenario: slowScenario.name } : {}),
		suggestions,
	};
}

/** Plain-text profile for the console. */
export function formatProfile(metrics: ProfilingMetrics): string {
	const lines = ['=== Execution Profile ===', '', `Total: ${metrics.total_duration_ms}ms`, ''];

	lines.push('--- Slowest Steps ---');
	metrics.slowest_steps.forEach((step, i) => {
		lines.push(`  ${i + 1}. ${step.text} - ${step.total_ms}ms (${step.calls}x, avg ${step.average_ms}ms)`);
	});

	lines.push('', '--- Scenarios ---');
	for (const scenario of metrics.scenarios) {
		const slowest = scenario.slowest_step ? `, slowest: ${scenario.slowest_step.text}` : '';
		lines.push(`  ${scenario.name} - ${scenario.duration_ms}ms (${scenario.step_count} steps${slowest})`);
	}

	if (metrics.bottleneck_analysis.suggestions.length > 0) {
		lines.push('', '--- Suggestions ---');
		for (const suggestion of metrics.bottleneck_analysis.suggestions) lines.push(`  - ${suggestion}`);
	}

	return `${lines.join('\n')}\n`;
}
