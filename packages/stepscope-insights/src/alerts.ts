// ============================================================================
// Performance Monitor & Alerts
//
// The monitor accumulates scenario and step timings; alert configs are
// named rule-sets of thresholds evaluated against the monitor's metrics.
// Alerts are reported alongside results and never change an outcome.
//
// ```ts
// const monitor = new PerformanceMonitor();
// for (const s of result.scenarios) monitor.recordScenario(s);
// const alerts = AlertManager.fromFile('alerts.yaml').evaluate(monitor);
// console.log(formatAlerts(alerts));
// ```
// ============================================================================

import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import yaml from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from 'stepscope-bdd';
import type { ScenarioResult, StepResult } from 'stepscope-bdd';

// ---------------------------------------------------------------------------
// Types & schema
// ---------------------------------------------------------------------------

const builtInMetrics = [
	'scenario_duration_ms',
	'step_duration_ms',
	'failure_rate_percent',
	'total_duration_ms',
	'scenarios_per_second',
	'steps_per_second',
	'memory_usage_mb',
] as const;

const metricSchema = z.union([z.enum(builtInMetrics), z.object({ custom: z.string().min(1) })]);

const thresholdSchema = z.object({
	name: z.string().min(1),
	metric: metricSchema,
	operator: z.enum(['>', '<', '==', '!=']),
	value: z.number(),
	severity: z.enum(['info', 'warning', 'critical']),
	/** `{value}` is replaced with the measured value */
	message: z.string(),
});

const alertConfigSchema = z.object({
	name: z.string().min(1),
	enabled: z.boolean().default(true),
	thresholds: z.array(thresholdSchema),
});

export type AlertMetric = z.infer<typeof metricSchema>;
export type AlertOperator = z.infer<typeof thresholdSchema>['operator'];
export type AlertSeverity = z.infer<typeof thresholdSchema>['severity'];
export type AlertThreshold = z.infer<typeof thresholdSchema>;
export type AlertConfig = z.infer<typeof alertConfigSchema>;

export interface PerformanceAlert {
	timestamp: string;
	severity: AlertSeverity;
	threshold_name: string;
	message: string;
	/** Metric name; custom metrics read `custom:<key>` */
	metric: string;
	value: number;
	threshold_value: number;
}

export interface PerformanceSummary {
	total_duration_ms: number;
	scenario_count: number;
	scenarios_passed: number;
	scenarios_failed: number;
	scenarios_skipped: number;
	step_count: number;
	avg_scenario_duration_ms: number;
	avg_step_duration_ms: number;
	max_scenario_duration_ms: number;
	max_step_duration_ms: number;
	failure_rate_percent: number;
	alerts_generated: number;
}

/** Built-in rules: slow scenarios, very slow scenarios, slow steps and a high failure rate. */
export function defaultAlertConfig(): AlertConfig {
	return {
		name: 'default',
		enabled: true,
		thresholds: [
			{
				name: 'slow_scenario',
				metric: 'scenario_duration_ms',
				operator: '>',
				value: 30_000,
				severity: 'warning',
				message: 'Average scenario duration {value}ms exceeds 30s',
			},
			{
				name: 'very_slow_scenario',
				metric: 'scenario_duration_ms',
				operator: '>',
				value: 60_000,
				severity: 'critical',
				message: 'Average scenario duration {value}ms exceeds 60s',
			},
			{
				name: 'slow_step',
				metric: 'step_duration_ms',
				operator: '>',
				value: 10_000,
				severity: 'warning',
				message: 'Average step duration {value}ms exceeds 10s',
			},
			{
				name: 'high_failure_rate',
				metric: 'failure_rate_percent',
				operator: '>',
				value: 10,
				severity: 'warning',
				message: 'Failure rate {value}% exceeds 10%',
			},
		],
	};
}

export function metricName(metric: AlertMetric): string {
	return typeof metric === 'string' ? metric : `custom:${metric.custom}`;
}

/** Apply a comparison operator; equality holds within `Number.EPSILON`. */
export function compareMetric(value: number, operator: AlertOperator, threshold: number): boolean {
	switch (operator) {
		case '>':
			return value > threshold;
		case '<':
			return value < threshold;
		case '==':
			return Math.abs(value - threshold) < Number.EPSILON;
		case '!=':
			return Math.abs(value - threshold) >= Number.EPSILON;
	}
}

// ---------------------------------------------------------------------------
// PerformanceMonitor
// ---------------------------------------------------------------------------

export interface PerformanceMonitorOptions {
	/** Clock in ms (default: Date.now) */
	now?: () => number;
}

function mean(values: readonly number[]): number {
	return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

function max(values: readonly number[]): number {
	return values.reduce((m, v) => (v > m ? v : m), 0);
}

export class PerformanceMonitor {
	private readonly now: () => number;
	private readonly startedAt: number;
	private readonly scenarioDurations: number[] = [];
	private readonly stepDurations: number[] = [];
	private scenarioCount = 0;
	private passedScenarios = 0;
	private failedScenarios = 0;
	private skippedScenarios = 0;
	private stepCount = 0;
	private readonly customMetrics = new Map<string, number>();
	private readonly alerts: PerformanceAlert[] = [];

	constructor(options: PerformanceMonitorOptions = {}) {
		this.now = options.now ?? Date.now;
		this.startedAt = this.now();
	}

	/** Record a scenario and every step in it. */
	recordScenario(scenario: ScenarioResult): void {
		this.scenarioCount++;
		this.scenarioDurations.push(scenario.duration_ms);
		if (scenario.status === 'passed') this.passedScenarios++;
		else if (scenario.status === 'failed') this.failedScenarios++;
		else if (scenario.status === 'skipped') this.skippedScenarios++;

		for (const step of scenario.steps) this.recordStep(step);
	}

	recordStep(step: StepResult): void {
		this.stepCount++;
		this.stepDurations.push(step.duration_ms);
	}

	setMetric(key: string, value: number): void {
		this.customMetrics.set(key, value);
	}

	getMetricValue(metric: AlertMetric): number {
		if (typeof metric !== 'string') return this.customMetrics.get(metric.custom) ?? 0;

		switch (metric) {
			case 'scenario_duration_ms':
				return mean(this.scenarioDurations);
			case 'step_duration_ms':
				return mean(this.stepDurations);
			case 'failure_rate_percent':
				return this.failureRate();
			case 'total_duration_ms':
				return this.elapsedMs();
			case 'scenarios_per_second':
				return this.perSecond(this.scenarioCount);
			case 'steps_per_second':
				return this.perSecond(this.stepCount);
			case 'memory_usage_mb':
				return process.memoryUsage().rss / (1024 * 1024);
		}
	}

	/**
	 * Evaluate one rule-set. Every matching threshold yields an alert,
	 * which the monitor also keeps for `getSummary().alerts_generated`.
	 */
	evaluateThresholds(config: AlertConfig): PerformanceAlert[] {
		if (!config.enabled) return [];

		const fired: PerformanceAlert[] = [];
		for (const threshold of config.thresholds) {
			const value = this.getMetricValue(threshold.metric);
			if (!compareMetric(value, threshold.operator, threshold.value)) continue;

			fired.push({
				timestamp: new Date(this.now()).toISOString(),
				severity: threshold.severity,
				threshold_name: threshold.name,
				message: threshold.message.replaceAll('{value}', value.toFixed(1)),
				metric: metricName(threshold.metric),
				value,
				threshold_value: threshold.value,
			});
		}

		this.alerts.push(...fired);
		return fired;
	}

	getSummary(): PerformanceSummary {
		return {
			total_duration_ms: this.elapsedMs(),
			scenario_count: this.scenarioCount,
			scenarios_passed: this.passedScenarios,
			scenarios_failed: this.failedScenarios,
			scenarios_skipped: this.skippedScenarios,
			step_count: this.stepCount,
			avg_scenario_duration_ms: mean(this.scenarioDurations),
			avg_step_duration_ms: mean(this.stepDurations),
			max_scenario_duration_ms: max(this.scenarioDurations),
			max_step_duration_ms: max(this.stepDurations),
			failure_rate_percent: this.failureRate(),
			alerts_generated: this.alerts.length,
		};
	}

	private elapsedMs(): number {
		return this.now() - this.startedAt;
	}

	private failureRate(): number {
		return this.scenarioCount === 0 ? 0 : (this.failedScenarios / this.scenarioCount) * 100;
	}

	private perSecond(count: number): number {
		const seconds = this.elapsedMs() / 1000;
		return seconds === 0 ? 0 : count / seconds;
	}
}

// ---------------------------------------------------------------------------
// AlertManager
// ---------------------------------------------------------------------------

export class AlertManager {
	private readonly configs: AlertConfig[];

	constructor(configs: AlertConfig[] = []) {
		this.configs = [...configs];
	}

	/** Load a YAML or JSON list of rule-sets. Throws ConfigError when unreadable or invalid. */
	static fromFile(path: string): AlertManager {
		let text: string;
		try {
			text = readFileSync(path, 'utf-8');
		} catch (err) {
			throw new ConfigError(`Cannot read alert config '${path}': ${errorMessage(err)}`, undefined, err);
		}
		return new AlertManager(parseAlertConfigs(text, path));
	}

	addConfig(config: AlertConfig): void {
		this.configs.push(config);
	}

	getConfigs(): readonly AlertConfig[] {
		return this.configs;
	}

	/** Alerts from every rule-set, in config order. */
	evaluate(monitor: PerformanceMonitor): PerformanceAlert[] {
		return this.configs.flatMap((config) => monitor.evaluateThresholds(config));
	}
}

export function parseAlertConfigs(text: string, source: string): AlertConfig[] {
	let raw: unknown;
	try {
		raw = extname(source).toLowerCase() === '.json' ? JSON.parse(text) : yaml.parse(text);
	} catch (err) {
		throw new ConfigError(`Invalid alert config '${source}': ${errorMessage(err)}`, undefined, err);
	}

	const parsed = z.array(alertConfigSchema).safeParse(raw);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
		throw new ConfigError(
			`Invalid alert config '${source}'${where}: ${issue?.message ?? 'invalid document'}`,
			'Expected a list of { name, enabled, thresholds: [{ name, metric, operator, value, severity, message }] }',
		);
	}
	return parsed.data;
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

export type AlertOutputFormat = 'text' | 'json' | 'yaml';

export function formatAlerts(alerts: readonly PerformanceAlert[], format: AlertOutputFormat = 'text'): string {
	switch (format) {
		case 'json':
			return `${JSON.stringify({ alerts, count: alerts.length }, null, 2)}\n`;
		case 'yaml':
			return yaml.stringify({ alerts, count: alerts.length });
		default:
			return formatAlertText(alerts);
	}
}

function formatAlertText(alerts: readonly PerformanceAlert[]): string {
	if (alerts.length === 0) return 'No performance alerts triggered\n';

	const counts: Record<AlertSeverity, number> = { critical: 0, warning: 0, info: 0 };
	const lines = ['=== Performance Alerts ===', ''];
	for (const alert of alerts) {
		counts[alert.severity]++;
		lines.push(
			`[${alert.severity.toUpperCase()}] ${alert.threshold_name}: ${alert.message} ` +
				`(value: ${alert.value.toFixed(2)}, threshold: ${alert.threshold_value.toFixed(2)})`,
		);
	}
	lines.push('', `Summary: ${counts.critical} critical, ${counts.warning} warning, ${counts.info} info`);
	return `${lines.join('\n')}\n`;
}
