// ============================================================================
// Batch result formatting - text for the console, JSON/YAML for tooling.
// ============================================================================

import yaml from 'yaml';
import type { BatchResult } from './types.js';

export type BatchOutputFormat = 'text' | 'json' | 'yaml';

export function formatBatchResult(result: BatchResult, format: BatchOutputFormat = 'text'): string {
	switch (format) {
		case 'json':
			return `${JSON.stringify(toDocument(result), null, 2)}\n`;
		case 'yaml':
			return yaml.stringify(toDocument(result));
		default:
			return formatText(result);
	}
}

/** Serialisable view: per-feature rows without the nested execution results. */
export function toDocument(result: BatchResult) {
	return {
		batch_summary: {
			total_features: result.total_features,
			passed_features: result.passed_features,
			failed_features: result.failed_features,
			total_scenarios: result.total_scenarios,
			passed_scenarios: result.passed_scenarios,
			failed_scenarios: result.failed_scenarios,
			duration_ms: result.total_duration_ms,
		},
		features: result.results.map((f) => ({
			name: f.name,
			path: f.path,
			status: f.status,
			scenarios_passed: f.scenarios_passed,
			scenarios_failed: f.scenarios_failed,
			scenarios_skipped: f.scenarios_skipped,
			duration_ms: f.duration_ms,
		})),
		errors: result.errors.map((e) => ({ path: e.path, error: e.error, timestamp: e.timestamp })),
	};
}

function formatText(result: BatchResult): string {
	const lines: string[] = [];

	lines.push('=== Batch Execution Summary ===', '');
	lines.push(
		`Features:  ${result.total_features} total, ${result.passed_features} passed, ${result.failed_features} failed`,
	);
	lines.push(
		`Scenarios: ${result.total_scenarios} total, ${result.passed_scenarios} passed, ${result.failed_scenarios} failed`,
	);
	lines.push(`Duration:  ${formatDuration(result.total_duration_ms)}`, '');

	lines.push('=== Feature Results ===');
	for (const feature of result.results) {
		const icon = feature.status === 'passed' ? '✓' : '✗';
		lines.push(`${icon} ${feature.name} - ${feature.status} (${formatDuration(feature.duration_ms)})`);
		if (feature.scenarios_failed > 0) {
			const ran = feature.scenarios_passed + feature.scenarios_failed;
			lines.push(`    Failed: ${feature.scenarios_failed}/${ran} scenarios`);
		}
	}

	if (result.errors.length > 0) {
		lines.push('', '=== Errors ===');
		for (const error of result.errors) {
			lines.push(`✗ ${error.path} - ${error.error}`);
		}
	}

	return `${lines.join('\n')}\n`;
}

export function formatDuration(ms: number): string {
	if (ms < 1000) return `${ms}ms`;
	if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
	const minutes = Math.floor(ms / 60_000);
	const seconds = ((ms % 60_000) / 1000).toFixed(1);
	return `${minutes}m ${seconds}s`;
}
