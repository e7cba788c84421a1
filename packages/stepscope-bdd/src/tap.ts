// ============================================================================
// TAP (Test Anything Protocol) output, version 13.
// One test point per scenario; non-passing scenarios carry a YAML
// diagnostic naming the first step that did not pass.
// ============================================================================

import type { ExecutionResult } from './result.js';

export interface TapSummary {
	version: string;
	total: number;
	passed: number;
	failed: number;
}

export function toTap(result: ExecutionResult): string {
	const lines: string[] = ['TAP version 13', `1..${result.scenarios.length}`];

	if (result.feature.file) {
		lines.push(`# File: ${result.feature.file}`);
	}

	result.scenarios.forEach((scenario, i) => {
		const passed = scenario.status === 'passed';
		lines.push(`${passed ? 'ok' : 'not ok'} ${i + 1} ${scenario.name}`);

		if (!passed) {
			const culprit = scenario.steps.find((s) => s.status !== 'passed');
			if (culprit) {
				lines.push('  ---', '  message: |', `    Step failed: ${culprit.text}`, '  ...');
			}
		}
	});

	return `${lines.join('\n')}\n`;
}

/** Count test points in TAP text. */
export function parseTap(text: string): TapSummary {
	const summary: TapSummary = { version: '13', total: 0, passed: 0, failed: 0 };

	for (const line of text.split(/\r?\n/)) {
		const trimmed = line.trim();

		if (trimmed.startsWith('TAP version')) {
			summary.version = trimmed.split(/\s+/)[2] ?? '13';
		} else if (trimmed.startsWith('1..')) {
			const n = Number.parseInt(trimmed.slice(3), 10);
			if (!Number.isNaN(n)) summary.total = n;
		} else if (trimmed.startsWith('ok ')) {
			summary.passed++;
		} else if (trimmed.startsWith('not ok ')) {
			summary.failed++;
		}
	}

	return summary;
}
