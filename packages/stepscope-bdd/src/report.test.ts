import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, describe, expect, it } from 'vitest';
import { ReportParseError } from './errors.js';
import { formatFromPath, loadReport, parseReport, serializeReport, writeReport } from './report.js';
import { ExecutionResultBuilder, ScenarioResultBuilder, stepResult } from './result.js';

const JSON_REPORT = JSON.stringify({
	status: 'passed',
	timestamp: '2024-01-01T00:00:00.000Z',
	duration_ms: 300,
	feature: { name: 'Search', file: 'search.feature', description: null },
	scenarios: [
		{
			name: 'Finds results',
			status: 'passed',
			duration_ms: 300,
			steps: [
				{ text: 'I navigate to "/"', keyword: 'Given', status: 'passed', duration_ms: 100, output: null, error: null },
				{
					text: 'I should see "Results"',
					keyword: 'Then',
					status: 'failed',
					duration_ms: 200,
					output: null,
					error: { code: 'STEP_EXECUTION_ERROR', message: 'text not found', suggestions: [] },
				},
			],
		},
	],
	summary: { total_scenarios: 1, passed_scenarios: 1, failed_scenarios: 0 },
});

const YAML_REPORT = `
timestamp: "2024-02-02T00:00:00.000Z"
duration_ms: 50
feature:
  name: Cart
scenarios:
  - name: Empty cart
    duration_ms: 50
    steps:
      - text: I go back
        keyword: Given
        status: pending
        duration_ms: 0
`;

describe('parseReport', () => {
	it('should rebuild statuses from the steps', () => {
		const result = parseReport(JSON_REPORT, 'json');
		expect(result.status).toBe('failed');
		expect(result.scenarios[0]?.status).toBe('failed');
		expect(result.summary.failed_scenarios).toBe(1);
		expect(result.feature).toEqual({ name: 'Search', file: 'search.feature' });
		expect(result.scenarios[0]?.steps[1]?.error?.message).toBe('text not found');
	});

	it('should read YAML and treat pending steps as skipped', () => {
		const result = parseReport(YAML_REPORT, 'yaml');
		expect(result.feature.name).toBe('Cart');
		expect(result.scenarios[0]?.steps[0]?.status).toBe('skipped');
		expect(result.status).toBe('skipped');
	});

	it('should throw ReportParseError for malformed text', () => {
		expect(() => parseReport('{ not json', 'json', 'broken.json')).toThrow(ReportParseError);
	});

	it('should name the offending field', () => {
		expect(() => parseReport('{"timestamp":"t","duration_ms":-1,"feature":{"name":"x"}}', 'json', 'neg.json')).toThrow(
			`Invalid execution report 'neg.json': duration_ms: Number must be greater than or equal to 0`,
		);
	});
});

describe('report files', () => {
	const dir = mkdtempSync(join(tmpdir(), 'stepscope-report-'));

	afterAll(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	const result = new ExecutionResultBuilder({ name: 'Saved' }, { timestamp: '2024-03-03T00:00:00.000Z' })
		.addScenario(
			new ScenarioResultBuilder('One').addStep(stepResult('I go back', 'Given', 'passed', { durationMs: 5 })),
		)
		.duration(5)
		.build();

	it('should pick the format from the extension', () => {
		expect(formatFromPath('a.yml')).toBe('yaml');
		expect(formatFromPath('a.YAML')).toBe('yaml');
		expect(formatFromPath('a.json')).toBe('json');
		expect(formatFromPath('a.txt')).toBe('json');
	});

	it('should write and load YAML and JSON reports', () => {
		for (const name of ['saved.yaml', 'saved.json']) {
			const path = join(dir, name);
			writeReport(path, result);
			expect(loadReport(path)).toEqual(result);
		}
	});

	it('should serialise JSON with snake_case fields', () => {
		const doc: unknown = JSON.parse(serializeReport(result, 'json'));
		expect(doc).toMatchObject({ duration_ms: 5, summary: { total_scenarios: 1, passed_steps: 1 } });
	});

	it('should wrap read failures in ReportParseError', () => {
		expect(() => loadReport(join(dir, 'missing.json'))).toThrow(ReportParseError);
	});

	it('should reject a document of the wrong shape', () => {
		const path = join(dir, 'wrong.json');
		writeFileSync(path, '[1, 2, 3]');
		expect(() => loadReport(path)).toThrow(ReportParseError);
	});
});
