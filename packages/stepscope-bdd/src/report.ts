// ============================================================================
// Report documents - ExecutionResult ⇄ JSON / YAML on disk.
// Every document read from disk goes through the zod schema and is then
// rebuilt with `fromReport`.
// ============================================================================

import { readFileSync, writeFileSync } from 'node:fs';
import { extname } from 'node:path';
import yaml from 'yaml';
import { z } from 'zod';
import { ReportParseError, errorMessage } from './errors.js';
import { fromReport } from './result.js';
import type { ExecutionResult } from './result.js';

export type ReportFormat = 'json' | 'yaml';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

// A step that never ran may be written as "pending" by other tools
const stepStatusSchema = z
	.enum(['passed', 'failed', 'skipped', 'pending'])
	.transform((s) => (s === 'pending' ? 'skipped' : s));

const errorInfoSchema = z.object({
	code: z.string(),
	message: z.string(),
	suggestions: z.array(z.string()).default([]),
});

const stepSchema = z.object({
	text: z.string(),
	keyword: z.string(),
	status: stepStatusSchema,
	duration_ms: z.number().nonnegative(),
	output: z.string().nullish(),
	error: errorInfoSchema.nullish(),
});

const scenarioSchema = z.object({
	name: z.string(),
	status: z.string().optional(),
	duration_ms: z.number().nonnegative(),
	steps: z.array(stepSchema).default([]),
});

export const reportSchema = z.object({
	status: z.string().optional(),
	timestamp: z.string(),
	duration_ms: z.number().nonnegative(),
	feature: z.object({
		name: z.string(),
		file: z.string().nullish(),
		description: z.string().nullish(),
	}),
	scenarios: z.array(scenarioSchema).default([]),
	summary: z.record(z.number()).optional(),
});

export type ReportDocument = z.infer<typeof reportSchema>;

// ---------------------------------------------------------------------------
// Reading
// ---------------------------------------------------------------------------

/** Pick the format from a file extension. Anything but .yaml/.yml is JSON. */
export function formatFromPath(path: string): ReportFormat {
	const ext = extname(path).toLowerCase();
	return ext === '.yaml' || ext === '.yml' ? 'yaml' : 'json';
}

/**
 * Parse report text into a frozen ExecutionResult.
 *
 * @throws ReportParseError on malformed text or a document of the wrong shape
 */
export function parseReport(text: string, format: ReportFormat, source = '<input>'): ExecutionResult {
	let raw: unknown;
	try {
		raw = format === 'yaml' ? yaml.parse(text) : JSON.parse(text);
	} catch (err) {
		throw new ReportParseError(source, errorMessage(err), err);
	}

	const parsed = reportSchema.safeParse(raw);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
		throw new ReportParseError(source, `${where}${issue?.message ?? 'invalid document'}`, parsed.error);
	}

	return fromReport(parsed.data);
}

/** Read a report file, choosing JSON or YAML by extension. */
export function loadReport(path: string): ExecutionResult {
	let text: string;
	try {
		text = readFileSync(path, 'utf-8');
	} catch (err) {
		throw new ReportParseError(path, errorMessage(err), err);
	}
	return parseReport(text, formatFromPath(path), path);
}

// ---------------------------------------------------------------------------
// Writing
// ---------------------------------------------------------------------------

export function serializeReport(result: ExecutionResult, format: ReportFormat = 'json'): string {
	return format === 'yaml' ? yaml.stringify(result) : `${JSON.stringify(result, null, 2)}\n`;
}

/** Write a report; the format follows the file extension unless given. */
export function writeReport(path: string, result: ExecutionResult, format?: ReportFormat): void {
	writeFileSync(path, serializeReport(result, format ?? formatFromPath(path)), 'utf-8');
}
