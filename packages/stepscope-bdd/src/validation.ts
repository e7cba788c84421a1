// ============================================================================
// Step & feature validation against the step catalog.
// Validation never runs a step; it only checks that every step text can be
// matched, and explains what to write instead when it cannot.
// ============================================================================

import { FeatureParseError, PatternCompileError } from './errors.js';
import { allSteps, parseFeature } from './feature-reader.js';
import type { FeatureDocument } from './feature-reader.js';
import type { StepCatalog } from './step-catalog.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ValidationErrorCode = 'UNKNOWN_STEP' | 'MISSING_FEATURE';
export type ValidationWarningCode = 'NO_SCENARIOS' | 'EMPTY_SCENARIO';

export interface ValidationIssue {
	code: ValidationErrorCode;
	message: string;
	stepNumber?: number;
	stepText?: string;
	/** Catalog ids whose descriptions resemble the step text */
	similar: string[];
	/** Human-readable hints, most relevant first */
	suggestions: string[];
}

export interface ValidationWarning {
	code: ValidationWarningCode;
	message: string;
	scenario?: string;
}

export interface ValidationResult {
	valid: boolean;
	errors: ValidationIssue[];
	warnings: ValidationWarning[];
}

// ---------------------------------------------------------------------------
// Step validation
// ---------------------------------------------------------------------------

const compiledCatalogs = new WeakMap<StepCatalog, RegExp[]>();

function catalogPatterns(catalog: StepCatalog): RegExp[] {
	let compiled = compiledCatalogs.get(catalog);
	if (!compiled) {
		compiled = catalog.getAll().flatMap((step) =>
			[step.pattern, ...step.aliases].map((source) => {
				try {
					return new RegExp(source);
				} catch (err) {
					throw new PatternCompileError({ pattern: source, identifier: step.id, cause: err });
				}
			}),
		);
		compiledCatalogs.set(catalog, compiled);
	}
	return compiled;
}

/**
 * Check one step text against every catalog pattern and alias.
 * Returns null when the text is valid.
 */
export function validateStep(
	text: string,
	stepNumber: number,
	catalog: StepCatalog,
): ValidationIssue | null {
	if (catalogPatterns(catalog).some((re) => re.test(text))) {
		return null;
	}

	const similar = findSimilarSteps(text, catalog);
	const suggestions: string[] = [];

	if (similar.length > 0) {
		suggestions.push(`Did you mean: ${similar.join(' or ')}?`);
	}

	const lower = text.toLowerCase();
	if (lower.includes('click')) {
		suggestions.push(
			`For clicking elements, try: 'I click on "selector"' or 'I click the "button" button'`,
		);
	}
	if (lower.includes('type')) {
		suggestions.push(`For typing into fields, try: 'I type "text" into "selector"'`);
	}
	if (lower.includes('should')) {
		suggestions.push(
			`For assertions, try: 'the element "selector" should be visible' or 'the page should contain "text"'`,
		);
	}

	if (similar.length === 0) {
		suggestions.push(`Run 'stepscope steps' to see all available step patterns`);
	}

	return {
		code: 'UNKNOWN_STEP',
		message: `Step '${text}' does not match any registered pattern`,
		stepNumber,
		stepText: text,
		similar,
		suggestions,
	};
}

/**
 * Up to `limit` catalog ids whose descriptions share at least two words with
 * the text (case-insensitive), most shared words first.
 */
export function findSimilarSteps(text: string, catalog: StepCatalog, limit = 3): string[] {
	const words = text.split(/\s+/).filter(Boolean).map((w) => w.toLowerCase());

	const scored = catalog.getAll().flatMap((step) => {
		const described = new Set(step.description.split(/\s+/).map((w) => w.toLowerCase()));
		const shared = words.filter((w) => described.has(w)).length;
		return shared >= 2 ? [{ id: step.id, shared }] : [];
	});

	scored.sort((a, b) => b.shared - a.shared);
	return scored.slice(0, limit).map((s) => s.id);
}

// ---------------------------------------------------------------------------
// Feature validation
// ---------------------------------------------------------------------------

/** Validate every step of a parsed feature, background first. */
export function validateFeature(feature: FeatureDocument, catalog: StepCatalog): ValidationResult {
	const errors: ValidationIssue[] = [];
	const warnings: ValidationWarning[] = [];

	if (feature.scenarios.length === 0) {
		warnings.push({ code: 'NO_SCENARIOS', message: 'Feature file contains no scenarios' });
	}
	for (const scenario of feature.scenarios) {
		if (scenario.steps.length === 0) {
			warnings.push({
				code: 'EMPTY_SCENARIO',
				message: `Scenario '${scenario.name}' has no steps`,
				scenario: scenario.name,
			});
		}
	}

	allSteps(feature).forEach((step, i) => {
		const issue = validateStep(step.text, i + 1, catalog);
		if (issue) errors.push(issue);
	});

	return { valid: errors.length === 0, errors, warnings };
}

/**
 * Parse and validate feature source. A file without a `Feature:` line is
 * reported as a MISSING_FEATURE error rather than thrown.
 */
export function validateFeatureSource(
	source: string,
	catalog: StepCatalog,
	uri?: string,
): ValidationResult {
	let feature: FeatureDocument;
	try {
		feature = parseFeature(source, uri);
	} catch (err) {
		if (!(err instanceof FeatureParseError)) throw err;
		return {
			valid: false,
			errors: [
				{
					code: 'MISSING_FEATURE',
					message: err.message,
					similar: [],
					suggestions: err.hint ? [err.hint] : [],
				},
			],
			warnings: [],
		};
	}
	return validateFeature(feature, catalog);
}
