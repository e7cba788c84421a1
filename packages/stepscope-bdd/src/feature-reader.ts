// ============================================================================
// Feature Reader - line-oriented reader for .feature files.
//
// Supports the subset the scenario runner and validator need:
// - Feature (with free-form description lines)
// - Background
// - Scenario / Example
// - Scenario Outline, expanded once per Examples row
// - Given, When, Then, And, But, *
// - Tags (@tag) and comments (#)
//
// Data tables outside Examples and doc strings are skipped over. And/But/* inherit the
// keyword of the step before them.
// ============================================================================

import { FeatureParseError } from './errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type StepKeyword = 'Given' | 'When' | 'Then';

export interface FeatureStep {
	/** Keyword as written in the file */
	keyword: string;
	/** Given/When/Then, with And/But resolved to the preceding keyword */
	effectiveKeyword: StepKeyword;
	text: string;
	/** 1-based line number */
	line: number;
}

export interface FeatureScenario {
	name: string;
	tags: string[];
	steps: FeatureStep[];
	line: number;
}

export interface FeatureDocument {
	name: string;
	description: string;
	tags: string[];
	/** Steps prepended to every scenario */
	background: FeatureStep[];
	scenarios: FeatureScenario[];
	uri?: string;
}

// ---------------------------------------------------------------------------
// Keywords
// ---------------------------------------------------------------------------

const FEATURE = ['Feature'];
const BACKGROUND = ['Background'];
const OUTLINE = ['Scenario Outline', 'Scenario Template'];
const SCENARIO = ['Scenario', 'Example'];
const EXAMPLES = ['Examples', 'Scenarios'];
const STEP_KEYWORDS = ['Given', 'When', 'Then', 'And', 'But'];

interface ExamplesTable {
	tags: string[];
	header: string[] | null;
	rows: Array<{ cells: string[]; line: number }>;
}

interface Outline {
	scenario: FeatureScenario;
	examples: ExamplesTable[];
}

type Section =
	| { kind: 'none' }
	| { kind: 'background' }
	| { kind: 'scenario'; scenario: FeatureScenario }
	| { kind: 'examples'; scenario: FeatureScenario; table: ExamplesTable };

// ---------------------------------------------------------------------------
// Reader
// ---------------------------------------------------------------------------

/**
 * Parse feature source text.
 *
 * @throws FeatureParseError when there is no `Feature:` line
 */
export function parseFeature(source: string, uri?: string): FeatureDocument {
	const lines = source.split(/\r?\n/);

	let doc: FeatureDocument | null = null;
	let section: Section = { kind: 'none' };
	let pendingTags: string[] = [];
	let previousKeyword: StepKeyword = 'Given';
	let docStringFence: string | null = null;
	const description: string[] = [];
	const outlines = new Map<FeatureScenario, Outline>();

	for (let i = 0; i < lines.length; i++) {
		const ln = (lines[i] ?? '').trim();

		// Doc string bodies are opaque
		if (docStringFence) {
			if (ln.startsWith(docStringFence)) docStringFence = null;
			continue;
		}
		if (ln.startsWith('"""') || ln.startsWith('```')) {
			docStringFence = ln.slice(0, 3);
			continue;
		}

		if (ln.startsWith('|')) {
			if (section.kind === 'examples') {
				const cells = parseRow(ln);
				if (section.table.header) section.table.rows.push({ cells, line: i + 1 });
				else section.table.header = cells;
			}
			continue;
		}

		if (ln === '' || ln.startsWith('#')) continue;

		if (ln.startsWith('@')) {
			pendingTags.push(...(ln.match(/@[\w][\w\-_]*/g) ?? []));
			continue;
		}

		const featureMatch = matchKeyword(ln, FEATURE);
		if (featureMatch) {
			if (doc) {
				throw new FeatureParseError(`line ${i + 1}: a file may declare only one Feature`, uri);
			}
			doc = {
				name: featureMatch.rest,
				description: '',
				tags: pendingTags,
				background: [],
				scenarios: [],
				uri,
			};
			pendingTags = [];
			continue;
		}

		if (!doc) {
			// Anything before the Feature line other than tags and comments
			continue;
		}

		if (matchKeyword(ln, BACKGROUND)) {
			section = { kind: 'background' };
			previousKeyword = 'Given';
			continue;
		}

		const examplesMatch = matchKeyword(ln, EXAMPLES);
		if (examplesMatch) {
			const outline: Outline | undefined =
				section.kind === 'scenario' || section.kind === 'examples' ? outlines.get(section.scenario) : undefined;
			if (!outline) {
				throw new FeatureParseError(`line ${i + 1}: Examples outside a Scenario Outline`, uri);
			}
			const table: ExamplesTable = { tags: pendingTags, header: null, rows: [] };
			pendingTags = [];
			outline.examples.push(table);
			const outlineScenario: FeatureScenario = outline.scenario;
			section = { kind: 'examples', scenario: outlineScenario, table };
			continue;
		}

		const outlineMatch = matchKeyword(ln, OUTLINE);
		const scenarioMatch = outlineMatch ?? matchKeyword(ln, SCENARIO);
		if (scenarioMatch) {
			const scenario: FeatureScenario = {
				name: scenarioMatch.rest,
				tags: pendingTags,
				steps: [],
				line: i + 1,
			};
			pendingTags = [];
			doc.scenarios.push(scenario);
			if (outlineMatch) outlines.set(scenario, { scenario, examples: [] });
			section = { kind: 'scenario', scenario };
			previousKeyword = 'Given';
			continue;
		}

		const stepMatch = matchStepKeyword(ln, previousKeyword);
		if (stepMatch && section.kind !== 'none') {
			previousKeyword = stepMatch.effectiveKeyword;
			const step: FeatureStep = { ...stepMatch, line: i + 1 };
			if (section.kind === 'background') {
				doc.background.push(step);
			} else {
				section.scenario.steps.push(step);
			}
			continue;
		}

		if (section.kind === 'none') {
			description.push(ln);
		}
		// Other free text (scenario and Examples descriptions) is ignored
	}

	if (!doc) {
		throw new FeatureParseError('no "Feature:" line found', uri);
	}

	doc.description = description.join('\n');
	doc.scenarios = doc.scenarios.flatMap((s) => {
		const outline = outlines.get(s);
		return outline ? expandOutline(outline) : [s];
	});
	return doc;
}

/**
 * One scenario per Examples row, with `<name>` placeholders in the title and
 * steps replaced by the row's cells. Rows of an outline whose title has no
 * placeholder are told apart by an ` (example N)` suffix.
 */
function expandOutline(outline: Outline): FeatureScenario[] {
	const { scenario } = outline;
	const expanded: FeatureScenario[] = [];

	for (const table of outline.examples) {
		const header = table.header;
		if (!header) continue;

		for (const row of table.rows) {
			const values = new Map(header.map((key, i): [string, string] => [key, row.cells[i] ?? '']));
			const name = fillPlaceholders(scenario.name, values);
			expanded.push({
				name: name === scenario.name ? `${name} (example ${expanded.length + 1})` : name,
				tags: [...scenario.tags, ...table.tags],
				steps: scenario.steps.map((step) => ({ ...step, text: fillPlaceholders(step.text, values) })),
				line: row.line,
			});
		}
	}

	return expanded;
}

function fillPlaceholders(text: string, values: ReadonlyMap<string, string>): string {
	return text.replace(/<([^<>]+)>/g, (whole, key: string) => values.get(key) ?? whole);
}

/** Cells of a `| a | b |` row; `\|` is a literal pipe. */
function parseRow(line: string): string[] {
	const inner = line.replace(/^\|/, '').replace(/\|$/, '');
	return inner.split(/(?<!\\)\|/).map((cell) => cell.trim().replace(/\\\|/g, '|'));
}

/** Every step of the document in execution order, background first. */
export function allSteps(doc: FeatureDocument): FeatureStep[] {
	return [...doc.background, ...doc.scenarios.flatMap((s) => s.steps)];
}

// ---------------------------------------------------------------------------
// Utility helpers
// ---------------------------------------------------------------------------

function matchKeyword(line: string, keywords: string[]): { keyword: string; rest: string } | null {
	for (const kw of keywords) {
		if (line.startsWith(`${kw}:`)) {
			return {
				keyword: kw,
				rest: line.slice(kw.length + 1).trim(),
			};
		}
	}
	return null;
}

function matchStepKeyword(
	line: string,
	previous: StepKeyword,
): Omit<FeatureStep, 'line'> | null {
	if (line.startsWith('* ')) {
		return { keyword: '*', effectiveKeyword: previous, text: line.slice(2).trim() };
	}

	for (const kw of STEP_KEYWORDS) {
		if (line.startsWith(`${kw} `)) {
			return {
				keyword: kw,
				effectiveKeyword: kw === 'Given' || kw === 'When' || kw === 'Then' ? kw : previous,
				text: line.slice(kw.length + 1).trim(),
			};
		}
	}

	return null;
}
