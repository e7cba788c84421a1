import { describe, expect, it } from 'vitest';
import { StepCatalog, loadStepCatalog } from './step-catalog.js';
import { findSimilarSteps, validateFeatureSource, validateStep } from './validation.js';

const catalog = new StepCatalog([
	{
		id: 'click',
		pattern: 'I click on "([^"]+)"',
		aliases: ['I tap "([^"]+)"'],
		category: 'Interaction',
		description: 'Click an element',
		parameters: [],
		examples: [],
	},
	{
		id: 'hover',
		pattern: 'I hover over "([^"]+)"',
		aliases: [],
		category: 'Interaction',
		description: 'Move the pointer over an element',
		parameters: [],
		examples: [],
	},
	{
		id: 'type_text',
		pattern: 'I type "([^"]+)" into "([^"]+)"',
		aliases: [],
		category: 'Input',
		description: 'Type text into a field',
		parameters: [],
		examples: [],
	},
]);

describe('validateStep', () => {
	it('should accept text matching a pattern or an alias', () => {
		expect(validateStep('I click on "#go"', 1, catalog)).toBeNull();
		expect(validateStep('I tap "#go"', 2, catalog)).toBeNull();
	});

	it('should report an unknown step with similar ids', () => {
		expect(validateStep('I smash an element', 4, catalog)).toEqual({
			code: 'UNKNOWN_STEP',
			message: `Step 'I smash an element' does not match any registered pattern`,
			stepNumber: 4,
			stepText: 'I smash an element',
			similar: ['click', 'hover'],
			suggestions: ['Did you mean: click or hover?'],
		});
	});

	it('should add keyword hints and the fallback when nothing is similar', () => {
		expect(validateStep('the button should glow', 1, catalog)?.suggestions).toEqual([
			`For assertions, try: 'the element "selector" should be visible' or 'the page should contain "text"'`,
			`Run 'stepscope steps' to see all available step patterns`,
		]);
	});
});

describe('findSimilarSteps', () => {
	it('should order by shared words', () => {
		expect(findSimilarSteps('I move the pointer to an element', catalog)).toEqual(['hover', 'click']);
	});

	it('should require two shared words', () => {
		expect(findSimilarSteps('field', catalog)).toEqual([]);
	});
});

describe('validateFeatureSource', () => {
	const builtIn = loadStepCatalog();

	it('should accept a feature written with built-in steps', () => {
		const source = [
			'Feature: Login',
			'  Scenario: Valid Login',
			'    Given I navigate to "https://example.com"',
			'    When I click on "button.login"',
			'    Then I should see "Welcome"',
		].join('\n');

		expect(validateFeatureSource(source, builtIn)).toEqual({ valid: true, errors: [], warnings: [] });
	});

	it('should number steps across the file', () => {
		const source = [
			'Feature: Login',
			'  Scenario: One',
			'    Given I go back',
			'  Scenario: Two',
			'    Given I foobarbaz something',
		].join('\n');

		const result = validateFeatureSource(source, builtIn);
		expect(result.valid).toBe(false);
		expect(result.errors.map((e) => [e.code, e.stepNumber])).toEqual([['UNKNOWN_STEP', 2]]);
	});

	it('should report a missing Feature line as an error', () => {
		const result = validateFeatureSource('Scenario: No feature\n  Given something', builtIn);
		expect(result.valid).toBe(false);
		expect(result.errors[0]?.code).toBe('MISSING_FEATURE');
	});

	it('should warn about empty features and scenarios', () => {
		expect(validateFeatureSource('Feature: Empty', builtIn).warnings).toEqual([
			{ code: 'NO_SCENARIOS', message: 'Feature file contains no scenarios' },
		]);
		expect(validateFeatureSource('Feature: Thin\n  Scenario: Nothing', builtIn).warnings).toEqual([
			{ code: 'EMPTY_SCENARIO', message: `Scenario 'Nothing' has no steps`, scenario: 'Nothing' },
		]);
	});
});
