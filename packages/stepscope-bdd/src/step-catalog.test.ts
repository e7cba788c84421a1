import { describe, expect, it } from 'vitest';
import { StepCatalog, checkCatalogConsistency, loadStepCatalog } from './step-catalog.js';
import { StepRegistry, createDefaultRegistry } from './step-registry.js';

describe('StepCatalog', () => {
	const catalog = loadStepCatalog();

	it('should find steps by id and category', () => {
		expect(catalog.findById('take_screenshot')?.category).toBe('Other');
		expect(catalog.findById('teleport')).toBeUndefined();
		expect(catalog.findByCategory('Scrolling').map((s) => s.id)).toEqual([
			'scroll_bottom',
			'scroll_to',
			'scroll_top',
		]);
	});

	it('should search ids, descriptions, aliases and examples without regard to case', () => {
		expect(catalog.search('SCROLL').map((s) => s.id)).toEqual([
			'execute_script',
			'scroll_bottom',
			'scroll_to',
			'scroll_top',
		]);
		expect(catalog.search('tap').map((s) => s.id)).toEqual(['click']);
	});

	it('should list sorted unique categories', () => {
		expect(catalog.categories).toEqual([
			'Extraction',
			'Input',
			'Interaction',
			'Navigation',
			'Other',
			'Scrolling',
			'State',
			'Verification',
			'Waiting',
		]);
	});

	it('should export a schema with metadata', () => {
		const schema = catalog.toSchema(new Date('2024-05-01T10:00:00.000Z'));
		expect(schema.metadata).toEqual({
			version: '0.1.0',
			generated_at: '2024-05-01T10:00:00.000Z',
			total_steps: 53,
			total_categories: 9,
		});
		expect(schema.steps).toHaveLength(53);
	});

	it('should reject a malformed catalog document', () => {
		expect(() => StepCatalog.fromDocument({ version: '1', steps: [{ id: 'x' }] })).toThrow();
	});
});

describe('checkCatalogConsistency', () => {
	it('should pass for the built-in registry and catalog', () => {
		expect(checkCatalogConsistency(createDefaultRegistry(), loadStepCatalog())).toEqual({
			ok: true,
			missingFromCatalog: [],
			missingFromRegistry: [],
			missingPatterns: [],
		});
	});

	it('should report identifiers the catalog does not document', () => {
		const registry = new StepRegistry().register('I go back', 'go_back').register('I hop', 'hop');
		const result = checkCatalogConsistency(registry, loadStepCatalog());

		expect(result.ok).toBe(false);
		expect(result.missingFromCatalog).toEqual(['hop']);
		expect(result.missingFromRegistry).toHaveLength(52);
	});

	it('should fail when a registered alias is not in the catalog entry', () => {
		const registry = createDefaultRegistry();
		const extended = new StepRegistry()
			.registerAll(registry.getAll())
			.register('I teleport to "([^"]+)"', 'navigate_to');

		expect(extended.match('I teleport to "https://example.test"')?.identifier).toBe('navigate_to');

		const result = checkCatalogConsistency(extended, loadStepCatalog());
		expect(result.ok).toBe(false);
		expect(result.missingFromCatalog).toEqual([]);
		expect(result.missingPatterns).toEqual([{ identifier: 'navigate_to', pattern: 'I teleport to "([^"]+)"' }]);
	});
});
