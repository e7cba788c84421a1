// ============================================================================
// Step Catalog - documentation-side view of the step table.
// Each definition carries its category, description, parameters and examples.
// The catalog is what users browse; the registry is what matching uses.
// ============================================================================

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { StepRegistry } from './step-registry.js';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const parameterSchema = z.object({
	name: z.string(),
	type: z.string(),
	required: z.boolean(),
	description: z.string(),
});

const stepDefinitionSchema = z.object({
	id: z.string().min(1),
	pattern: z.string().min(1),
	aliases: z.array(z.string()).default([]),
	category: z.string(),
	description: z.string(),
	parameters: z.array(parameterSchema).default([]),
	examples: z.array(z.string()).default([]),
});

const catalogFileSchema = z.object({
	version: z.string(),
	steps: z.array(stepDefinitionSchema),
});

export type StepParameter = z.infer<typeof parameterSchema>;
export type StepDefinition = z.infer<typeof stepDefinitionSchema>;

export interface CatalogSchema {
	metadata: {
		version: string;
		generated_at: string;
		total_steps: number;
		total_categories: number;
	};
	categories: string[];
	steps: StepDefinition[];
}

// ---------------------------------------------------------------------------
// Catalog
// ---------------------------------------------------------------------------

export class StepCatalog {
	readonly version: string;
	private readonly steps: StepDefinition[];
	private readonly byId = new Map<string, StepDefinition>();

	constructor(steps: StepDefinition[], version = '0.0.0') {
		this.version = version;
		this.steps = [...steps];
		for (const step of this.steps) {
			this.byId.set(step.id, step);
		}
	}

	/** Parse a catalog document (already decoded from JSON or YAML). */
	static fromDocument(doc: unknown): StepCatalog {
		const parsed = catalogFileSchema.parse(doc);
		return new StepCatalog(parsed.steps, parsed.version);
	}

	get size(): number {
		return this.steps.length;
	}

	getAll(): readonly StepDefinition[] {
		return this.steps;
	}

	findById(id: string): StepDefinition | undefined {
		return this.byId.get(id);
	}

	findByCategory(category: string): StepDefinition[] {
		return this.steps.filter((s) => s.category === category);
	}

	/** Case-insensitive search over id, description, category, aliases and examples. */
	search(query: string): StepDefinition[] {
		const q = query.toLowerCase();
		return this.steps.filter(
			(s) =>
				s.id.toLowerCase().includes(q) ||
				s.description.toLowerCase().includes(q) ||
				s.category.toLowerCase().includes(q) ||
				s.aliases.some((a) => a.toLowerCase().includes(q)) ||
				s.examples.some((e) => e.toLowerCase().includes(q)),
		);
	}

	/** Sorted, unique category names */
	get categories(): string[] {
		return [...new Set(this.steps.map((s) => s.category))].sort();
	}

	toSchema(now: Date = new Date()): CatalogSchema {
		const categories = this.categories;
		return {
			metadata: {
				version: this.version,
				generated_at: now.toISOString(),
				total_steps: this.steps.length,
				total_categories: categories.length,
			},
			categories,
			steps: this.steps.map((s) => ({ ...s })),
		};
	}
}

let builtIn: StepCatalog | null = null;

/** The catalog describing the built-in step table. */
export function loadStepCatalog(): StepCatalog {
	if (!builtIn) {
		const raw = readFileSync(new URL('../data/step-catalog.json', import.meta.url), 'utf-8');
		builtIn = StepCatalog.fromDocument(JSON.parse(raw));
	}
	return builtIn;
}

// ---------------------------------------------------------------------------
// Registry ↔ catalog consistency
// ---------------------------------------------------------------------------

export interface CatalogConsistency {
	ok: boolean;
	/** Identifiers the registry can match but the catalog does not document */
	missingFromCatalog: string[];
	/** Catalog ids the registry cannot match */
	missingFromRegistry: string[];
	/** Registered patterns and aliases absent from their catalog entry */
	missingPatterns: Array<{ identifier: string; pattern: string }>;
}

/**
 * Every pattern reachable at match time must be discoverable in the
 * catalog, under the same id as its pattern or one of its aliases.
 * Catalog-only ids are reported too but do not fail the check.
 */
export function checkCatalogConsistency(
	registry: StepRegistry,
	catalog: StepCatalog,
): CatalogConsistency {
	const registered = registry.identifiers();
	const registeredSet = new Set(registered);

	const missingFromCatalog: string[] = [];
	const missingPatterns: Array<{ identifier: string; pattern: string }> = [];
	for (const identifier of registered) {
		const step = catalog.findById(identifier);
		if (!step) {
			missingFromCatalog.push(identifier);
			continue;
		}
		const documented = new Set([step.pattern, ...step.aliases]);
		for (const pattern of registry.patternsFor(identifier)) {
			if (!documented.has(pattern)) missingPatterns.push({ identifier, pattern });
		}
	}

	const missingFromRegistry = catalog
		.getAll()
		.map((s) => s.id)
		.filter((id) => !registeredSet.has(id));

	return {
		ok: missingFromCatalog.length === 0 && missingPatterns.length === 0,
		missingFromCatalog,
		missingFromRegistry,
		missingPatterns,
	};
}
