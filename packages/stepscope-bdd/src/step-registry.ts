// ============================================================================
// Step Pattern Registry - ordered (pattern, identifier) table.
//
// - Patterns are unanchored regular expressions with capture groups
// - Aliases map alternative patterns to the same identifier
// - Matching scans entries in registration order; the first match wins
// - Capture groups from alternation branches that did not participate are
//   dropped, so parameter positions are only meaningful within one match
// - A sealed registry refuses further registrations
// ============================================================================

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { PatternCompileError, RegistrySealedError } from './errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A step pattern and the aliases that resolve to the same identifier */
export interface PatternEntry {
	identifier: string;
	pattern: string;
	aliases: string[];
}

/** One compiled row of the table. Aliases get their own row. */
interface CompiledPattern {
	identifier: string;
	source: string;
	regex: RegExp;
	/** True when this row came from an alias of the entry */
	alias: boolean;
}

export interface StepMatch {
	/** Identifier of the matched entry */
	identifier: string;
	/** Captured parameters, left to right, non-participating groups omitted */
	parameters: string[];
	/** The pattern (or alias) source that matched */
	pattern: string;
}

/** Two or more identifiers registered under the exact same pattern string */
export interface DuplicatePatternWarning {
	pattern: string;
	/** The identifier every match resolves to */
	winner: string;
	/** Identifiers that can never be reached through this pattern */
	shadowed: string[];
}

export type RegistryValidation =
	| { ok: true }
	| { ok: false; warnings: DuplicatePatternWarning[] };

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export class StepRegistry {
	private readonly compiled: CompiledPattern[] = [];
	private readonly entries: PatternEntry[] = [];
	private isSealed = false;

	/**
	 * Register a pattern (and its aliases) under an identifier.
	 *
	 * ```ts
	 * registry.register('I click on "([^"]+)"', 'click', ['I tap "([^"]+)"']);
	 * ```
	 *
	 * Throws PatternCompileError for an invalid regular expression.
	 */
	register(pattern: string, identifier: string, aliases: string[] = []): this {
		if (this.isSealed) {
			throw new RegistrySealedError(identifier);
		}

		// Compile everything first so a bad alias leaves the table untouched
		const rows = [pattern, ...aliases].map((source, i) => ({
			identifier,
			source,
			regex: compile(source, identifier),
			alias: i > 0,
		}));

		this.compiled.push(...rows);
		this.entries.push({ identifier, pattern, aliases: [...aliases] });
		return this;
	}

	/** Register entries in order. */
	registerAll(entries: Iterable<PatternEntry>): this {
		for (const entry of entries) {
			this.register(entry.pattern, entry.identifier, entry.aliases);
		}
		return this;
	}

	/** Freeze the registration order. */
	seal(): this {
		this.isSealed = true;
		return this;
	}

	get sealed(): boolean {
		return this.isSealed;
	}

	/** Number of compiled patterns, aliases included */
	get size(): number {
		return this.compiled.length;
	}

	/**
	 * Match step text against the table.
	 * Returns null when no pattern matches.
	 */
	match(text: string): StepMatch | null {
		for (const row of this.compiled) {
			const m = row.regex.exec(text);
			if (m) {
				const parameters = m.slice(1).filter((g): g is string => g !== undefined);
				return { identifier: row.identifier, parameters, pattern: row.source };
			}
		}
		return null;
	}

	/** Registered entries in registration order. */
	getAll(): ReadonlyArray<Readonly<PatternEntry>> {
		return this.entries;
	}

	/** Distinct identifiers in first-registration order. */
	identifiers(): string[] {
		return [...new Set(this.entries.map((e) => e.identifier))];
	}

	/** Every compiled pattern source registered under an identifier. */
	patternsFor(identifier: string): string[] {
		return this.compiled.filter((r) => r.identifier === identifier).map((r) => r.source);
	}

	/** Step texts that no pattern matches. */
	findUnmatched(texts: string[]): string[] {
		return texts.filter((text) => !this.match(text));
	}

	/**
	 * Closest patterns to an unmatched step, by edit distance against the
	 * pattern with its capture groups blanked out.
	 */
	suggest(text: string, limit = 3): string[] {
		const scored = this.compiled
			.filter((r) => !r.alias)
			.map((r) => ({
				source: r.source,
				distance: levenshtein(text.toLowerCase(), readable(r.source).toLowerCase()),
			}));
		scored.sort((a, b) => a.distance - b.distance);
		return scored.slice(0, limit).map((s) => s.source);
	}

	/**
	 * Detect exact-duplicate pattern strings registered under different
	 * identifiers. The later identifiers are unreachable through that pattern.
	 */
	validate(): RegistryValidation {
		const owners = new Map<string, string[]>();
		for (const row of this.compiled) {
			const ids = owners.get(row.source) ?? [];
			if (!ids.includes(row.identifier)) ids.push(row.identifier);
			owners.set(row.source, ids);
		}

		const warnings: DuplicatePatternWarning[] = [];
		for (const [pattern, ids] of owners) {
			const [winner, ...shadowed] = ids;
			if (winner !== undefined && shadowed.length > 0) {
				warnings.push({ pattern, winner, shadowed });
			}
		}

		return warnings.length === 0 ? { ok: true } : { ok: false, warnings };
	}
}

// ---------------------------------------------------------------------------
// Built-in table
// ---------------------------------------------------------------------------

const patternFileSchema = z.object({
	version: z.number(),
	patterns: z.array(
		z.object({
			identifier: z.string().min(1),
			pattern: z.string().min(1),
			aliases: z.array(z.string()).default([]),
		}),
	),
});

let builtIn: PatternEntry[] | null = null;

/** The built-in browser step patterns, in registration order. */
export function getBuiltInPatterns(): PatternEntry[] {
	if (!builtIn) {
		const raw = readFileSync(new URL('../data/builtin-patterns.json', import.meta.url), 'utf-8');
		builtIn = patternFileSchema.parse(JSON.parse(raw)).patterns;
	}
	return builtIn.map((e) => ({ ...e, aliases: [...e.aliases] }));
}

/** A sealed registry holding the built-in patterns. */
export function createDefaultRegistry(): StepRegistry {
	return new StepRegistry().registerAll(getBuiltInPatterns()).seal();
}

// ---------------------------------------------------------------------------
// Utilities
// ---------------------------------------------------------------------------

function compile(source: string, identifier: string): RegExp {
	try {
		return new RegExp(source);
	} catch (err) {
		throw new PatternCompileError({ pattern: source, identifier, cause: err });
	}
}

export function escapeRegex(str: string): string {
	return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Pattern source with groups and escapes collapsed, for suggestions. */
function readable(source: string): string {
	return source
		.replace(/\((?:\?:)?[^()]*\)\??/g, '...')
		.replace(/\\(.)/g, '$1')
		.replace(/[?*+]/g, '');
}

/** Levenshtein edit distance for step suggestion */
export function levenshtein(a: string, b: string): number {
	const m = a.length;
	const n = b.length;
	const row = Array.from({ length: n + 1 }, (_, i) => i);

	for (let i = 1; i <= m; i++) {
		let prev = i;
		for (let j = 1; j <= n; j++) {
			const cost = a[i - 1] === b[j - 1] ? 0 : 1;
			const val = Math.min((row[j] ?? 0) + 1, prev + 1, (row[j - 1] ?? 0) + cost);
			row[j - 1] = prev;
			prev = val;
		}
		row[n] = prev;
	}

	return row[n] ?? 0;
}
