// ============================================================================
// Step handler table - identifier → handler dispatch.
//
// The scenario executor only knows the StepBackend interface. A real browser
// driver implements it directly; StepHandlerTable is the in-process version
// built once at startup from plain functions.
// ============================================================================

import { StepExecutionError, UnknownStepHandlerError } from './errors.js';
import type { VariableStore } from './variable-store.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StepContext {
	/** Per-scenario variable store */
	variables: VariableStore;
	/** Name of the running scenario */
	scenario: string;
	/** Aborted when the surrounding batch is cancelled or timed out */
	signal?: AbortSignal;
}

/** Resolves with the step output, rejects with a failure message */
export type StepHandler = (params: readonly string[], ctx: StepContext) => Promise<string>;

export interface StepBackend {
	execute(identifier: string, params: readonly string[], ctx: StepContext): Promise<string>;
}

// ---------------------------------------------------------------------------
// Handler table
// ---------------------------------------------------------------------------

export class StepHandlerTable implements StepBackend {
	private readonly handlers = new Map<string, StepHandler>();

	register(identifier: string, handler: StepHandler): this {
		this.handlers.set(identifier, handler);
		return this;
	}

	has(identifier: string): boolean {
		return this.handlers.has(identifier);
	}

	identifiers(): string[] {
		return [...this.handlers.keys()];
	}

	async execute(identifier: string, params: readonly string[], ctx: StepContext): Promise<string> {
		const handler = this.handlers.get(identifier);
		if (!handler) {
			throw new UnknownStepHandlerError(identifier);
		}
		return handler(params, ctx);
	}
}

// ---------------------------------------------------------------------------
// Store-only steps
// ---------------------------------------------------------------------------

/**
 * Handlers for the built-in steps that only touch the variable store and
 * therefore need no browser.
 */
export function registerVariableSteps(table: StepHandlerTable): StepHandlerTable {
	return table
		.register('store_value', async ([value = '', key = ''], ctx) => {
			ctx.variables.set(key, value);
			return `stored "${key}"`;
		})
		.register('stored_value_should_be', async ([key = '', expected = ''], ctx) => {
			const actual = ctx.variables.get(key);
			if (actual === undefined) {
				throw new StepExecutionError('stored_value_should_be', `No stored value named "${key}"`);
			}
			if (actual !== expected) {
				throw new StepExecutionError(
					'stored_value_should_be',
					`Expected "${key}" to be "${expected}" but was "${actual}"`,
				);
			}
			return actual;
		})
		.register('clear_stored', async (_params, ctx) => {
			ctx.variables.clear();
			return 'cleared';
		})
		.register('extracted_count_should_be', async ([count = '0', key = ''], ctx) => {
			const items = ctx.variables.getList(key) ?? [];
			const expected = Number.parseInt(count, 10);
			if (items.length !== expected) {
				throw new StepExecutionError(
					'extracted_count_should_be',
					`Expected ${expected} "${key}" items but extracted ${items.length}`,
				);
			}
			return String(items.length);
		});
}
