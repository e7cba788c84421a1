// ============================================================================
// Dry runs - execute feature files without a browser.
// Steps are matched against the registry as in a real run; store-only steps
// run for real and every other step succeeds without side effects. Unmatched
// steps and failing store assertions still fail the scenario.
// ============================================================================

import { readFile } from 'node:fs/promises';
import {
	ScenarioExecutor,
	StepHandlerTable,
	errorMessage,
	parseFeature,
	registerVariableSteps,
	silentLogger,
} from 'stepscope-bdd';
import type { FeatureDocument, Logger, StepBackend, StepContext, StepRegistry } from 'stepscope-bdd';
import type { FeatureRunner } from 'stepscope-runner';

export class DryRunBackend implements StepBackend {
	private readonly table: StepHandlerTable;

	constructor(table: StepHandlerTable = registerVariableSteps(new StepHandlerTable())) {
		this.table = table;
	}

	async execute(identifier: string, params: readonly string[], ctx: StepContext): Promise<string> {
		if (this.table.has(identifier)) return this.table.execute(identifier, params, ctx);
		return `dry run: ${identifier}`;
	}
}

/**
 * A FeatureRunner for the batch executor: read, parse and run one file.
 * Read and parse failures become `{ ok: false }` for that feature only.
 */
export function dryRunFeature(registry: StepRegistry, logger: Logger = silentLogger): FeatureRunner {
	const backend = new DryRunBackend();

	return async (path, { signal }) => {
		let feature: FeatureDocument;
		try {
			feature = parseFeature(await readFile(path, { encoding: 'utf-8', signal }), path);
		} catch (err) {
			return { ok: false, error: errorMessage(err) };
		}

		const executor = new ScenarioExecutor({ backend, registry, signal, logger });
		return { ok: true, value: await executor.runFeature(feature) };
	};
}
