#!/usr/bin/env node
// ============================================================================
// stepscope - CLI entry point
//
// stepscope validate features/                      # Check steps against the catalog
// stepscope dry-run features --workers 4            # Match every step, no browser
// stepscope compare baseline.json current.json      # Regressions vs a baseline
// stepscope --help                                  # Show help
// ============================================================================

import { errorMessage } from 'stepscope-bdd';
import { runCli } from './commands.js';

runCli(process.argv.slice(2))
	.then((code) => {
		process.exitCode = code;
	})
	.catch((err: unknown) => {
		console.error('Fatal error:', errorMessage(err));
		process.exitCode = 1;
	});
