// ============================================================================
// Console logger for the CLI. Library packages take a Logger and are silent
// without one; this is the one that prints.
// ============================================================================

import type { Logger } from 'stepscope-bdd';

export interface LoggerOptions {
	/** Print debug lines (default: false) */
	debug?: boolean;
	/** Where lines go (default: console.error, keeping stdout for command output) */
	write?: (line: string) => void;
}

/**
 * ```ts
 * const log = createLogger('batch', { debug: config.debug });
 * log.info('3 features found'); // [stepscope] batch: 3 features found
 * ```
 */
export function createLogger(scope?: string, options: LoggerOptions = {}): Logger {
	const write = options.write ?? ((line: string) => console.error(line));
	const prefix = scope ? `[stepscope] ${scope}:` : '[stepscope]';

	return {
		debug: (message) => {
			if (options.debug) write(`${prefix} debug: ${message}`);
		},
		info: (message) => write(`${prefix} ${message}`),
		warn: (message) => write(`${prefix} Warning: ${message}`),
		error: (message) => write(`${prefix} Error: ${message}`),
	};
}
