// ============================================================================
// stepscope - Configuration
// Zero config by default. Override only what you need, in
// stepscope.config.json / .yaml / .yml, the environment, or CLI flags.
// ============================================================================

import { existsSync, readFileSync } from 'node:fs';
import { availableParallelism } from 'node:os';
import { join } from 'node:path';
import yaml from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from 'stepscope-bdd';

export type OutputFormat = 'text' | 'json' | 'yaml';

/** Full configuration with all options */
export interface StepscopeConfig {
	/** Feature file or directory to run (default: 'features') */
	features: string;
	/** Extension of feature files (default: '.feature') */
	extension: string;
	/** Run feature files concurrently (default: true) */
	parallel: boolean;
	/** Concurrent feature files (default: available parallelism) */
	workers: number;
	/** Per-feature timeout in ms (default: 300000) */
	timeout: number;
	/** Output format for every command (default: 'text') */
	outputFormat: OutputFormat;
	/** Alert rule file used by `stepscope alerts` */
	alerts?: string;
	/** Enable verbose debug logging (default: false) */
	debug: boolean;
}

/** Users provide a partial config -- everything has smart defaults */
export type UserConfig = Partial<StepscopeConfig>;

const userConfigSchema = z
	.object({
		features: z.string().min(1),
		extension: z.string().startsWith('.'),
		parallel: z.boolean(),
		workers: z.number().int().positive(),
		timeout: z.number().int().positive(),
		outputFormat: z.enum(['text', 'json', 'yaml']),
		alerts: z.string().min(1),
		debug: z.boolean(),
	})
	.partial()
	.strict();

/** Smart defaults -- works out of the box with zero config */
const DEFAULTS: StepscopeConfig = {
	features: 'features',
	extension: '.feature',
	parallel: true,
	workers: availableParallelism(),
	timeout: 300_000,
	outputFormat: 'text',
	debug: false,
};

export const CONFIG_FILES = ['stepscope.config.json', 'stepscope.config.yaml', 'stepscope.config.yml'] as const;

/**
 * Type helper for config objects built in code.
 *
 * ```ts
 * const config = resolveConfig(defineConfig({ workers: 2, timeout: 60_000 }));
 * ```
 */
export function defineConfig(config: UserConfig): UserConfig {
	return config;
}

/**
 * Merge user config over the defaults, then apply STEPSCOPE_WORKERS and
 * STEPSCOPE_DEBUG from the environment.
 */
export function resolveConfig(userConfig?: UserConfig, env: NodeJS.ProcessEnv = process.env): StepscopeConfig {
	const config: StepscopeConfig = { ...DEFAULTS, ...userConfig };

	const workers = env.STEPSCOPE_WORKERS;
	if (workers !== undefined && workers !== '') {
		const n = Number(workers);
		if (!Number.isInteger(n) || n < 1) {
			throw new ConfigError(
				`STEPSCOPE_WORKERS must be a positive integer, got "${workers}"`,
				'Unset it or use a value such as STEPSCOPE_WORKERS=4',
			);
		}
		config.workers = n;
	}

	const debug = env.STEPSCOPE_DEBUG?.toLowerCase();
	if (debug === '1' || debug === 'true') config.debug = true;
	else if (debug === '0' || debug === 'false') config.debug = false;

	return config;
}

/** Validate a parsed config document. */
export function parseUserConfig(raw: unknown, source: string): UserConfig {
	const parsed = userConfigSchema.safeParse(raw ?? {});
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
		throw new ConfigError(
			`Invalid config '${source}'${where}: ${issue?.message ?? 'invalid document'}`,
			'See "stepscope --help" for the supported options',
		);
	}
	return parsed.data;
}

/**
 * Load the first config file found in `cwd`.
 * Returns undefined when there is none.
 */
export function loadConfigFile(cwd: string): UserConfig | undefined {
	for (const name of CONFIG_FILES) {
		const path = join(cwd, name);
		if (!existsSync(path)) continue;

		let raw: unknown;
		try {
			const text = readFileSync(path, 'utf-8');
			raw = name.endsWith('.json') ? JSON.parse(text) : yaml.parse(text);
		} catch (err) {
			throw new ConfigError(`Cannot load ${name}: ${errorMessage(err)}`, undefined, err);
		}
		return parseUserConfig(raw, name);
	}

	return undefined;
}
