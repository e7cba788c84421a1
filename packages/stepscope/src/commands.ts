// ============================================================================
// stepscope - Commands
// Every CLI command, runnable in-process. `runCli` returns the exit code:
//   0  success
//   1  the command ran and found a problem (invalid feature, regression,
//      failed feature, inconsistent catalog) or the command is unknown
//   2  bad input: unreadable files, invalid config or flags
// ============================================================================

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, extname, join, relative, resolve } from 'node:path';
import yaml from 'yaml';
import {
	ConfigError,
	StepscopeError,
	checkCatalogConsistency,
	createDefaultRegistry,
	errorMessage,
	loadReport,
	loadStepCatalog,
	toTap,
	validateFeatureSource,
	writeReport,
} from 'stepscope-bdd';
import type { Logger, StepDefinition, ValidationResult } from 'stepscope-bdd';
import {
	AlertManager,
	PerformanceMonitor,
	WebhookManager,
	analyzeExecution,
	compare,
	defaultAlertConfig,
	formatAlerts,
	formatComparison,
	formatProfile,
} from 'stepscope-insights';
import { BatchExecutor, discoverFeatures, formatBatchResult, sortByPath } from 'stepscope-runner';
import { loadConfigFile, resolveConfig } from './config.js';
import type { OutputFormat, StepscopeConfig } from './config.js';
import { dryRunFeature } from './dry-run.js';
import { createLogger } from './logger.js';

export const VERSION = '0.1.0';

export interface CliIO {
	stdout: (text: string) => void;
	stderr: (text: string) => void;
	cwd: string;
	env: NodeJS.ProcessEnv;
	/** Used for webhook deliveries; defaults to the global fetch */
	fetch?: typeof fetch;
}

export function processIO(): CliIO {
	return {
		stdout: (text) => process.stdout.write(text),
		stderr: (text) => process.stderr.write(text),
		cwd: process.cwd(),
		env: process.env,
	};
}

interface CommandContext {
	io: CliIO;
	config: StepscopeConfig;
	flags: CLIFlags;
	positionals: string[];
	logger: Logger;
}

export async function runCli(args: string[], io: CliIO = processIO()): Promise<number> {
	const [command = '', ...rest] = args;

	if (command === '' || command === '--help' || command === '-h') {
		io.stdout(helpText());
		return 0;
	}

	if (command === '--version' || command === '-v') {
		io.stdout(`stepscope v${VERSION}\n`);
		return 0;
	}

	try {
		const { flags, positionals } = parseFlags(rest);
		if (flags.help) {
			io.stdout(helpText());
			return 0;
		}
		const config = resolveConfig(loadConfigFile(io.cwd), io.env);
		applyFlags(config, flags);
		const logger = createLogger(undefined, {
			debug: config.debug,
			write: (line) => io.stderr(`${line}\n`),
		});
		const ctx: CommandContext = { io, config, flags, positionals, logger };

		switch (command) {
			case 'validate':
				return validateCommand(ctx);
			case 'steps':
				return stepsCommand(ctx);
			case 'export-schema':
				return exportSchemaCommand(ctx);
			case 'check-catalog':
				return checkCatalogCommand(ctx);
			case 'dry-run':
				return await dryRunCommand(ctx);
			case 'compare':
				return compareCommand(ctx);
			case 'alerts':
				return alertsCommand(ctx);
			case 'tap':
				return tapCommand(ctx);
			case 'profile':
				return profileCommand(ctx);
			default:
				io.stderr(`Unknown command: ${command}\n`);
				io.stderr('Run "stepscope --help" for usage information.\n');
				return 1;
		}
	} catch (err) {
		if (!(err instanceof StepscopeError)) throw err;
		io.stderr(`[stepscope] Error: ${err.message}\n`);
		if (err.hint) io.stderr(`  Hint: ${err.hint}\n`);
		return 2;
	}
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

function emit(ctx: CommandContext, text: string): void {
	const { output } = ctx.flags;
	if (output === undefined) {
		ctx.io.stdout(text);
		return;
	}
	writeFileSync(resolve(ctx.io.cwd, output), text, 'utf-8');
	ctx.io.stdout(`Output written to: ${output}\n`);
}

function serialize(value: unknown, format: OutputFormat): string {
	return format === 'yaml' ? yaml.stringify(value) : `${JSON.stringify(value, null, 2)}\n`;
}

function requireArgs(ctx: CommandContext, names: string[], usage: string): string[] {
	if (ctx.positionals.length < names.length) {
		throw new ConfigError(`Missing ${names.slice(ctx.positionals.length).join(' and ')}`, `Usage: ${usage}`);
	}
	return ctx.positionals.slice(0, names.length).map((p) => resolve(ctx.io.cwd, p));
}

// ---------------------------------------------------------------------------
// validate
// ---------------------------------------------------------------------------

function validateCommand(ctx: CommandContext): number {
	const { io, config } = ctx;
	const catalog = loadStepCatalog();
	const targets = ctx.positionals.length > 0 ? ctx.positionals : [config.features];
	const files = targets.flatMap((t) =>
		discoverFeatures(resolve(io.cwd, t), { extension: config.extension, logger: ctx.logger }),
	);

	const results = files.map((file) => {
		const path = relative(io.cwd, file);
		let source: string;
		try {
			source = readFileSync(file, 'utf-8');
		} catch (err) {
			throw new ConfigError(`Cannot read ${path}: ${errorMessage(err)}`);
		}
		return { path, ...validateFeatureSource(source, catalog, path) };
	});
	const valid = results.every((r) => r.valid);

	if (config.outputFormat === 'text') {
		emit(ctx, formatValidation(results));
	} else {
		emit(ctx, serialize({ valid, files: results }, config.outputFormat));
	}
	return valid ? 0 : 1;
}

function formatValidation(results: Array<ValidationResult & { path: string }>): string {
	const lines: string[] = [];
	for (const result of results) {
		lines.push(`${result.valid ? '✓' : '✗'} ${result.path}`);
		for (const error of result.errors) {
			const where = error.stepNumber !== undefined ? `Step ${error.stepNumber}: ` : '';
			lines.push(`  ${where}${error.message}`);
			for (const suggestion of error.suggestions) lines.push(`    → ${suggestion}`);
		}
		for (const warning of result.warnings) lines.push(`  ⚠ ${warning.message}`);
	}
	const passed = results.filter((r) => r.valid).length;
	lines.push('', `${passed}/${results.length} feature files valid`);
	return `${lines.join('\n')}\n`;
}

// ---------------------------------------------------------------------------
// steps / export-schema / check-catalog
// ---------------------------------------------------------------------------

function stepsCommand(ctx: CommandContext): number {
	const catalog = loadStepCatalog();
	const { category, search } = ctx.flags;

	let steps: readonly StepDefinition[] = search !== undefined ? catalog.search(search) : catalog.getAll();
	if (category !== undefined) {
		const wanted = category.toLowerCase();
		steps = steps.filter((s) => s.category.toLowerCase() === wanted);
	}

	if (ctx.config.outputFormat !== 'text') {
		emit(ctx, serialize({ steps }, ctx.config.outputFormat));
		return 0;
	}

	if (steps.length === 0) {
		emit(ctx, 'No steps found\n');
		return 0;
	}

	const lines: string[] = [];
	for (const name of catalog.categories) {
		const inCategory = steps.filter((s) => s.category === name);
		if (inCategory.length === 0) continue;
		lines.push(`${name}:`);
		for (const step of inCategory) lines.push(`  ${step.id} - ${step.description}`);
		lines.push('');
	}
	lines.push(`${steps.length} steps`);
	emit(ctx, `${lines.join('\n')}\n`);
	return 0;
}

function exportSchemaCommand(ctx: CommandContext): number {
	const format = ctx.config.outputFormat === 'yaml' ? 'yaml' : 'json';
	emit(ctx, serialize(loadStepCatalog().toSchema(), format));
	return 0;
}

function checkCatalogCommand(ctx: CommandContext): number {
	const registry = createDefaultRegistry();
	const catalog = loadStepCatalog();
	const consistency = checkCatalogConsistency(registry, catalog);
	const validation = registry.validate();
	const duplicates = validation.ok ? [] : validation.warnings;

	if (ctx.config.outputFormat !== 'text') {
		emit(
			ctx,
			serialize(
				{
					registry_identifiers: registry.identifiers().length,
					catalog_steps: catalog.size,
					...consistency,
					duplicates,
				},
				ctx.config.outputFormat,
			),
		);
		return consistency.ok ? 0 : 1;
	}

	const lines = [`Registry: ${registry.identifiers().length} identifiers, Catalog: ${catalog.size} steps`];
	if (consistency.ok) lines.push('✓ Every registered pattern is documented');
	if (consistency.missingFromCatalog.length > 0) {
		lines.push(`✗ Not in catalog: ${consistency.missingFromCatalog.join(', ')}`);
	}
	for (const { identifier, pattern } of consistency.missingPatterns) {
		lines.push(`✗ Pattern '${pattern}' is not documented under ${identifier}`);
	}
	if (consistency.missingFromRegistry.length > 0) {
		lines.push(`⚠ Catalog only: ${consistency.missingFromRegistry.join(', ')}`);
	}
	for (const dup of duplicates) {
		lines.push(`⚠ Pattern '${dup.pattern}' is shadowed: ${dup.winner} wins over ${dup.shadowed.join(', ')}`);
	}
	emit(ctx, `${lines.join('\n')}\n`);
	return consistency.ok ? 0 : 1;
}

// ---------------------------------------------------------------------------
// dry-run
// ---------------------------------------------------------------------------

async function dryRunCommand(ctx: CommandContext): Promise<number> {
	const { io, config, logger } = ctx;
	const target = resolve(io.cwd, ctx.positionals[0] ?? config.features);
	const paths = discoverFeatures(target, { extension: config.extension, logger });
	logger.debug(`${paths.length} feature files under ${target}`);
	const hooks =
		ctx.flags.webhooks === undefined
			? undefined
			: WebhookManager.fromFile(resolve(io.cwd, ctx.flags.webhooks), { fetch: io.fetch, logger });

	const executor = new BatchExecutor(
		{ parallel: config.parallel, workers: config.workers, timeoutMs: config.timeout },
		{ logger },
	);
	executor.bus.on('feature:end', ({ path, status, durationMs }) => {
		logger.debug(`${relative(io.cwd, path)}: ${status} in ${durationMs}ms`);
	});

	const result = await executor.execute(paths, dryRunFeature(createDefaultRegistry(), logger));
	const sorted = { ...result, results: sortByPath(result.results) };

	if (ctx.flags.out !== undefined) {
		// Reports mirror the feature tree below the discovery root
		const dir = resolve(io.cwd, ctx.flags.out);
		const root = paths.length === 1 && paths[0] === target ? dirname(target) : target;
		for (const feature of sorted.results) {
			if (!feature.result) continue;
			const rel = relative(root, feature.path);
			const file = join(dir, `${rel.slice(0, rel.length - extname(rel).length)}.json`);
			mkdirSync(dirname(file), { recursive: true });
			writeReport(file, feature.result);
		}
	}

	if (hooks) {
		for (const feature of sorted.results) {
			if (!feature.result) continue;
			await hooks.notifyCompletion(feature.result);
			if (feature.result.status === 'failed') await hooks.notifyFailure(feature.result);
			else if (feature.result.status === 'passed') await hooks.notifySuccess(feature.result);
		}
	}

	emit(ctx, formatBatchResult(sorted, config.outputFormat));
	return result.failed_features > 0 ? 1 : 0;
}

// ---------------------------------------------------------------------------
// Report analysis: compare / alerts / tap / profile
// ---------------------------------------------------------------------------

function compareCommand(ctx: CommandContext): number {
	const [baselinePath = '', currentPath = ''] = requireArgs(
		ctx,
		['<baseline>', '<current>'],
		'stepscope compare <baseline> <current>',
	);
	const result = compare(loadReport(baselinePath), loadReport(currentPath));
	emit(ctx, formatComparison(result, ctx.config.outputFormat));
	return result.status === 'regression' ? 1 : 0;
}

function alertsCommand(ctx: CommandContext): number {
	const [reportPath = ''] = requireArgs(ctx, ['<report>'], 'stepscope alerts <report> [--config <file>]');
	const report = loadReport(reportPath);

	const rules = ctx.flags.config ?? ctx.config.alerts;
	const manager =
		rules !== undefined
			? AlertManager.fromFile(resolve(ctx.io.cwd, rules))
			: new AlertManager([defaultAlertConfig()]);

	const monitor = new PerformanceMonitor();
	for (const scenario of report.scenarios) monitor.recordScenario(scenario);
	monitor.setMetric('report_duration_ms', report.duration_ms);

	emit(ctx, formatAlerts(manager.evaluate(monitor), ctx.config.outputFormat));
	return 0;
}

function tapCommand(ctx: CommandContext): number {
	const [reportPath = ''] = requireArgs(ctx, ['<report>'], 'stepscope tap <report>');
	emit(ctx, toTap(loadReport(reportPath)));
	return 0;
}

function profileCommand(ctx: CommandContext): number {
	const [reportPath = ''] = requireArgs(ctx, ['<report>'], 'stepscope profile <report>');
	const metrics = analyzeExecution(loadReport(reportPath));
	const format = ctx.config.outputFormat;
	emit(ctx, format === 'text' ? formatProfile(metrics) : serialize(metrics, format));
	return 0;
}

// ---------------------------------------------------------------------------
// Flag parsing
// ---------------------------------------------------------------------------

export interface CLIFlags {
	format?: OutputFormat;
	/** Write command output to this file instead of stdout */
	output?: string;
	/** Directory for per-feature reports written by dry-run */
	out?: string;
	category?: string;
	search?: string;
	/** Alert rule file */
	config?: string;
	/** Webhook config file for dry-run */
	webhooks?: string;
	workers?: number;
	timeout?: number;
	sequential?: boolean;
	debug?: boolean;
	help?: boolean;
}

function takeValue(rest: string[], flag: string): string {
	const value = rest.shift();
	if (value === undefined || value.startsWith('--')) {
		throw new ConfigError(`${flag} expects a value`);
	}
	return value;
}

function positiveInt(value: string, flag: string): number {
	const n = Number(value);
	if (!Number.isInteger(n) || n < 1) {
		throw new ConfigError(`${flag} expects a positive integer, got "${value}"`);
	}
	return n;
}

function outputFormat(value: string): OutputFormat {
	const format = value === 'yml' ? 'yaml' : value;
	if (format === 'text' || format === 'json' || format === 'yaml') return format;
	throw new ConfigError(`Unsupported format "${value}"`, 'Use one of: text, json, yaml');
}

export function parseFlags(args: string[]): { flags: CLIFlags; positionals: string[] } {
	const flags: CLIFlags = {};
	const positionals: string[] = [];
	const rest = [...args];

	for (let arg = rest.shift(); arg !== undefined; arg = rest.shift()) {
		switch (arg) {
			case '--format':
			case '-f':
				flags.format = outputFormat(takeValue(rest, arg));
				break;
			case '--output':
			case '-o':
				flags.output = takeValue(rest, arg);
				break;
			case '--out':
				flags.out = takeValue(rest, arg);
				break;
			case '--category':
			case '-c':
				flags.category = takeValue(rest, arg);
				break;
			case '--search':
			case '-s':
				flags.search = takeValue(rest, arg);
				break;
			case '--config':
				flags.config = takeValue(rest, arg);
				break;
			case '--webhooks':
				flags.webhooks = takeValue(rest, arg);
				break;
			case '--workers':
				flags.workers = positiveInt(takeValue(rest, arg), arg);
				break;
			case '--timeout':
				flags.timeout = positiveInt(takeValue(rest, arg), arg);
				break;
			case '--sequential':
				flags.sequential = true;
				break;
			case '--debug':
				flags.debug = true;
				break;
			case '--help':
			case '-h':
				flags.help = true;
				break;
			default:
				if (arg.startsWith('-')) throw new ConfigError(`Unknown option: ${arg}`, 'Run "stepscope --help"');
				positionals.push(arg);
		}
	}

	return { flags, positionals };
}

/** CLI flags win over the config file and the environment. */
function applyFlags(config: StepscopeConfig, flags: CLIFlags): void {
	if (flags.format !== undefined) config.outputFormat = flags.format;
	if (flags.workers !== undefined) config.workers = flags.workers;
	if (flags.timeout !== undefined) config.timeout = flags.timeout;
	if (flags.sequential) config.parallel = false;
	if (flags.debug) config.debug = true;
}

// ---------------------------------------------------------------------------
// Help
// ---------------------------------------------------------------------------

export function helpText(): string {
	return `
  stepscope v${VERSION} -- BDD step validation and execution report analysis

  Usage:
    stepscope <command> [args...] [options]

  Commands:
    validate [paths...]           Check every step of the feature files against the catalog
    steps                         List the built-in steps (--category, --search)
    export-schema                 Print the step catalog as a JSON or YAML schema
    check-catalog                 Check that every matchable step is documented
    dry-run [path]                Run feature files without a browser, steps matched only
    compare <baseline> <current>  Compare two execution reports (exit 1 on regression)
    alerts <report>               Evaluate performance alert rules against a report
    tap <report>                  Convert a report to TAP version 13
    profile <report>              Show where the time went in a report

  Options:
    -f, --format <fmt>   Output format: text, json, yaml (default: text)
    -o, --output <file>  Write output to a file instead of stdout
    -c, --category <c>   steps: only this category
    -s, --search <q>     steps: only steps matching the query
    --config <file>      alerts: YAML or JSON alert rules (default: built-in rules)
    --out <dir>          dry-run: write one JSON report per feature here
    --webhooks <file>    dry-run: notify YAML or JSON webhooks of each feature's result
    --workers <n>        dry-run: features run concurrently (default: CPU count)
    --timeout <ms>       dry-run: per-feature timeout (default: 300000)
    --sequential         dry-run: one feature at a time
    --debug              Enable verbose debug logging
    -h, --help           Show this help message
    -v, --version        Show version

  Configuration:
    stepscope.config.json / .yaml / .yml in the working directory.
    STEPSCOPE_WORKERS and STEPSCOPE_DEBUG override the file; flags override both.

  Examples:
    stepscope validate features/
    stepscope steps --search scroll
    stepscope dry-run features --workers 4 --out reports
    stepscope compare reports/baseline.json reports/current.json --format json
    stepscope alerts reports/current.yaml --config alerts.yaml
`;
}
