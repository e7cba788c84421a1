// ============================================================================
// stepscope - Public API
//
// import { resolveConfig, dryRunFeature, BatchExecutor } from 'stepscope';
// ============================================================================

export * from 'stepscope-bdd';
export * from 'stepscope-runner';
export * from 'stepscope-insights';

export { CONFIG_FILES, defineConfig, loadConfigFile, parseUserConfig, resolveConfig } from './config.js';
export type { OutputFormat, StepscopeConfig, UserConfig } from './config.js';

export { createLogger } from './logger.js';
export type { LoggerOptions } from './logger.js';

export { DryRunBackend, dryRunFeature } from './dry-run.js';

export { VERSION, helpText, parseFlags, processIO, runCli } from './commands.js';
export type { CLIFlags, CliIO } from './commands.js';
