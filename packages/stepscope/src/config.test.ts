import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { availableParallelism, tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from 'stepscope-bdd';
import { defineConfig, loadConfigFile, parseUserConfig, resolveConfig } from './config.js';

describe('resolveConfig', () => {
	it('should return the defaults with no config', () => {
		expect(resolveConfig(undefined, {})).toEqual({
			features: 'features',
			extension: '.feature',
			parallel: true,
			workers: availableParallelism(),
			timeout: 300_000,
			outputFormat: 'text',
			debug: false,
		});
	});

	it('should merge user values over the defaults', () => {
		const config = resolveConfig(defineConfig({ workers: 2, timeout: 60_000 }), {});
		expect(config.workers).toBe(2);
		expect(config.timeout).toBe(60_000);
		expect(config.parallel).toBe(true);
	});

	it('should let the environment override the file', () => {
		const config = resolveConfig({ workers: 2, debug: true }, { STEPSCOPE_WORKERS: '6', STEPSCOPE_DEBUG: 'false' });
		expect(config.workers).toBe(6);
		expect(config.debug).toBe(false);
		expect(resolveConfig({}, { STEPSCOPE_DEBUG: '1' }).debug).toBe(true);
	});

	it('should ignore unrecognised debug values', () => {
		expect(resolveConfig({ debug: true }, { STEPSCOPE_DEBUG: 'maybe' }).debug).toBe(true);
	});

	it('should reject a bad worker count', () => {
		expect(() => resolveConfig({}, { STEPSCOPE_WORKERS: 'lots' })).toThrow(ConfigError);
		expect(() => resolveConfig({}, { STEPSCOPE_WORKERS: '0' })).toThrow(
			'STEPSCOPE_WORKERS must be a positive integer, got "0"',
		);
	});
});

describe('parseUserConfig', () => {
	it('should accept a partial config', () => {
		expect(parseUserConfig({ outputFormat: 'yaml' }, 'x.json')).toEqual({ outputFormat: 'yaml' });
		expect(parseUserConfig(null, 'x.yaml')).toEqual({});
	});

	it('should name the offending field', () => {
		expect(() => parseUserConfig({ extension: 'feature' }, 'x.json')).toThrow(
			/^Invalid config 'x\.json' at extension: /,
		);
	});

	it('should reject unknown keys', () => {
		expect(() => parseUserConfig({ browser: 'firefox' }, 'x.json')).toThrow(ConfigError);
	});
});

describe('loadConfigFile', () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), 'stepscope-config-'));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it('should return undefined without a config file', () => {
		expect(loadConfigFile(dir)).toBeUndefined();
	});

	it('should read YAML', () => {
		writeFileSync(join(dir, 'stepscope.config.yaml'), 'features: specs\nparallel: false\n');
		expect(loadConfigFile(dir)).toEqual({ features: 'specs', parallel: false });
	});

	it('should prefer the JSON file', () => {
		writeFileSync(join(dir, 'stepscope.config.json'), '{"workers": 3}');
		writeFileSync(join(dir, 'stepscope.config.yml'), 'workers: 5\n');
		expect(loadConfigFile(dir)).toEqual({ workers: 3 });
	});

	it('should wrap parse failures in a ConfigError', () => {
		writeFileSync(join(dir, 'stepscope.config.json'), '{ nope');
		expect(() => loadConfigFile(dir)).toThrow(/^Cannot load stepscope\.config\.json: /);
	});
});
