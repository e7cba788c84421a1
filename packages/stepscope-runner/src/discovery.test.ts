import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { DiscoveryError } from 'stepscope-bdd';
import { discoverFeatures } from './discovery.js';

describe('discoverFeatures', () => {
	let root: string;

	beforeAll(() => {
		root = mkdtempSync(join(tmpdir(), 'stepscope-discovery-'));
		mkdirSync(join(root, 'b', 'nested'), { recursive: true });
		mkdirSync(join(root, 'a'));
		writeFileSync(join(root, 'b', 'nested', 'deep.feature'), 'Feature: deep');
		writeFileSync(join(root, 'a', 'login.feature'), 'Feature: login');
		writeFileSync(join(root, 'top.feature'), 'Feature: top');
		writeFileSync(join(root, 'notes.md'), '# notes');
		// A link back to the root must not loop
		symlinkSync(root, join(root, 'b', 'loop'), 'dir');
	});

	afterAll(() => {
		rmSync(root, { recursive: true, force: true });
	});

	it('should return a single matching file as-is', () => {
		const file = join(root, 'top.feature');
		expect(discoverFeatures(file)).toEqual([file]);
	});

	it('should reject a file with another extension', () => {
		expect(() => discoverFeatures(join(root, 'notes.md'))).toThrow(DiscoveryError);
	});

	it('should reject a missing path', () => {
		expect(() => discoverFeatures(join(root, 'missing'))).toThrow(DiscoveryError);
	});

	it('should walk directories and sort the result', () => {
		expect(discoverFeatures(root)).toEqual([
			join(root, 'a', 'login.feature'),
			join(root, 'b', 'nested', 'deep.feature'),
			join(root, 'top.feature'),
		]);
	});

	it('should honour the depth limit', () => {
		expect(discoverFeatures(root, { maxDepth: 1 })).toEqual([join(root, 'top.feature')]);
		expect(discoverFeatures(root, { maxDepth: 2 })).toEqual([
			join(root, 'a', 'login.feature'),
			join(root, 'top.feature'),
		]);
	});

	it('should collect a custom extension', () => {
		expect(discoverFeatures(root, { extension: '.md' })).toEqual([join(root, 'notes.md')]);
	});

	describe('with links to directories outside the root', () => {
		let base: string;

		beforeAll(() => {
			base = mkdtempSync(join(tmpdir(), 'stepscope-links-'));
			mkdirSync(join(base, 'root', 'a', 'b', 'target', 's1', 's2'), { recursive: true });
			mkdirSync(join(base, 'outside'));
			writeFileSync(join(base, 'root', 'a', 'b', 'target', 's1', 's2', 'f.feature'), 'Feature: f');
			writeFileSync(join(base, 'outside', 'g.feature'), 'Feature: g');
			symlinkSync(join(base, 'root', 'a', 'b', 'target'), join(base, 'root', 'z'), 'dir');
			symlinkSync(join(base, 'outside'), join(base, 'root', 'ext'), 'dir');
		});

		afterAll(() => {
			rmSync(base, { recursive: true, force: true });
		});

		it('should find features through a link to a directory outside the root', () => {
			const root = join(base, 'root');
			expect(discoverFeatures(root, { maxDepth: 2 })).toEqual([join(root, 'ext', 'g.feature')]);
		});

		it('should reach a directory through a shorter link after a deeper visit', () => {
			const root = join(base, 'root');
			expect(discoverFeatures(root, { maxDepth: 4 })).toEqual([
				join(root, 'ext', 'g.feature'),
				join(root, 'z', 's1', 's2', 'f.feature'),
			]);
		});
	});
});
