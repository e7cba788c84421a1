// ============================================================================
// Feature discovery - find feature files under a path.
// Directories are walked recursively with symlinks followed. A link back to a
// directory already on the current path is not entered. The result is sorted.
// ============================================================================

import { readdirSync, realpathSync, statSync } from 'node:fs';
import type { Stats } from 'node:fs';
import { extname, join } from 'node:path';
import { DiscoveryError, errorMessage, silentLogger } from 'stepscope-bdd';
import type { Logger } from 'stepscope-bdd';

export interface DiscoveryOptions {
	/** File extension to collect (default: ".feature") */
	extension?: string;
	/** Deepest level below the root whose files are collected (default: 10) */
	maxDepth?: number;
	/** Receives warnings for entries that cannot be read */
	logger?: Logger;
}

/**
 * A matching file yields itself. A directory yields every matching file
 * below it, sorted.
 *
 * @throws DiscoveryError when the path is missing or is a non-matching file
 */
export function discoverFeatures(path: string, options: DiscoveryOptions = {}): string[] {
	const extension = options.extension ?? '.feature';
	const maxDepth = options.maxDepth ?? 10;
	const logger = options.logger ?? silentLogger;

	let stats: Stats;
	try {
		stats = statSync(path);
	} catch (err) {
		throw new DiscoveryError(`Cannot access '${path}': ${errorMessage(err)}`, 'Check the features path.');
	}

	if (stats.isFile()) {
		if (extname(path) === extension) return [path];
		throw new DiscoveryError(
			`'${path}' is not a feature file`,
			`Pass a directory or a file ending in ${extension}.`,
		);
	}

	const found: string[] = [];
	// Real paths of the directories between the root and the current one
	const ancestors = new Set<string>();
	walk(path, 1);
	return found.sort();

	function walk(dir: string, depth: number): void {
		let real: string;
		let entries: string[];
		try {
			real = realpathSync(dir);
			entries = readdirSync(dir);
		} catch (err) {
			logger.warn(`Could not access ${dir}: ${errorMessage(err)}`);
			return;
		}
		if (ancestors.has(real)) {
			logger.debug(`Skipping ${dir}: links back to ${real}`);
			return;
		}
		ancestors.add(real);

		for (const entry of entries) {
			const child = join(dir, entry);
			let childStats: Stats;
			try {
				childStats = statSync(child);
			} catch (err) {
				logger.warn(`Could not access ${child}: ${errorMessage(err)}`);
				continue;
			}

			if (childStats.isDirectory()) {
				if (depth < maxDepth) walk(child, depth + 1);
			} else if (childStats.isFile() && extname(child) === extension) {
				found.push(child);
			}
		}

		ancestors.delete(real);
	}
}
