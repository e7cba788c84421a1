import { describe, expect, it } from 'vitest';
import { WorkerPool } from './worker-pool.js';

const tick = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('WorkerPool', () => {
	it('should process every item exactly once', async () => {
		const pool = new WorkerPool<number, number>({ size: 3 });
		const { outcomes, undispatched } = await pool.run([1, 2, 3, 4, 5, 6, 7], async (n) => {
			await tick(n % 3);
			return n * 10;
		});

		const values = outcomes.flatMap((o) => (o.ok ? [o.value] : []));
		expect(values.sort((a, b) => a - b)).toEqual([10, 20, 30, 40, 50, 60, 70]);
		expect(undispatched).toEqual([]);
		expect(pool.getWorkers().reduce((sum, w) => sum + w.completedCount, 0)).toBe(7);
	});

	it('should keep list order with a single worker', async () => {
		const pool = new WorkerPool<string, string>({ size: 1 });
		const { outcomes } = await pool.run(['c', 'a', 'b'], async (s) => s);
		expect(outcomes.map((o) => o.item)).toEqual(['c', 'a', 'b']);
	});

	it('should turn a rejected task into a failed outcome', async () => {
		const pool = new WorkerPool<string, string>({ size: 2 });
		const { outcomes } = await pool.run(['ok', 'bad'], async (s) => {
			if (s === 'bad') throw new Error('nope');
			return s;
		});

		const failed = outcomes.find((o) => !o.ok);
		expect(failed && !failed.ok ? failed.error.message : null).toBe('nope');
		expect(outcomes).toHaveLength(2);
	});

	it('should stop dequeuing once the signal aborts', async () => {
		const controller = new AbortController();
		const pool = new WorkerPool<string, string>({ size: 1 });
		const { outcomes, undispatched } = await pool.run(
			['a', 'b', 'c'],
			async (s) => {
				if (s === 'a') controller.abort();
				return s;
			},
			controller.signal,
		);

		expect(outcomes.map((o) => o.item)).toEqual(['a']);
		expect(undispatched).toEqual(['b', 'c']);
		expect(pool.getWorkers()[0]?.state).toBe('stopped');
	});

	it('should never have fewer than one worker', () => {
		expect(new WorkerPool({ size: 0 }).size).toBe(1);
	});
});
