import assert from 'assert';
import { describe, it } from 'node:test';

import { ProcessingQueue } from '../src/processingQueue.js';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('ProcessingQueue', () => {
    it('runs tasks in submission order even when earlier ones are slower', async () => {
        const queue = new ProcessingQueue();
        const order: string[] = [];
        const slow = queue.run(async () => {
            await sleep(20);
            order.push('slow');
            return 1;
        });
        const fast = queue.run(async () => {
            order.push('fast');
            return 2;
        });
        assert.deepStrictEqual(await Promise.all([slow, fast]), [1, 2]);
        assert.deepStrictEqual(order, ['slow', 'fast']);
    });

    it('never overlaps tasks', async () => {
        const queue = new ProcessingQueue();
        let active = 0;
        let maxActive = 0;
        const tasks = [5, 1, 3, 0].map((delay) =>
            queue.run(async () => {
                active += 1;
                maxActive = Math.max(maxActive, active);
                await sleep(delay);
                active -= 1;
            })
        );
        await Promise.all(tasks);
        assert.strictEqual(maxActive, 1);
        assert.strictEqual(queue.size, 0);
    });

    it('isolates a failing task from the ones after it', async () => {
        const queue = new ProcessingQueue();
        const failing = queue.run(async () => {
            throw new Error('boom');
        });
        const throwing = queue.run(() => {
            throw new Error('sync boom');
        });
        const next = queue.run(async () => 'still running');

        await Promise.all([
            assert.rejects(failing, /^Error: boom$/),
            assert.rejects(throwing, /sync boom/),
        ]);
        assert.strictEqual(await next, 'still running');
    });
});
