import { describe, it, expect, vi } from 'vitest';
import { createBatches, mapWithWorkers } from '../src/application/utils/workerPool';

describe('workerPool', () => {
    it('createBatches should split items into fixed-size groups', () => {
        expect(createBatches([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
        expect(createBatches([], 3)).toEqual([]);
    });

    it('should keep input order whatever the completion order', async () => {
        const delays = [30, 5, 20, 1, 10];
        const results = await mapWithWorkers(delays, 3, (delay, index) =>
            new Promise<string>((resolve) => setTimeout(() => resolve(`${index}:${delay}`), delay))
        );

        expect(results).toEqual(['0:30', '1:5', '2:20', '3:1', '4:10']);
    });

    it('should never run more tasks at once than there are workers', async () => {
        let inFlight = 0;
        let peak = 0;

        await mapWithWorkers(Array.from({ length: 10 }, (_, i) => i), 4, async () => {
            inFlight++;
            peak = Math.max(peak, inFlight);
            await new Promise((resolve) => setTimeout(resolve, 2));
            inFlight--;
        });

        expect(peak).toBe(4);
    });

    it('should stop starting batches after a rejection', async () => {
        const task = vi.fn(async (item: number) => {
            if (item === 1) throw new Error('boom');
            return item;
        });

        await expect(mapWithWorkers([0, 1, 2, 3], 2, task)).rejects.toThrow('boom');
        expect(task).toHaveBeenCalledTimes(2);
    });

    it('should not start another batch once the signal is aborted', async () => {
        const controller = new AbortController();
        const task = vi.fn(async (item: number) => {
            if (item === 1) controller.abort(new Error('deadline passed'));
            return item;
        });

        await expect(mapWithWorkers([0, 1, 2, 3], 2, task, controller.signal)).rejects.toThrow('deadline passed');
        expect(task).toHaveBeenCalledTimes(2);
    });
});
