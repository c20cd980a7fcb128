import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import { ParallelExecutor, Semaphore } from '../../../src/pipeline/parallel-executor';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('Semaphore', () => {
  it('should hand a released permit to the next waiter', async () => {
    const semaphore = new Semaphore(1);
    await semaphore.acquire();
    const waiter = semaphore.acquire();
    assert.strictEqual(semaphore.getWaitingCount(), 1);

    semaphore.release();
    await waiter;
    assert.strictEqual(semaphore.getWaitingCount(), 0);
    assert.strictEqual(semaphore.getAvailablePermits(), 0);

    semaphore.release();
    assert.strictEqual(semaphore.getAvailablePermits(), 1);
  });
});

describe('ParallelExecutor', () => {
  it('should return results in task order', async () => {
    const executor = new ParallelExecutor();
    const results = await executor.executeParallel([
      async () => {
        await delay(15);
        return 'slow';
      },
      async () => 'fast',
    ]);
    assert.deepStrictEqual(results, ['slow', 'fast']);
  });

  it('should respect the concurrency bound', async () => {
    const executor = new ParallelExecutor(2);
    let active = 0;
    let peak = 0;
    const task = async (): Promise<number> => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
      return peak;
    };

    await executor.executeParallel([task, task, task, task, task]);
    assert.strictEqual(peak, 2);
  });

  it('should release the permit when a task rejects', async () => {
    const executor = new ParallelExecutor(1);
    await assert.rejects(
      executor.executeParallel([
        async () => {
          throw new Error('task failed');
        },
      ]),
      /task failed/
    );
    assert.deepStrictEqual(await executor.executeParallel([async () => 1]), [1]);
  });

  it('should reject a bound below 1', () => {
    assert.throws(() => new ParallelExecutor(0), RangeError);
  });
});
