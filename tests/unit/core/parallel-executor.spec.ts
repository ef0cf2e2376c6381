import { ParallelExecutor } from '../../../src/core/parallel-executor';
import { ConfigurationError, LocalTask, TaskParams, TaskResult } from '../../../src/types';
import { delay } from '../../helpers/concurrent-execution';
import { createTestContext } from '../../helpers/test-context';

function timedTask(id: string, ms: number): LocalTask<string> {
  return {
    id,
    fn: async () => {
      await delay(ms);
      return `${id} done`;
    },
  };
}

describe('ParallelExecutor', () => {
  it('should reject a non-positive worker count', () => {
    expect(() => new ParallelExecutor({ maxWorkers: 0 })).toThrow(ConfigurationError);
  });

  it('should default to at least one worker', () => {
    expect(new ParallelExecutor().maxWorkers).toBeGreaterThanOrEqual(1);
  });

  it('should size the pool from the context config', () => {
    const context = createTestContext({ config: { maxWorkers: 3 } });

    expect(ParallelExecutor.fromContext(context).maxWorkers).toBe(3);
    expect(ParallelExecutor.fromContext(context, { maxWorkers: 1 }).maxWorkers).toBe(1);
  });

  it('should refuse work before start', async () => {
    const executor = new ParallelExecutor({ maxWorkers: 2 });

    await expect(executor.executeParallel([timedTask('a', 1)])).rejects.toThrow('Executor not initialized');
    await expect(executor.executeMap(x => x, [1])).rejects.toThrow('Executor not initialized');
  });

  describe('executeParallel', () => {
    it('should return results in completion order', async () => {
      const results = await ParallelExecutor.run({ maxWorkers: 3 }, executor =>
        executor.executeParallel([timedTask('slow', 60), timedTask('fast', 5), timedTask('medium', 30)])
      );

      expect(results.map(result => result.taskId)).toEqual(['fast', 'medium', 'slow']);
      expect(results.every(result => result.status === 'success')).toBe(true);
    });

    it('should turn thrown errors into failed results', async () => {
      const results = await ParallelExecutor.run({ maxWorkers: 2 }, executor =>
        executor.executeParallel<string>([
          timedTask('ok', 5),
          {
            id: 'broken',
            fn: () => {
              throw new Error('mesh file missing');
            },
          },
        ])
      );

      const broken = results.find(result => result.taskId === 'broken');
      const ok = results.find(result => result.taskId === 'ok');

      expect(broken).toMatchObject({ status: 'failed', error: 'mesh file missing' });
      expect(ok).toMatchObject({ status: 'success', result: 'ok done' });
    });

    it('should fail items that exceed the timeout', async () => {
      const results = await ParallelExecutor.run({ maxWorkers: 2 }, executor =>
        executor.executeParallel([timedTask('quick', 1), timedTask('stuck', 200)], { timeoutMs: 20 })
      );

      expect(results.find(result => result.taskId === 'stuck')).toMatchObject({
        status: 'failed',
        error: 'Timed out after 20ms',
      });
      expect(results.find(result => result.taskId === 'quick')?.status).toBe('success');
    });

    it('should record timing for each item', async () => {
      const [result] = await ParallelExecutor.run({ maxWorkers: 1 }, executor =>
        executor.executeParallel([timedTask('a', 20)])
      );

      expect(result.endTime).toBeGreaterThanOrEqual(result.startTime);
      expect(result.duration).toBe(result.endTime - result.startTime);
      expect(result.duration).toBeGreaterThanOrEqual(15);
    });

    it('should call back as each item finishes', async () => {
      const seen: string[] = [];

      await ParallelExecutor.run({ maxWorkers: 2 }, executor =>
        executor.executeParallel([timedTask('b', 20), timedTask('a', 1)], {
          callback: (result: TaskResult<string>) => seen.push(result.taskId),
        })
      );

      expect(seen).toEqual(['a', 'b']);
    });

    it('should never run more items than workers', async () => {
      let active = 0;
      let peak = 0;
      const tasks: LocalTask<number>[] = Array.from({ length: 6 }, (_, index) => ({
        id: `case-${index}`,
        fn: async () => {
          active++;
          peak = Math.max(peak, active);
          await delay(10);
          active--;
          return index;
        },
      }));

      const results = await ParallelExecutor.run({ maxWorkers: 2 }, executor => executor.executeParallel(tasks));

      expect(results).toHaveLength(6);
      expect(peak).toBe(2);
    });
  });

  describe('timeouts', () => {
    it('should keep a timed-out item in its slot until it settles', async () => {
      let active = 0;
      let peak = 0;
      let stuckSettled = false;
      const tracked = (id: string, ms: number): LocalTask<string> => ({
        id,
        fn: async () => {
          active++;
          peak = Math.max(peak, active);
          await delay(ms);
          active--;
          if (id === 'stuck') {
            stuckSettled = true;
          }
          return id;
        },
      });

      const results = await ParallelExecutor.run({ maxWorkers: 1 }, executor =>
        executor.executeParallel([tracked('stuck', 150), tracked('next', 1)], { timeoutMs: 20 })
      );

      expect(peak).toBe(1);
      expect(stuckSettled).toBe(true);
      expect(results.map(result => result.taskId)).toEqual(['stuck', 'next']);
      expect(results[0]).toMatchObject({ status: 'failed', error: 'Timed out after 20ms' });
      expect(results[1].status).toBe('success');
    });

    it('should wait for a timed-out map item before shutting down', async () => {
      let stuckSettled = false;

      await expect(
        ParallelExecutor.run({ maxWorkers: 1 }, executor =>
          executor.executeMap(
            async (ms: number) => {
              await delay(ms);
              if (ms === 150) {
                stuckSettled = true;
              }
              return ms;
            },
            [150, 1],
            { timeoutMs: 20 }
          )
        )
      ).rejects.toThrow('Timed out after 20ms');

      expect(stuckSettled).toBe(true);
    });
  });

  describe('parameterSweep', () => {
    const grid = { mesh: [16, 32], steps: [100, 200] };

    it('should run every combination and keep combination order', async () => {
      const seen: TaskParams[] = [];

      const results = await ParallelExecutor.run({ maxWorkers: 2 }, executor =>
        executor.parameterSweep(
          async params => {
            await delay(params.mesh === 16 ? 20 : 1);
            return Number(params.mesh) * Number(params.steps);
          },
          grid,
          { baseParams: { solver: 'pisoFoam' }, callback: params => seen.push(params) }
        )
      );

      expect(results.map(result => (result.status === 'success' ? result.result : undefined))).toEqual([
        1600, 3200, 3200, 6400,
      ]);
      expect(results[0].params).toEqual({ solver: 'pisoFoam', mesh: 16, steps: 100 });
      expect(results.map(result => result.taskId)).toEqual(['sweep_0', 'sweep_1', 'sweep_2', 'sweep_3']);
      expect(seen).toHaveLength(4);
    });

    it('should report failing combinations without stopping the sweep', async () => {
      const results = await ParallelExecutor.run({ maxWorkers: 2 }, executor =>
        executor.parameterSweep(params => {
          if (params.mesh === 32 && params.steps === 200) {
            throw new Error('mesh too fine for 200 steps');
          }
          return 'ok';
        }, grid)
      );

      expect(results.filter(result => result.status === 'success')).toHaveLength(3);
      expect(results[3]).toMatchObject({
        status: 'failed',
        error: 'mesh too fine for 200 steps',
        params: { mesh: 32, steps: 200 },
      });
    });
  });

  describe('executeMap', () => {
    it('should keep input order while calling back in completion order', async () => {
      const completed: number[] = [];

      const outputs = await ParallelExecutor.run({ maxWorkers: 3 }, executor =>
        executor.executeMap(
          async (ms: number) => {
            await delay(ms);
            return ms * 2;
          },
          [30, 5, 15],
          { callback: index => completed.push(index) }
        )
      );

      expect(outputs).toEqual([60, 10, 30]);
      expect(completed).toEqual([1, 2, 0]);
    });

    it('should pass the item index to the function', async () => {
      const outputs = await ParallelExecutor.run({ maxWorkers: 2 }, executor =>
        executor.executeMap((item: string, index) => `${index}:${item}`, ['a', 'b'])
      );

      expect(outputs).toEqual(['0:a', '1:b']);
    });

    it('should reject on the first failure', async () => {
      await expect(
        ParallelExecutor.run({ maxWorkers: 2 }, executor =>
          executor.executeMap((item: number) => {
            if (item === 2) {
              throw new Error('case 2 diverged');
            }
            return item;
          }, [1, 2, 3])
        )
      ).rejects.toThrow('case 2 diverged');
    });
  });

  describe('lifecycle', () => {
    it('should shut down after run, even when the body throws', async () => {
      let captured: ParallelExecutor | undefined;

      await expect(
        ParallelExecutor.run({ maxWorkers: 1 }, async executor => {
          captured = executor;
          expect(executor.isRunning).toBe(true);
          throw new Error('post-processing failed');
        })
      ).rejects.toThrow('post-processing failed');

      expect(captured?.isRunning).toBe(false);
    });

    it('should allow several batches within one acquisition', async () => {
      const executor = new ParallelExecutor({ maxWorkers: 2 });
      executor.start();

      try {
        const first = await executor.executeParallel([timedTask('a', 1)]);
        const second = await executor.executeMap(x => x + 1, [1, 2]);

        expect(first[0].status).toBe('success');
        expect(second).toEqual([2, 3]);
      } finally {
        await executor.shutdown();
      }

      expect(executor.isRunning).toBe(false);
      await expect(executor.executeMap(x => x, [1])).rejects.toThrow('Executor not initialized');
    });
  });
});
