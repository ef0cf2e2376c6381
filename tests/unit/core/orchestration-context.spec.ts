import { OrchestrationContext } from '../../../src/core/orchestration-context';
import { OrchestrationPlugin, TaskState, TaskStatus } from '../../../src/types';
import { createTestLogger } from '../../helpers/test-context';

const settledStatus: TaskStatus = {
  taskId: 'task-1',
  state: TaskState.SUCCESS,
  ready: true,
  successful: true,
  tool: 'openfoam',
};

describe('OrchestrationContext', () => {
  it('should resolve its config and share it with the breaker registry', () => {
    const context = new OrchestrationContext({
      logger: createTestLogger(),
      config: { router: { circuitBreakerThreshold: 2 } },
    });

    expect(context.config.pollIntervalMs).toBe(2000);
    expect(context.circuitBreakers.get('openfoam').threshold).toBe(2);
  });

  it('should apply per-node breaker thresholds', () => {
    const context = new OrchestrationContext({
      logger: createTestLogger(),
      circuitBreakerThresholds: { 'legacy-solver': 1 },
    });

    expect(context.circuitBreakers.get('legacy-solver').threshold).toBe(1);
    expect(context.circuitBreakers.get('openfoam').threshold).toBe(5);
  });

  it('should run onInit once and pass itself to the plugins', async () => {
    const onInit = jest.fn();
    const context = new OrchestrationContext({ logger: createTestLogger(), plugins: [{ name: 'recorder', onInit }] });

    await Promise.all([context.init(), context.init()]);
    await context.init();

    expect(onInit).toHaveBeenCalledTimes(1);
    expect(onInit).toHaveBeenCalledWith(context);
  });

  it('should initialize lazily before the first notification', async () => {
    const calls: string[] = [];
    const plugin: OrchestrationPlugin = {
      name: 'recorder',
      onInit: () => {
        calls.push('init');
      },
      onTaskSettled: status => {
        calls.push(`settled:${status.taskId}`);
      },
    };
    const context = new OrchestrationContext({ logger: createTestLogger(), plugins: [plugin] });

    await context.notifyTaskSettled(settledStatus);

    expect(calls).toEqual(['init', 'settled:task-1']);
  });

  it('should log a failing hook and keep calling the other plugins', async () => {
    const logger = createTestLogger();
    const onTaskSubmitted = jest.fn();
    const context = new OrchestrationContext({
      logger,
      plugins: [
        {
          name: 'broken',
          onTaskSubmitted: () => {
            throw new Error('disk full');
          },
        },
        { name: 'healthy', onTaskSubmitted },
      ],
    });

    await context.notifyTaskSubmitted({
      taskId: 'task-1',
      spec: { tool: 'openfoam', script: 'run.sh' },
      submittedAt: new Date(),
    });

    expect(logger.warn).toHaveBeenCalledWith('Plugin broken failed in onTaskSubmitted: disk full');
    expect(onTaskSubmitted).toHaveBeenCalledTimes(1);
  });

  it('should dispose once and ignore later notifications', async () => {
    const onDispose = jest.fn();
    const onTaskSettled = jest.fn();
    const context = new OrchestrationContext({
      logger: createTestLogger(),
      plugins: [{ name: 'recorder', onDispose, onTaskSettled }],
    });

    await context.dispose();
    await context.dispose();
    await context.notifyTaskSettled(settledStatus);

    expect(context.isClosed).toBe(true);
    expect(onDispose).toHaveBeenCalledTimes(1);
    expect(onTaskSettled).not.toHaveBeenCalled();
  });
});
