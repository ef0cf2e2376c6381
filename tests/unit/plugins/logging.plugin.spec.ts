import { LoggingPlugin } from '../../../src/plugins/logging.plugin';
import { SubmittedTask, TaskState, TaskStatus } from '../../../src/types';
import { createTestLogger } from '../../helpers/test-context';

const submitted: SubmittedTask = {
  taskId: 'task-1',
  spec: { tool: 'openfoam', script: 'run.sh', params: { mesh: 2 } },
  submittedAt: new Date('2026-01-01T00:00:00Z'),
};

function settled(state: TaskState, error?: string): TaskStatus {
  return {
    taskId: 'task-1',
    state,
    ready: true,
    successful: state === TaskState.SUCCESS,
    tool: 'openfoam',
    script: 'run.sh',
    ...(error ? { error } : {}),
  };
}

describe('LoggingPlugin', () => {
  it('should log lifecycle at info by default', () => {
    const logger = createTestLogger();
    const plugin = new LoggingPlugin({ logger });

    plugin.onInit();
    plugin.onTaskSubmitted(submitted);
    plugin.onTaskSettled(settled(TaskState.SUCCESS));
    plugin.onDispose();

    expect(logger.log.mock.calls).toEqual([
      ['[LoggingPlugin] Plugin initialized'],
      ['Task task-1 succeeded', undefined],
      ['[LoggingPlugin] Plugin disposed'],
    ]);
    expect(logger.debug).not.toHaveBeenCalled();
  });

  it('should log submissions at debug level', () => {
    const logger = createTestLogger();
    const plugin = new LoggingPlugin({ logger, logLevel: 'debug' });

    plugin.onTaskSubmitted(submitted);

    expect(logger.debug).toHaveBeenCalledWith('Task task-1 submitted: openfoam/run.sh', undefined);
  });

  it('should attach the payload when includeStatus is set', () => {
    const logger = createTestLogger();
    const plugin = new LoggingPlugin({ logger, logLevel: 'debug', includeStatus: true });
    const status = settled(TaskState.CANCELLED);

    plugin.onTaskSubmitted(submitted);
    plugin.onTaskSettled(status);

    expect(logger.debug).toHaveBeenCalledWith('Task task-1 submitted: openfoam/run.sh', submitted);
    expect(logger.warn).toHaveBeenCalledWith('Task task-1 was cancelled', status);
  });

  it('should report failures with the remote error', () => {
    const logger = createTestLogger();
    const plugin = new LoggingPlugin({ logger, includeStatus: true });
    const status = settled(TaskState.FAILURE, 'Solver diverged');

    plugin.onTaskSettled(status);

    expect(logger.error).toHaveBeenCalledTimes(1);
    const [message, error, payload] = logger.error.mock.calls[0];
    expect(message).toBe('Task task-1 ended in state failure');
    expect(error).toBeInstanceOf(Error);
    expect(error?.message).toBe('Solver diverged');
    expect(payload).toBe(status);
  });

  it('should pass no error when the status carries none', () => {
    const logger = createTestLogger();
    const plugin = new LoggingPlugin({ logger });

    plugin.onTaskSettled(settled(TaskState.TIMEOUT));

    expect(logger.error).toHaveBeenCalledWith('Task task-1 ended in state timeout', undefined, undefined);
  });

  it('should drop lines below the configured level', () => {
    const logger = createTestLogger();
    const plugin = new LoggingPlugin({ logger, logLevel: 'error' });

    plugin.onInit();
    plugin.onTaskSettled(settled(TaskState.SUCCESS));
    plugin.onTaskSettled(settled(TaskState.CANCELLED));
    plugin.onTaskSettled(settled(TaskState.FAILURE, 'Solver diverged'));

    expect(logger.log).not.toHaveBeenCalled();
    expect(logger.warn).not.toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledTimes(1);
  });
});
