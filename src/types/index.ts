export * from './routing.types';
export * from './metrics.types';
export * from './task.types';
export * from './workflow.types';
export * from './executor.types';
export * from './result.types';
export * from './adapter.types';
export * from './plugin.types';
export * from './retry.types';
export * from './retry-error';
export * from './submission.exception';
export * from './remote-execution.exception';
export * from './task-timeout.exception';
export * from './cancellation.exception';
export * from './configuration.exception';
