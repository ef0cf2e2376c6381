export * from './circuit-breaker-registry';
export * from './execution-metrics-registry';
export * from './orchestration-context';
export * from './parallel-executor';
export * from './parameter-grid';
export * from './retry';
export * from './task-client';
export * from './task-state';
export * from './workflow-aggregator';
export * from './workflow-router';
