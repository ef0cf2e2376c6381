export * from './console-logger.adapter';
export * from './in-memory-lock.adapter';
export * from './in-memory-queue.adapter';
export * from './redis-lock.adapter';
export * from './redis-queue.adapter';
