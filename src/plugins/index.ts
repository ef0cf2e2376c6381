export * from './logging.plugin';
export * from './metrics.plugin';
