export * from './types';
export * from './config/orchestration.config';
export * from './core';
export * from './adapters';
export * from './plugins';
export * from './nestjs';
