export * from './orchestration.module';
