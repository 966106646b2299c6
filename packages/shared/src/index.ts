export * from './observability';
export * from './database';
