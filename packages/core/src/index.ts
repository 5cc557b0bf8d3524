// @cronkeep/core barrel export
export const VERSION = '0.1.0';
export * from './cron/index.ts';
export * from './hooks/index.ts';
export * from './tools/index.ts';
export * from './utils/index.ts';
