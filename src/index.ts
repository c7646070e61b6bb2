export * from './core';
export * from './types';
export { logger, Logger } from './utils/logger';
