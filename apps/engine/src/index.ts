/**
 * Public API of the blog generation engine
 */

export * from './pipeline';
export * from './providers/ai';
export * from './providers/data';
export * from './providers/sinks';
export { config, validateConfig } from './config';
export { createLogger } from './logger';
