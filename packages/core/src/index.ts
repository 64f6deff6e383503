export * from './alert.js';
export * from './errors.js';
export * from './json.js';
export * from './logger.js';
export * from './time.js';
export * from './drivers/index.js';
