/**
 * @devtree/common - Shared types, errors, validation, config and logging
 */

export * from './types.js';
export * from './errors.js';
export * from './validation.js';
export * from './utils.js';
export * from './logger.js';
export * from './config.js';
