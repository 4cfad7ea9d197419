// Export all services

export * from './inference/index.js';
export * from './validation/index.js';
export * from './storage/index.js';
export * from './render/index.js';
export * from './config/index.js';
export * from './registry/index.js';
export * from './prompt/index.js';
export * from './generation/index.js';

export * from '../core/errors.js';
export * from '../models/index.js';
