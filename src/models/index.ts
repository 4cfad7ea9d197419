// Export all domain models

export * from './types.js';
export * from './template.js';
export * from './generation.js';
export * from './validation.js';
