// Validation service exports

export * from './template-validator.js';
