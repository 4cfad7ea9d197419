// Prompt service exports

export * from './prompt-service.js';
