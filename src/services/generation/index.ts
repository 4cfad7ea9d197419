// Generation service exports

export * from './generation-service.js';
