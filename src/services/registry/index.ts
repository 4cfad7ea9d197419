// Registry service exports

export * from './registry-service.js';
