// Config service exports

export * from './config-service.js';
