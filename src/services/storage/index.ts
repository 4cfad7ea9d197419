// Storage service exports

export * from './check-file-store.js';
