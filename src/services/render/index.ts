// Render service exports

export * from './renderer.js';
