// Inference engine exports

export * from './slug.js';
export * from './tdd-sections.js';
export * from './group-inferencer.js';
export * from './service-test-inferencer.js';
