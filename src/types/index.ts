export * from './syntax.js';
export * from './items.js';
export * from './graph.js';
export * from './resolution.js';
