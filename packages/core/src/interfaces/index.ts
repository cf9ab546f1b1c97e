export * from './transformer.js';
export * from './stores.js';
