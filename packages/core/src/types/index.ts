export * from './record.js';
export * from './platform.js';
export * from './field-mapping.js';
