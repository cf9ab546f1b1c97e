export * from './records.js';
export * from './field-resolver.js';
