export * from './schema.js';
export * from './source-value.js';
export * from './record.js';
