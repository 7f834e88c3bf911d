export * from './records.js';
export * from './decimal.js';
export * from './temporal.js';
export * from './large-object.js';
