export * from './canonical-schema.js';
export * from './field-aliases.js';
