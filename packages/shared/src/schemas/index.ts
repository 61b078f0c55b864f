export * from './invoice.schemas.js';
