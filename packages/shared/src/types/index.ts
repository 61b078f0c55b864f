export type * from './invoice.js';
export type * from './api.js';
export { API_ERROR_CODES } from './api.js';
