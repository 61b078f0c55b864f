/**
 * @tariffline/shared
 * Canonical schema, field aliases, zod schemas and shared types
 */

// Schemas (Zod)
export * from './schemas/index.js';

// Types
export * from './types/index.js';

// Constants
export * from './constants/index.js';
