/**
 * Schema module, the single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 * Every boundary validates through these schemas.
 */

export * from './request.js';
export * from './plan.js';
export * from './providers.js';
export * from './execution.js';
export * from './verification.js';
export * from './response.js';
export * from './config.js';
export * from './jsonOutput.js';
