/**
 * Schema module, the zod shapes every other module shares.
 * Zod schemas + inferred TypeScript types.
 */

export * from './listing.js';
export * from './config.js';
