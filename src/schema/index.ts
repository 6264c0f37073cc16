/**
 * Schema module — single source of truth for configuration shapes.
 * Zod schemas + inferred TypeScript types.
 */

export * from './framework.js';
export * from './modelConfig.js';
export * from './config.js';
