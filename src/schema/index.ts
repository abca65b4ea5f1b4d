/**
 * Schema module — data shapes shared across the pipeline.
 * Zod schemas + inferred TypeScript types at every file boundary.
 */

export * from './config.js';
export * from './state.js';
export * from './pipeline.js';
export * from './outcomes.js';
