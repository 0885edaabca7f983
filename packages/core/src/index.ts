// packages/core/src/index.ts
export * from './types';
export * from './schemas';
export * from './errors';
export * from './diagnostics';
export * from './utils/identifiers';
export * from './utils/cells';
