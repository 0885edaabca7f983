// packages/refs/src/index.ts
export * from './reference-index';
