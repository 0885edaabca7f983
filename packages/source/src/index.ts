// packages/source/src/index.ts
export * from './loader';
