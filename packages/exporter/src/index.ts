// packages/exporter/src/index.ts
export * from './pipeline';
export * from './output';
