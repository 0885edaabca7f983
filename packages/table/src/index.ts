// packages/table/src/index.ts
export * from './header';
export * from './key-policy';
export * from './table-schema';
export * from './record-builder';
export * from './document';
export * from './describe';
