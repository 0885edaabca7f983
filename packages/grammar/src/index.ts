// packages/grammar/src/index.ts
export * from './registry';
export * from './type-grammar';
export * from './standard-types';
