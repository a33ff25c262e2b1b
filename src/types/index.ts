// src/types/index.ts
export * from './audit/source.types';
export * from './audit/profile.types';
export * from './audit/options.types';
export * from './audit/rule.types';
export * from './audit/drift.types';
export * from './audit/explanation.types';
export * from './audit/outcome.types';
