export * from './types';
export * from './core/errors';
export * from './core/fields';
export * from './core/ids';
export * from './core/query';
export * from './core/schema';
export * from './core/convert';
export * from './state/store';
export * from './state/elements';
export * from './react/useElements';
