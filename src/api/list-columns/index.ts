/**
 * List columns API exports
 */

export * from './types.ts';
export * from './errors.ts';
export * from './registry.ts';
export * from './projection.ts';
export * from './sort.ts';
export * from './search.ts';
export * from './render.ts';
export * from './markup.ts';
export * from './request-state.ts';
export * from './list-view.ts';
export * from './store.ts';
export * from './config.ts';
export * from './routes.ts';
