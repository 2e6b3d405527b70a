export * from './types';
export * from './parser';
export * from './emitter';
export * from './diagnostics';
