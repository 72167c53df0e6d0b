export * from './types';
export * from './parser';
export * from './compiler';
