/**
 * Translators
 */

export * from './types';
export * from './drizzle';
