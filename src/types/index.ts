/**
 * Type exports
 */

export * from './result';
export * from './connection';
export * from './topology';
export * from './gate';
export * from './probe';
