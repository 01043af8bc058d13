/**
 * Schema validation exports
 * Centralized validation for all YAML input files
 */

export * from './gate.schema';
export * from './topology.schema';
export * from './validation';
