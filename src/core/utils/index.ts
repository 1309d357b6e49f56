/**
 * Core utilities barrel exports
 */

export * from './mathUtils';
