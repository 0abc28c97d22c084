/**
 * Shared utilities index file
 * Exports all utility functions and classes
 */

export * from './dates';
export * from './deadline';
export * from './dynamodb-helper';
export * from './errors';
export * from './keyed-mutex';
export * from './lambda-response';
export * from './validation';
export * from './logger';
