/**
 * Domain model exports.
 */

export * from './choice-node';
export * from './errors';
export * from './events';
export * from './exploration';
