/**
 * Engine exports.
 */

export * from './config';
export * from './execution-tree';
export * from './explorer';
export * from './run-context';
export * from './session';
export * from './state-machine';
