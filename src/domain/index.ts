/**
 * Domain model exports.
 */

export * from './access';
export * from './account';
export * from './audit';
export * from './collaboration';
export * from './context';
export * from './errors';
export * from './health';
export * from './project';
export * from './state-machine';
export * from './validation';
