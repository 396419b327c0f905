/**
 * Domain model exports.
 */

export * from './artifact';
export * from './coverage';
export * from './errors';
export * from './events';
export * from './matrix';
export * from './run';
export * from './trigger';
