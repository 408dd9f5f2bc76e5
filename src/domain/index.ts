/**
 * Domain model exports.
 */

export * from './audit';
export * from './catalog';
export * from './errors';
export * from './rbac';
export * from './request';
