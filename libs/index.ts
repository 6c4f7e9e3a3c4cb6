/**
 * Rolegate
 * Profile-gated, organization-scoped, role-aggregating authorization core.
 */

export * from './catalog/index.js';
export * from './roles/index.js';
export * from './membership/index.js';
export * from './evaluator/index.js';
export * from './profile/index.js';
export * from './access/index.js';
export * from './persistence/index.js';
export * from './guards/index.js';
export * from './errors/accessErrors.js';
export { RolegateError, ErrorSanitizer } from './errors/sanitizer.js';
export { KeyedLock } from './concurrency/keyedLock.js';
export { bootstrap } from './bootstrap/startup.js';
export { logger, getComponentLogger } from './logging/logger.js';
