/**
 * Runtime Guards
 *
 * Pre-flight filters, not decision engines: they delegate every decision to
 * the permission evaluator and translate a deny into a generic 403.
 */

export type {
    PermissionDecider,
    PermissionGuardContext,
    PermissionGuardResult,
    PermissionGuardDenyReason,
    RequirePermissionOptions,
    UserResolver,
    OrganizationResolver
} from './permissionGuard.js';
export {
    executePermissionGuard,
    requirePermission,
    requireProfile,
    FORBIDDEN_BODY
} from './permissionGuard.js';
