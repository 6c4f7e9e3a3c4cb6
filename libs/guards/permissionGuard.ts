/**
 * Request Permission Guards
 *
 * Pre-flight filters in front of mutating or data-revealing handlers. A deny
 * is unconditional: the handler never runs and the response carries no
 * detail about roles, profiles or permissions.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type {
    ObjectId,
    OperationId,
    OrganizationId,
    ProfileId,
    UserId
} from '../catalog/types.js';
import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('PermissionGuard');

/**
 * Anything that can answer authorization questions: the evaluator itself or
 * the access service in front of it.
 */
export interface PermissionDecider {
    is(userId: UserId, profile: ProfileId): boolean;
    can(userId: UserId, operation: OperationId, object: ObjectId, organization?: OrganizationId): boolean;
}

export type UserResolver = (req: Request) => UserId | undefined;
export type OrganizationResolver = (req: Request) => OrganizationId | undefined;

export interface PermissionGuardContext {
    readonly userId: UserId | undefined;
    readonly operation: OperationId;
    readonly object: ObjectId;
    readonly organization?: OrganizationId;
}

export type PermissionGuardDenyReason =
    | 'SUBJECT_MISSING'
    | 'PERMISSION_DENIED';

export type PermissionGuardResult =
    | { allowed: true }
    | { allowed: false; reason: PermissionGuardDenyReason };

export const FORBIDDEN_BODY = Object.freeze({ error: 'Forbidden' });

export function executePermissionGuard(
    decider: PermissionDecider,
    context: PermissionGuardContext
): PermissionGuardResult {
    const { userId, operation, object, organization } = context;

    if (!userId) {
        return { allowed: false, reason: 'SUBJECT_MISSING' };
    }

    if (!decider.can(userId, operation, object, organization)) {
        return { allowed: false, reason: 'PERMISSION_DENIED' };
    }

    return { allowed: true };
}

export interface RequirePermissionOptions {
    operation: OperationId;
    object: ObjectId;
    resolveUser: UserResolver;
    /** Narrows the check to one organization when it yields a value. */
    resolveOrganization?: OrganizationResolver;
}

function deny(res: Response): void {
    res.status(403).json(FORBIDDEN_BODY);
}

/**
 * Express middleware: 403 unless the resolved user holds the permission.
 */
export function requirePermission(decider: PermissionDecider, options: RequirePermissionOptions): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        const userId = options.resolveUser(req);
        const organization = options.resolveOrganization?.(req);

        const result = executePermissionGuard(decider, {
            userId,
            operation: options.operation,
            object: options.object,
            organization
        });

        if (!result.allowed) {
            logger.debug({
                userId,
                operation: options.operation,
                object: options.object,
                organization,
                reason: result.reason
            }, 'Permission guard denied request');
            deny(res);
            return;
        }

        next();
    };
}

/**
 * Express middleware: 403 unless `profile` is the resolved user's active one.
 */
export function requireProfile(decider: PermissionDecider, profile: ProfileId, resolveUser: UserResolver): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        const userId = resolveUser(req);

        if (!userId || !decider.is(userId, profile)) {
            logger.debug({ userId, profile }, 'Profile guard denied request');
            deny(res);
            return;
        }

        next();
    };
}
