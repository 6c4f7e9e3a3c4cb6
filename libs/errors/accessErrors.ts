/**
 * Access Errors
 * Canonical error taxonomy for catalog, registry, membership and profile
 * failures, with machine-readable codes.
 *
 * Administrative errors carry the offending identifiers in `details` so the
 * caller can fix the input. None of these may escape `can()`: the evaluator
 * converts every failure into a deny.
 */

export type AccessErrorCode =
    | 'NOT_FOUND'
    | 'INVALID_PERMISSION_FOR_PROFILE'
    | 'DUPLICATE_VALUE'
    | 'ROLE_IN_USE'
    | 'NO_ROLE_IN_PROFILE'
    | 'CATALOG_INTEGRITY'
    | 'VALIDATION_FAILED';

export type CatalogEntityKind = 'operation' | 'object' | 'permission' | 'profile' | 'role';

export abstract class AccessError extends Error {
    abstract readonly code: AccessErrorCode;
    abstract readonly statusCode: number;
    readonly details: Readonly<Record<string, unknown>>;

    protected constructor(message: string, details: Record<string, unknown>) {
        super(message);
        this.details = Object.freeze({ ...details });
    }
}

export class NotFoundError extends AccessError {
    readonly code = 'NOT_FOUND';
    readonly statusCode = 404;

    constructor(readonly kind: CatalogEntityKind, readonly key: string) {
        super(`Unknown ${kind}: ${key}`, { kind, key });
        this.name = 'NotFoundError';
        Object.setPrototypeOf(this, NotFoundError.prototype);
    }
}

export class InvalidPermissionForProfileError extends AccessError {
    readonly code = 'INVALID_PERMISSION_FOR_PROFILE';
    readonly statusCode = 422;

    constructor(readonly permission: string, readonly profile: string) {
        super(`Permission ${permission} is not assignable under profile ${profile}`, { permission, profile });
        this.name = 'InvalidPermissionForProfileError';
        Object.setPrototypeOf(this, InvalidPermissionForProfileError.prototype);
    }
}

export class DuplicateValueError extends AccessError {
    readonly code = 'DUPLICATE_VALUE';
    readonly statusCode = 409;

    constructor(readonly organization: string, readonly profile: string, readonly value: string) {
        super(
            `Role value "${value}" already exists for profile ${profile} in organization ${organization}`,
            { organization, profile, value }
        );
        this.name = 'DuplicateValueError';
        Object.setPrototypeOf(this, DuplicateValueError.prototype);
    }
}

export class RoleInUseError extends AccessError {
    readonly code = 'ROLE_IN_USE';
    readonly statusCode = 409;

    constructor(readonly roleId: string, readonly holderCount: number) {
        super(
            `Role ${roleId} is still assigned to ${holderCount} user(s); revoke it or delete with cascade`,
            { roleId, holderCount }
        );
        this.name = 'RoleInUseError';
        Object.setPrototypeOf(this, RoleInUseError.prototype);
    }
}

export class NoRoleInProfileError extends AccessError {
    readonly code = 'NO_ROLE_IN_PROFILE';
    readonly statusCode = 409;

    constructor(readonly userId: string, readonly profile: string) {
        super(`User ${userId} holds no role under profile ${profile}`, { userId, profile });
        this.name = 'NoRoleInProfileError';
        Object.setPrototypeOf(this, NoRoleInProfileError.prototype);
    }
}

export class CatalogIntegrityError extends AccessError {
    readonly code = 'CATALOG_INTEGRITY';
    readonly statusCode = 500;

    constructor(message: string, readonly problems: readonly string[] = []) {
        super(message, { problems });
        this.name = 'CatalogIntegrityError';
        Object.setPrototypeOf(this, CatalogIntegrityError.prototype);
    }
}

export interface ValidationIssue {
    path: string;
    message: string;
}

export class ValidationError extends AccessError {
    readonly code = 'VALIDATION_FAILED';
    readonly statusCode = 400;

    constructor(readonly context: string, readonly issues: readonly ValidationIssue[]) {
        super(`Validation failed in ${context}: ${JSON.stringify(issues)}`, { context, issues });
        this.name = 'ValidationError';
        Object.setPrototypeOf(this, ValidationError.prototype);
    }
}
