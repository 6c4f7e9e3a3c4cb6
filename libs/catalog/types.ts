/**
 * Catalog Vocabulary
 *
 * The only compile-time-fixed vocabulary of the system. Everything an
 * administrator defines (roles, memberships) is runtime data validated
 * against these entries.
 */

export type OperationId = string;
export type ObjectId = string;
export type ProfileId = string;
/** `"<operation>:<object>"` */
export type PermissionId = string;
export type OrganizationId = string;
export type UserId = string;
export type RoleId = string;

/** An action kind (read, edit, create, ...). */
export interface Operation {
    readonly id: OperationId;
    readonly label: string;
}

/** A resource kind acted upon (invoice, customer, ...). */
export interface CatalogObject {
    readonly id: ObjectId;
    readonly label: string;
}

/** The atomic grantable unit: one operation on one object. */
export interface Permission {
    readonly id: PermissionId;
    readonly operation: OperationId;
    readonly object: ObjectId;
}

/** A developer-defined user type; drives routing and gates every check. */
export interface Profile {
    readonly id: ProfileId;
    /** Display value, e.g. "lawn-care-admin" */
    readonly value: string;
    /** Display label, e.g. "Lawn Care Administrator" */
    readonly label: string;
}

export interface PermissionRef {
    readonly operation: OperationId;
    readonly object: ObjectId;
}

/**
 * Deployment seed for the catalog.
 * `profilePermissions` declares which permissions are assignable per profile.
 */
export interface CatalogSeed {
    readonly operations: readonly Operation[];
    readonly objects: readonly CatalogObject[];
    readonly profiles: readonly Profile[];
    readonly permissions: readonly PermissionRef[];
    readonly profilePermissions: readonly {
        readonly profile: ProfileId;
        readonly permissions: readonly PermissionRef[];
    }[];
}

export function permissionKey(operation: OperationId, object: ObjectId): PermissionId {
    return `${operation}:${object}`;
}
