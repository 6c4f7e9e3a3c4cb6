/**
 * Role Model
 *
 * A role is administrator-defined runtime data: an organization- and
 * profile-scoped bundle of permissions. Records are immutable; editing a
 * role's permissions installs a new record in place of the old one.
 */

import type {
    OrganizationId,
    Permission,
    PermissionId,
    ProfileId,
    RoleId,
    UserId
} from '../catalog/types.js';

export interface Role {
    readonly id: RoleId;
    readonly profile: ProfileId;
    readonly organization: OrganizationId;
    readonly label: string;
    /** Human-referenceable slug, unique per (organization, profile) */
    readonly value: string;
    readonly permissions: ReadonlySet<PermissionId>;
}

export type PermissionInput = Permission | PermissionId;

export interface CreateRoleInput {
    profile: ProfileId;
    organization: OrganizationId;
    label: string;
    value: string;
    permissions: Iterable<PermissionInput>;
}

/**
 * Persisted shape of a role (permission set flattened to an array).
 */
export interface RoleRecord {
    readonly id: RoleId;
    readonly profile: ProfileId;
    readonly organization: OrganizationId;
    readonly label: string;
    readonly value: string;
    readonly permissions: readonly PermissionId[];
}

/**
 * Membership-side view the registry needs to guard deletion.
 */
export interface RoleUsage {
    holdersOf(roleId: RoleId): ReadonlySet<UserId>;
    /** Revoke the role from every holder; returns the affected users. */
    detachRole(roleId: RoleId): UserId[];
}

export function toRoleRecord(role: Role): RoleRecord {
    return Object.freeze({
        id: role.id,
        profile: role.profile,
        organization: role.organization,
        label: role.label,
        value: role.value,
        permissions: Object.freeze(Array.from(role.permissions).sort())
    });
}
