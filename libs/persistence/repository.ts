/**
 * Access Repository Port
 *
 * Durability collaborator for roles, memberships and active profiles. The
 * decision core never reads from it at request time; it is consulted at
 * hydration and written on every administrative change.
 */

import type { ProfileId, RoleId, UserId } from '../catalog/types.js';
import type { RoleRecord } from '../roles/role.js';

export interface MembershipRecord {
    readonly userId: UserId;
    readonly roleId: RoleId;
}

export interface ActiveProfileRecord {
    readonly userId: UserId;
    readonly profile: ProfileId;
}

export interface CascadeDelete {
    /** Users whose active profile is cleared by losing this role. */
    readonly clearActiveProfiles: readonly UserId[];
}

export interface AccessRepository {
    loadRoles(): Promise<RoleRecord[]>;
    loadMemberships(): Promise<MembershipRecord[]>;
    loadActiveProfiles(): Promise<ActiveProfileRecord[]>;

    /** Insert or replace a role record. */
    saveRole(role: RoleRecord): Promise<void>;
    /**
     * Delete a role. With `cascade`, memberships referencing it are deleted
     * and the listed active profiles cleared in the same transaction.
     */
    deleteRole(roleId: RoleId, cascade?: CascadeDelete): Promise<void>;

    insertMembership(userId: UserId, roleId: RoleId): Promise<void>;
    deleteMembership(userId: UserId, roleId: RoleId, clearActiveProfile: boolean): Promise<void>;

    /** `null` clears the stored active profile. */
    saveActiveProfile(userId: UserId, profile: ProfileId | null): Promise<void>;
}
