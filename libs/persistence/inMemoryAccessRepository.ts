import type { ProfileId, RoleId, UserId } from '../catalog/types.js';
import type { RoleRecord } from '../roles/role.js';
import {
    AccessRepository,
    ActiveProfileRecord,
    CascadeDelete,
    MembershipRecord
} from './repository.js';

function membershipKey(userId: UserId, roleId: RoleId): string {
    return JSON.stringify([userId, roleId]);
}

/**
 * In-process repository for embedding and tests.
 * Mirrors the PostgreSQL schema's constraints: a role cannot be deleted
 * without cascade while memberships reference it.
 */
export class InMemoryAccessRepository implements AccessRepository {
    private readonly roles = new Map<RoleId, RoleRecord>();
    private readonly memberships = new Map<string, MembershipRecord>();
    private readonly activeProfiles = new Map<UserId, ProfileId>();

    constructor(seed: {
        roles?: readonly RoleRecord[];
        memberships?: readonly MembershipRecord[];
        activeProfiles?: readonly ActiveProfileRecord[];
    } = {}) {
        for (const role of seed.roles ?? []) {
            this.roles.set(role.id, role);
        }
        for (const membership of seed.memberships ?? []) {
            this.memberships.set(membershipKey(membership.userId, membership.roleId), membership);
        }
        for (const active of seed.activeProfiles ?? []) {
            this.activeProfiles.set(active.userId, active.profile);
        }
    }

    async loadRoles(): Promise<RoleRecord[]> {
        return Array.from(this.roles.values());
    }

    async loadMemberships(): Promise<MembershipRecord[]> {
        return Array.from(this.memberships.values());
    }

    async loadActiveProfiles(): Promise<ActiveProfileRecord[]> {
        return Array.from(this.activeProfiles, ([userId, profile]) => ({ userId, profile }));
    }

    async saveRole(role: RoleRecord): Promise<void> {
        this.roles.set(role.id, role);
    }

    async deleteRole(roleId: RoleId, cascade?: CascadeDelete): Promise<void> {
        const referencing = Array.from(this.memberships.entries()).filter(([, m]) => m.roleId === roleId);
        if (referencing.length > 0 && !cascade) {
            throw new Error(`roles.${roleId} is still referenced by user_roles`);
        }
        for (const [key] of referencing) {
            this.memberships.delete(key);
        }
        for (const userId of cascade?.clearActiveProfiles ?? []) {
            this.activeProfiles.delete(userId);
        }
        this.roles.delete(roleId);
    }

    async insertMembership(userId: UserId, roleId: RoleId): Promise<void> {
        if (!this.roles.has(roleId)) {
            throw new Error(`user_roles.role_id ${roleId} references a missing role`);
        }
        this.memberships.set(membershipKey(userId, roleId), { userId, roleId });
    }

    async deleteMembership(userId: UserId, roleId: RoleId, clearActiveProfile: boolean): Promise<void> {
        this.memberships.delete(membershipKey(userId, roleId));
        if (clearActiveProfile) {
            this.activeProfiles.delete(userId);
        }
    }

    async saveActiveProfile(userId: UserId, profile: ProfileId | null): Promise<void> {
        if (profile === null) {
            this.activeProfiles.delete(userId);
        } else {
            this.activeProfiles.set(userId, profile);
        }
    }
}
