import type { OrganizationId, ProfileId, RoleId, UserId } from '../catalog/types.js';
import { NoRoleInProfileError } from '../errors/accessErrors.js';
import { getComponentLogger } from '../logging/logger.js';
import type { Role, RoleUsage } from '../roles/role.js';
import { RoleRegistry } from '../roles/registry.js';

const logger = getComponentLogger('MembershipStore');

interface UserState {
    readonly roles: Set<RoleId>;
    activeProfile: ProfileId | null;
}

/**
 * Frozen view of one user's memberships at a point in time.
 * Role records inside are immutable, so a snapshot never changes underneath
 * its reader.
 */
export interface MembershipSnapshot {
    readonly userId: UserId;
    readonly activeProfile: ProfileId | null;
    readonly roles: readonly Role[];
}

export interface RevokeOutcome {
    /** False when the user did not hold the role. */
    readonly revoked: boolean;
    /** Profile that became inactive because its last role went away. */
    readonly clearedProfile: ProfileId | null;
}

const NOT_REVOKED: RevokeOutcome = Object.freeze({ revoked: false, clearedProfile: null });

/**
 * Membership Store
 *
 * User ↔ role edges plus each user's single active profile. The active
 * profile always names a profile the user holds at least one role in:
 * revoking the last such role clears it, and assigning a role never sets it.
 */
export class MembershipStore implements RoleUsage {
    private readonly users = new Map<UserId, UserState>();
    private readonly holders = new Map<RoleId, Set<UserId>>();

    constructor(private readonly registry: RoleRegistry) {
        registry.bindUsage(this);
    }

    /**
     * Idempotent. Returns true when a new membership was created.
     * @throws NotFoundError if the role is not registered
     */
    assignRole(userId: UserId, roleId: RoleId): boolean {
        const role = this.registry.getRole(roleId);
        const state = this.stateFor(userId);
        if (state.roles.has(roleId)) {
            return false;
        }

        state.roles.add(roleId);
        this.holderSet(roleId).add(userId);

        logger.info({ userId, roleId, organization: role.organization, profile: role.profile }, 'Role assigned');
        return true;
    }

    /**
     * Idempotent. Clears the active profile when the revoked role was the
     * user's last one under it.
     */
    revokeRole(userId: UserId, roleId: RoleId): RevokeOutcome {
        const outcome = this.previewRevoke(userId, roleId);
        if (!outcome.revoked) {
            return outcome;
        }

        const state = this.stateFor(userId);
        state.roles.delete(roleId);
        const holders = this.holders.get(roleId);
        holders?.delete(userId);
        if (holders && holders.size === 0) {
            this.holders.delete(roleId);
        }

        if (outcome.clearedProfile !== null) {
            state.activeProfile = null;
            logger.info({ userId, profile: outcome.clearedProfile }, 'Active profile cleared after last role revoked');
        }

        logger.info({ userId, roleId }, 'Role revoked');
        this.pruneIfEmpty(userId, state);
        return outcome;
    }

    /**
     * What revokeRole would do, without doing it.
     */
    previewRevoke(userId: UserId, roleId: RoleId): RevokeOutcome {
        const state = this.users.get(userId);
        if (!state || !state.roles.has(roleId)) {
            return NOT_REVOKED;
        }

        const active = state.activeProfile;
        if (active === null) {
            return { revoked: true, clearedProfile: null };
        }

        const stillHeld = Array.from(state.roles).some(heldId =>
            heldId !== roleId && this.registry.findRole(heldId)?.profile === active
        );
        return { revoked: true, clearedProfile: stillHeld ? null : active };
    }

    hasRole(userId: UserId, roleId: RoleId): boolean {
        return this.users.get(userId)?.roles.has(roleId) ?? false;
    }

    /**
     * All roles the user holds, optionally narrowed to one organization.
     */
    rolesFor(userId: UserId, organization?: OrganizationId): Role[] {
        const state = this.users.get(userId);
        if (!state) {
            return [];
        }

        const roles: Role[] = [];
        for (const roleId of state.roles) {
            const role = this.registry.findRole(roleId);
            if (role && (organization === undefined || role.organization === organization)) {
                roles.push(role);
            }
        }
        return roles;
    }

    /** Distinct profiles across every held role, active or not. */
    profilesFor(userId: UserId): ReadonlySet<ProfileId> {
        return new Set(this.rolesFor(userId).map(role => role.profile));
    }

    /** Distinct organizations across every held role, active or not. */
    organizationsFor(userId: UserId): ReadonlySet<OrganizationId> {
        return new Set(this.rolesFor(userId).map(role => role.organization));
    }

    activeProfileOf(userId: UserId): ProfileId | null {
        return this.users.get(userId)?.activeProfile ?? null;
    }

    /**
     * Set the active profile. Only the profile switch controller and
     * hydration call this.
     * @throws NoRoleInProfileError if the user holds no role under `profile`
     */
    setActiveProfile(userId: UserId, profile: ProfileId): void {
        if (!this.profilesFor(userId).has(profile)) {
            throw new NoRoleInProfileError(userId, profile);
        }
        this.stateFor(userId).activeProfile = profile;
    }

    snapshotFor(userId: UserId): MembershipSnapshot {
        return Object.freeze({
            userId,
            activeProfile: this.activeProfileOf(userId),
            roles: Object.freeze(this.rolesFor(userId))
        });
    }

    holdersOf(roleId: RoleId): ReadonlySet<UserId> {
        return new Set(this.holders.get(roleId) ?? []);
    }

    detachRole(roleId: RoleId): UserId[] {
        const detached = Array.from(this.holders.get(roleId) ?? []);
        for (const userId of detached) {
            this.revokeRole(userId, roleId);
        }
        return detached;
    }

    /**
     * Rebuild a persisted membership edge. Same rules as assignRole.
     */
    restoreMembership(userId: UserId, roleId: RoleId): void {
        this.assignRole(userId, roleId);
    }

    /**
     * Rebuild a persisted active profile. A stored profile the user no longer
     * holds a role in is dropped rather than restored.
     */
    restoreActiveProfile(userId: UserId, profile: ProfileId | null): boolean {
        if (profile === null) {
            return true;
        }
        if (!this.profilesFor(userId).has(profile)) {
            logger.warn({ userId, profile }, 'Discarding persisted active profile without a matching role');
            return false;
        }
        this.stateFor(userId).activeProfile = profile;
        return true;
    }

    private stateFor(userId: UserId): UserState {
        let state = this.users.get(userId);
        if (!state) {
            state = { roles: new Set<RoleId>(), activeProfile: null };
            this.users.set(userId, state);
        }
        return state;
    }

    private holderSet(roleId: RoleId): Set<UserId> {
        let holders = this.holders.get(roleId);
        if (!holders) {
            holders = new Set<UserId>();
            this.holders.set(roleId, holders);
        }
        return holders;
    }

    private pruneIfEmpty(userId: UserId, state: UserState): void {
        if (state.roles.size === 0 && state.activeProfile === null) {
            this.users.delete(userId);
        }
    }
}
