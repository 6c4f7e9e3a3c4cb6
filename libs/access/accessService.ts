/**
 * Access Service
 *
 * Asynchronous administration facade over the decision core. Every write
 * follows the same sequence under a keyed lock:
 *
 *   1. validate against the in-memory core (throws AccessError, nothing written)
 *   2. persist through the repository (failures are sanitized, nothing applied)
 *   3. apply to the in-memory core (synchronous, cannot partially apply)
 *
 * Lock keys: `role:<id>` and `user:<id>`; creation locks the normalized
 * (organization, profile, value) it claims. Membership writes hold both, switches
 * hold the user key, cascading deletes hold the role key and then every
 * holder's user key. Keys are always taken role-first.
 *
 * Reads (`is`, `can`) never wait on a lock.
 */

import { Catalog } from '../catalog/catalog.js';
import type {
    ObjectId,
    OperationId,
    OrganizationId,
    ProfileId,
    RoleId,
    UserId
} from '../catalog/types.js';
import { KeyedLock } from '../concurrency/keyedLock.js';
import { AccessError, RoleInUseError } from '../errors/accessErrors.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { PermissionEvaluator } from '../evaluator/evaluator.js';
import { getComponentLogger } from '../logging/logger.js';
import { MembershipStore, RevokeOutcome } from '../membership/store.js';
import type { AccessRepository } from '../persistence/repository.js';
import { ProfileState, ProfileSwitchController } from '../profile/switchController.js';
import { CreateRoleInput, PermissionInput, Role, toRoleRecord } from '../roles/role.js';
import { RoleRegistry, RoleRegistryOptions } from '../roles/registry.js';

const logger = getComponentLogger('AccessService');

export interface AccessCore {
    readonly catalog: Catalog;
    readonly registry: RoleRegistry;
    readonly memberships: MembershipStore;
    readonly evaluator: PermissionEvaluator;
    readonly profiles: ProfileSwitchController;
}

/**
 * Wire the in-memory decision core around a catalog.
 */
export function createAccessCore(catalog: Catalog, options: RoleRegistryOptions = {}): AccessCore {
    const registry = new RoleRegistry(catalog, options);
    const memberships = new MembershipStore(registry);
    return Object.freeze({
        catalog,
        registry,
        memberships,
        evaluator: new PermissionEvaluator(catalog, memberships),
        profiles: new ProfileSwitchController(catalog, memberships)
    });
}

const roleKey = (roleId: RoleId) => `role:${roleId}`;
const userKey = (userId: UserId) => `user:${userId}`;
const roleValueKey = (role: Role) =>
    `role-value:${JSON.stringify([role.organization, role.profile, role.value])}`;

export class AccessService {
    private readonly locks = new KeyedLock();

    constructor(
        readonly core: AccessCore,
        private readonly repository: AccessRepository
    ) { }

    /**
     * Build a core from the catalog and replay persisted state into it.
     */
    static async load(
        catalog: Catalog,
        repository: AccessRepository,
        options: RoleRegistryOptions = {}
    ): Promise<AccessService> {
        const core = createAccessCore(catalog, options);

        const roles = await repository.loadRoles();
        for (const record of roles) {
            core.registry.restoreRole(record);
        }

        const memberships = await repository.loadMemberships();
        for (const membership of memberships) {
            core.memberships.restoreMembership(membership.userId, membership.roleId);
        }

        const activeProfiles = await repository.loadActiveProfiles();
        let discarded = 0;
        for (const active of activeProfiles) {
            if (!core.memberships.restoreActiveProfile(active.userId, active.profile)) {
                discarded += 1;
            }
        }

        logger.info({
            roles: roles.length,
            memberships: memberships.length,
            activeProfiles: activeProfiles.length - discarded,
            discardedActiveProfiles: discarded
        }, 'Access state hydrated');

        return new AccessService(core, repository);
    }

    is(userId: UserId, profile: ProfileId): boolean {
        return this.core.evaluator.is(userId, profile);
    }

    can(userId: UserId, operation: OperationId, object: ObjectId, organization?: OrganizationId): boolean {
        return this.core.evaluator.can(userId, operation, object, organization);
    }

    async createRole(input: CreateRoleInput): Promise<Role> {
        const prepared = this.core.registry.prepareRole(input);

        return this.locks.run(roleValueKey(prepared), async () => {
            this.core.registry.verifyRole(prepared);
            await this.persist('AccessService:CreateRole', () => this.repository.saveRole(toRoleRecord(prepared)));
            this.core.registry.commitCreate(prepared);
            return prepared;
        });
    }

    async updateRolePermissions(roleId: RoleId, permissions: Iterable<PermissionInput>): Promise<Role> {
        return this.locks.run(roleKey(roleId), async () => {
            const next = this.core.registry.prepareUpdate(roleId, permissions);
            await this.persist('AccessService:UpdateRolePermissions', () => this.repository.saveRole(toRoleRecord(next)));
            this.core.registry.commitUpdate(next);
            return next;
        });
    }

    async deleteRole(roleId: RoleId): Promise<void> {
        await this.locks.run(roleKey(roleId), async () => {
            this.core.registry.getRole(roleId);
            const holderCount = this.core.registry.holderCount(roleId);
            if (holderCount > 0) {
                throw new RoleInUseError(roleId, holderCount);
            }

            await this.persist('AccessService:DeleteRole', () => this.repository.deleteRole(roleId));
            this.core.registry.deleteRole(roleId);
        });
    }

    /**
     * Revoke the role from every holder and delete it, atomically in storage.
     * Returns the users that lost the role.
     */
    async deleteRoleCascade(roleId: RoleId): Promise<UserId[]> {
        return this.locks.run(roleKey(roleId), async () => {
            this.core.registry.getRole(roleId);
            const holders = Array.from(this.core.memberships.holdersOf(roleId));

            return this.locks.run(holders.map(userKey), async () => {
                const clearActiveProfiles = holders.filter(userId =>
                    this.core.memberships.previewRevoke(userId, roleId).clearedProfile !== null
                );

                await this.persist('AccessService:DeleteRoleCascade', () =>
                    this.repository.deleteRole(roleId, { clearActiveProfiles })
                );
                return this.core.registry.deleteRoleCascade(roleId);
            });
        });
    }

    /**
     * Idempotent. Returns true when a new membership was stored.
     */
    async assignRole(userId: UserId, roleId: RoleId): Promise<boolean> {
        return this.locks.run([roleKey(roleId), userKey(userId)], async () => {
            this.core.registry.getRole(roleId);
            if (this.core.memberships.hasRole(userId, roleId)) {
                return false;
            }

            await this.persist('AccessService:AssignRole', () => this.repository.insertMembership(userId, roleId));
            return this.core.memberships.assignRole(userId, roleId);
        });
    }

    /**
     * Idempotent. Clears the active profile with the last role under it.
     */
    async revokeRole(userId: UserId, roleId: RoleId): Promise<RevokeOutcome> {
        return this.locks.run([roleKey(roleId), userKey(userId)], async () => {
            const preview = this.core.memberships.previewRevoke(userId, roleId);
            if (!preview.revoked) {
                return preview;
            }

            await this.persist('AccessService:RevokeRole', () =>
                this.repository.deleteMembership(userId, roleId, preview.clearedProfile !== null)
            );
            return this.core.memberships.revokeRole(userId, roleId);
        });
    }

    async switchProfile(userId: UserId, target: ProfileId): Promise<ProfileState> {
        return this.locks.run(userKey(userId), async () => {
            this.core.profiles.assertCanSwitch(userId, target);
            await this.persist('AccessService:SwitchProfile', () => this.repository.saveActiveProfile(userId, target));
            return this.core.profiles.switchProfile(userId, target);
        });
    }

    private async persist<T>(contextLabel: string, write: () => Promise<T>): Promise<T> {
        try {
            return await write();
        } catch (error) {
            if (error instanceof AccessError) {
                throw error;
            }
            throw ErrorSanitizer.sanitize(error, contextLabel);
        }
    }
}
