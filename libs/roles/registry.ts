import crypto from 'crypto';
import { Catalog } from '../catalog/catalog.js';
import type { OrganizationId, PermissionId, ProfileId, RoleId, UserId } from '../catalog/types.js';
import {
    DuplicateValueError,
    InvalidPermissionForProfileError,
    NotFoundError,
    RoleInUseError
} from '../errors/accessErrors.js';
import { getComponentLogger } from '../logging/logger.js';
import { CreateRoleInputSchema } from '../validation/schema.js';
import { validate } from '../validation/zod-middleware.js';
import { CreateRoleInput, PermissionInput, Role, RoleRecord, RoleUsage } from './role.js';

const logger = getComponentLogger('RoleRegistry');

export interface RoleRegistryOptions {
    generateId?: () => RoleId;
}

function valueKey(organization: OrganizationId, profile: ProfileId, value: string): string {
    return JSON.stringify([organization, profile, value]);
}

function toPermissionIds(permissions: Iterable<PermissionInput>): PermissionId[] {
    return Array.from(permissions, permission => typeof permission === 'string' ? permission : permission.id);
}

/**
 * Role Registry
 *
 * Owns role records. Every write is validated against the catalog: a role may
 * only grant permissions declared assignable for its profile, and its value
 * must be unique within (organization, profile).
 *
 * Writes come in two halves so a caller can persist in between:
 * `prepare*` validates and builds the next record, `installRole` stores it.
 */
export class RoleRegistry {
    private readonly roles = new Map<RoleId, Role>();
    private readonly valueIndex = new Map<string, RoleId>();
    private readonly generateId: () => RoleId;
    private usage: RoleUsage | null = null;

    constructor(
        readonly catalog: Catalog,
        options: RoleRegistryOptions = {}
    ) {
        this.generateId = options.generateId ?? (() => crypto.randomUUID());
    }

    /**
     * Attach the membership view consulted by deleteRole/deleteRoleCascade.
     */
    bindUsage(usage: RoleUsage): void {
        this.usage = usage;
    }

    createRole(input: CreateRoleInput): Role {
        const role = this.prepareRole(input);
        this.commitCreate(role);
        return role;
    }

    /**
     * Install a role prepared by prepareRole.
     */
    commitCreate(role: Role): void {
        this.installRole(role);
        logger.info({
            roleId: role.id,
            organization: role.organization,
            profile: role.profile,
            value: role.value,
            permissions: role.permissions.size
        }, 'Role created');
    }

    /**
     * Validate a new role and assign it an id without registering it.
     */
    prepareRole(input: CreateRoleInput, id: RoleId = this.generateId()): Role {
        const parsed = validate(
            CreateRoleInputSchema,
            { ...input, permissions: toPermissionIds(input.permissions) },
            'createRole'
        );

        this.catalog.getProfile(parsed.profile);
        this.assertValueAvailable(parsed.organization, parsed.profile, parsed.value, id);

        return Object.freeze({
            id,
            profile: parsed.profile,
            organization: parsed.organization,
            label: parsed.label,
            value: parsed.value,
            permissions: this.resolvePermissions(parsed.profile, parsed.permissions)
        });
    }

    /**
     * Replace a role's permission set. Readers holding the previous record
     * keep seeing the previous set; new readers see the new one.
     */
    updateRolePermissions(roleId: RoleId, permissions: Iterable<PermissionInput>): Role {
        const next = this.prepareUpdate(roleId, permissions);
        this.commitUpdate(next);
        return next;
    }

    /**
     * Install a record prepared by prepareUpdate.
     */
    commitUpdate(role: Role): void {
        this.installRole(role);
        logger.info({ roleId: role.id, permissions: role.permissions.size }, 'Role permissions replaced');
    }

    prepareUpdate(roleId: RoleId, permissions: Iterable<PermissionInput>): Role {
        const current = this.getRole(roleId);
        return Object.freeze({
            ...current,
            permissions: this.resolvePermissions(current.profile, toPermissionIds(permissions))
        });
    }

    /**
     * Rebuild a role from its persisted record, applying the same checks as
     * createRole.
     */
    restoreRole(record: RoleRecord): Role {
        const role = this.prepareRole({
            profile: record.profile,
            organization: record.organization,
            label: record.label,
            value: record.value,
            permissions: record.permissions
        }, record.id);
        this.installRole(role);
        return role;
    }

    /**
     * Re-check a prepared record against the current registry state.
     * @throws DuplicateValueError | InvalidPermissionForProfileError
     */
    verifyRole(role: Role): void {
        this.assertValueAvailable(role.organization, role.profile, role.value, role.id);
        for (const permission of role.permissions) {
            if (!this.catalog.isPermissionValidForProfile(permission, role.profile)) {
                throw new InvalidPermissionForProfileError(permission, role.profile);
            }
        }
    }

    /**
     * Store a prepared record, replacing any record with the same id.
     */
    installRole(role: Role): void {
        this.verifyRole(role);

        const previous = this.roles.get(role.id);
        if (previous) {
            this.valueIndex.delete(valueKey(previous.organization, previous.profile, previous.value));
        }
        this.roles.set(role.id, role);
        this.valueIndex.set(valueKey(role.organization, role.profile, role.value), role.id);
    }

    /**
     * Delete an unreferenced role.
     * @throws RoleInUseError while any user still holds the role
     */
    deleteRole(roleId: RoleId): Role {
        const role = this.getRole(roleId);
        const holderCount = this.holderCount(roleId);
        if (holderCount > 0) {
            throw new RoleInUseError(roleId, holderCount);
        }
        this.remove(role);
        logger.info({ roleId, organization: role.organization }, 'Role deleted');
        return role;
    }

    /**
     * Revoke the role from every holder, then delete it.
     */
    deleteRoleCascade(roleId: RoleId): UserId[] {
        const role = this.getRole(roleId);
        const detached = this.usage?.detachRole(roleId) ?? [];
        this.remove(role);
        logger.info({ roleId, organization: role.organization, detachedUsers: detached.length }, 'Role deleted with cascade');
        return detached;
    }

    holderCount(roleId: RoleId): number {
        return this.usage?.holdersOf(roleId).size ?? 0;
    }

    getRole(roleId: RoleId): Role {
        const role = this.roles.get(roleId);
        if (!role) {
            throw new NotFoundError('role', roleId);
        }
        return role;
    }

    findRole(roleId: RoleId): Role | undefined {
        return this.roles.get(roleId);
    }

    findByValue(organization: OrganizationId, profile: ProfileId, value: string): Role | undefined {
        const roleId = this.valueIndex.get(valueKey(organization, profile, value));
        return roleId === undefined ? undefined : this.roles.get(roleId);
    }

    rolesInOrganization(organization: OrganizationId): Role[] {
        return this.listRoles().filter(role => role.organization === organization);
    }

    listRoles(): Role[] {
        return Array.from(this.roles.values());
    }

    private remove(role: Role): void {
        this.roles.delete(role.id);
        this.valueIndex.delete(valueKey(role.organization, role.profile, role.value));
    }

    private assertValueAvailable(
        organization: OrganizationId,
        profile: ProfileId,
        value: string,
        roleId: RoleId
    ): void {
        const existing = this.valueIndex.get(valueKey(organization, profile, value));
        if (existing !== undefined && existing !== roleId) {
            throw new DuplicateValueError(organization, profile, value);
        }
    }

    private resolvePermissions(profile: ProfileId, permissionIds: readonly PermissionId[]): ReadonlySet<PermissionId> {
        const resolved = new Set<PermissionId>();
        for (const id of permissionIds) {
            const permission = this.catalog.getPermission(id);
            if (!this.catalog.isPermissionValidForProfile(permission, profile)) {
                throw new InvalidPermissionForProfileError(permission.id, profile);
            }
            resolved.add(permission.id);
        }
        return resolved;
    }
}
