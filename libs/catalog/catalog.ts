import { CatalogIntegrityError, NotFoundError } from '../errors/accessErrors.js';
import {
    CatalogObject,
    CatalogSeed,
    Operation,
    OperationId,
    ObjectId,
    Permission,
    PermissionId,
    Profile,
    ProfileId,
    permissionKey
} from './types.js';

function indexById<T extends { readonly id: string }>(
    entries: readonly T[],
    kind: string,
    problems: string[]
): Map<string, T> {
    const index = new Map<string, T>();
    for (const entry of entries) {
        if (index.has(entry.id)) {
            problems.push(`duplicate ${kind} id "${entry.id}"`);
            continue;
        }
        index.set(entry.id, Object.freeze({ ...entry }));
    }
    return index;
}

/**
 * Catalog
 *
 * Immutable lookup surface over operations, objects, permissions, profiles
 * and the permission/profile validity mapping. Built once from a seed and
 * never mutated afterwards, so concurrent reads need no coordination.
 */
export class Catalog {
    private readonly operations: ReadonlyMap<OperationId, Operation>;
    private readonly objects: ReadonlyMap<ObjectId, CatalogObject>;
    private readonly profiles: ReadonlyMap<ProfileId, Profile>;
    private readonly permissions: ReadonlyMap<PermissionId, Permission>;
    private readonly assignable: ReadonlyMap<ProfileId, ReadonlySet<PermissionId>>;

    constructor(seed: CatalogSeed) {
        const problems: string[] = [];

        const operations = indexById(seed.operations, 'operation', problems);
        const objects = indexById(seed.objects, 'object', problems);
        const profiles = indexById(seed.profiles, 'profile', problems);

        // ':' separates the two halves of a permission id
        for (const [kind, index] of [['operation', operations], ['object', objects]] as const) {
            for (const id of index.keys()) {
                if (id.includes(':')) {
                    problems.push(`${kind} id "${id}" must not contain ":"`);
                }
            }
        }

        const permissions = new Map<PermissionId, Permission>();
        for (const ref of seed.permissions) {
            const id = permissionKey(ref.operation, ref.object);
            if (!operations.has(ref.operation)) {
                problems.push(`permission ${id} references unknown operation "${ref.operation}"`);
            }
            if (!objects.has(ref.object)) {
                problems.push(`permission ${id} references unknown object "${ref.object}"`);
            }
            if (permissions.has(id)) {
                problems.push(`duplicate permission ${id}`);
                continue;
            }
            permissions.set(id, Object.freeze({ id, operation: ref.operation, object: ref.object }));
        }

        const assignable = new Map<ProfileId, Set<PermissionId>>();
        for (const entry of seed.profilePermissions) {
            if (!profiles.has(entry.profile)) {
                problems.push(`profile permissions declared for unknown profile "${entry.profile}"`);
                continue;
            }
            const granted = assignable.get(entry.profile) ?? new Set<PermissionId>();
            for (const ref of entry.permissions) {
                const id = permissionKey(ref.operation, ref.object);
                if (!permissions.has(id)) {
                    problems.push(`profile ${entry.profile} references unregistered permission ${id}`);
                    continue;
                }
                granted.add(id);
            }
            assignable.set(entry.profile, granted);
        }

        if (problems.length > 0) {
            throw new CatalogIntegrityError('Catalog seed is inconsistent', problems);
        }

        this.operations = operations;
        this.objects = objects;
        this.profiles = profiles;
        this.permissions = permissions;
        this.assignable = assignable;
        Object.freeze(this);
    }

    /**
     * Resolve the permission registered for an (operation, object) pair.
     * @throws NotFoundError if no such permission exists
     */
    permissionOf(operation: OperationId, object: ObjectId): Permission {
        const id = permissionKey(operation, object);
        const permission = this.permissions.get(id);
        if (!permission || permission.operation !== operation || permission.object !== object) {
            throw new NotFoundError('permission', id);
        }
        return permission;
    }

    getPermission(id: PermissionId): Permission {
        const permission = this.permissions.get(id);
        if (!permission) {
            throw new NotFoundError('permission', id);
        }
        return permission;
    }

    isPermissionValidForProfile(permission: Permission | PermissionId, profile: ProfileId): boolean {
        const id = typeof permission === 'string' ? permission : permission.id;
        return this.assignable.get(profile)?.has(id) ?? false;
    }

    getProfile(id: ProfileId): Profile {
        const profile = this.profiles.get(id);
        if (!profile) {
            throw new NotFoundError('profile', id);
        }
        return profile;
    }

    hasProfile(id: ProfileId): boolean {
        return this.profiles.has(id);
    }

    listProfiles(): Profile[] {
        return Array.from(this.profiles.values());
    }

    /** Permissions an administrator may put into a role under `profile`. */
    permissionsForProfile(profile: ProfileId): Permission[] {
        const granted = this.assignable.get(profile);
        if (!granted) {
            return [];
        }
        return Array.from(granted, id => this.getPermission(id));
    }

    getOperation(id: OperationId): Operation {
        const operation = this.operations.get(id);
        if (!operation) {
            throw new NotFoundError('operation', id);
        }
        return operation;
    }

    getObject(id: ObjectId): CatalogObject {
        const object = this.objects.get(id);
        if (!object) {
            throw new NotFoundError('object', id);
        }
        return object;
    }
}
