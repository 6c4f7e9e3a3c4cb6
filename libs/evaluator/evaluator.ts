import { Catalog } from '../catalog/catalog.js';
import type {
    ObjectId,
    OperationId,
    OrganizationId,
    PermissionId,
    ProfileId,
    UserId
} from '../catalog/types.js';
import { NotFoundError } from '../errors/accessErrors.js';
import { getComponentLogger } from '../logging/logger.js';
import { MembershipSnapshot, MembershipStore } from '../membership/store.js';
import type { Role } from '../roles/role.js';

const logger = getComponentLogger('PermissionEvaluator');

/**
 * Roles that may contribute grants: held under the active profile and,
 * when an organization is given, belonging to it.
 */
function candidateRoles(snapshot: MembershipSnapshot, organization?: OrganizationId): Role[] {
    const active = snapshot.activeProfile;
    if (active === null) {
        return [];
    }
    return snapshot.roles.filter(role =>
        role.profile === active && (organization === undefined || role.organization === organization)
    );
}

/**
 * Permission Evaluator
 *
 * Grants are strictly additive: a permission is held if ANY candidate role
 * grants it. There is no deny, no precedence between roles and no shadowing,
 * so the outcome does not depend on role order.
 *
 * Every failure path denies. `can` never throws.
 */
export class PermissionEvaluator {
    constructor(
        private readonly catalog: Catalog,
        private readonly memberships: MembershipStore
    ) { }

    /**
     * True iff `profile` is the user's active profile.
     */
    is(userId: UserId, profile: ProfileId): boolean {
        return this.memberships.activeProfileOf(userId) === profile;
    }

    can(
        userId: UserId,
        operation: OperationId,
        object: ObjectId,
        organization?: OrganizationId
    ): boolean {
        try {
            return this.evaluate(this.memberships.snapshotFor(userId), operation, object, organization);
        } catch (error) {
            logger.error({ error, userId, operation, object, organization }, 'Permission evaluation failed; denying');
            return false;
        }
    }

    /**
     * Decide against an already captured snapshot.
     */
    evaluate(
        snapshot: MembershipSnapshot,
        operation: OperationId,
        object: ObjectId,
        organization?: OrganizationId
    ): boolean {
        if (snapshot.activeProfile === null) {
            logger.debug({ userId: snapshot.userId }, 'Denied: no active profile');
            return false;
        }

        let permissionId: PermissionId;
        try {
            permissionId = this.catalog.permissionOf(operation, object).id;
        } catch (error) {
            if (error instanceof NotFoundError) {
                logger.debug({ userId: snapshot.userId, operation, object }, 'Denied: unknown permission');
                return false;
            }
            throw error;
        }

        const allowed = candidateRoles(snapshot, organization).some(role => role.permissions.has(permissionId));
        if (!allowed) {
            logger.debug({ userId: snapshot.userId, permission: permissionId, organization }, 'Denied');
        }
        return allowed;
    }

    /**
     * Union of permissions granted under the active profile, optionally
     * narrowed to one organization.
     */
    effectivePermissions(userId: UserId, organization?: OrganizationId): ReadonlySet<PermissionId> {
        const granted = new Set<PermissionId>();
        for (const role of candidateRoles(this.memberships.snapshotFor(userId), organization)) {
            for (const permission of role.permissions) {
                granted.add(permission);
            }
        }
        return granted;
    }
}
