/**
 * PostgreSQL Access Repository
 *
 * All queries use parameterized statements and explicit column lists.
 * Multi-statement writes run inside transactionAsRole.
 */

import { db, DbClient, DbRole } from '../db/index.js';
import type { ProfileId, RoleId, UserId } from '../catalog/types.js';
import type { RoleRecord } from '../roles/role.js';
import {
    AccessRepository,
    ActiveProfileRecord,
    CascadeDelete,
    MembershipRecord
} from './repository.js';

type RoleRow = {
    id: string;
    profile_id: string;
    organization_id: string;
    label: string;
    value: string;
    permissions: string[] | null;
};

type MembershipRow = {
    user_id: string;
    role_id: string;
};

type ActiveProfileRow = {
    user_id: string;
    profile_id: string;
};

export class PgAccessRepository implements AccessRepository {
    constructor(
        private readonly role: DbRole,
        private readonly dbClient: DbClient = db
    ) { }

    async loadRoles(): Promise<RoleRecord[]> {
        const result = await this.dbClient.queryAsRole<RoleRow>(
            this.role,
            `SELECT
                id,
                profile_id,
                organization_id,
                label,
                value,
                permissions
            FROM roles
            ORDER BY id`
        );
        return result.rows.map(mapRowToRole);
    }

    async loadMemberships(): Promise<MembershipRecord[]> {
        const result = await this.dbClient.queryAsRole<MembershipRow>(
            this.role,
            `SELECT user_id, role_id
            FROM user_roles
            ORDER BY user_id, role_id`
        );
        return result.rows.map(row => Object.freeze({ userId: row.user_id, roleId: row.role_id }));
    }

    async loadActiveProfiles(): Promise<ActiveProfileRecord[]> {
        const result = await this.dbClient.queryAsRole<ActiveProfileRow>(
            this.role,
            `SELECT user_id, profile_id
            FROM user_active_profiles
            ORDER BY user_id`
        );
        return result.rows.map(row => Object.freeze({ userId: row.user_id, profile: row.profile_id }));
    }

    async saveRole(role: RoleRecord): Promise<void> {
        await this.dbClient.queryAsRole(
            this.role,
            `INSERT INTO roles (id, profile_id, organization_id, label, value, permissions)
            VALUES ($1, $2, $3, $4, $5, $6)
            ON CONFLICT (id) DO UPDATE
            SET label = EXCLUDED.label,
                value = EXCLUDED.value,
                permissions = EXCLUDED.permissions,
                updated_at = NOW()`,
            [role.id, role.profile, role.organization, role.label, role.value, [...role.permissions]]
        );
    }

    async deleteRole(roleId: RoleId, cascade?: CascadeDelete): Promise<void> {
        if (!cascade) {
            await this.dbClient.queryAsRole(this.role, 'DELETE FROM roles WHERE id = $1', [roleId]);
            return;
        }

        await this.dbClient.transactionAsRole(this.role, async tx => {
            await tx.query('DELETE FROM user_roles WHERE role_id = $1', [roleId]);
            if (cascade.clearActiveProfiles.length > 0) {
                await tx.query(
                    'DELETE FROM user_active_profiles WHERE user_id = ANY($1::text[])',
                    [[...cascade.clearActiveProfiles]]
                );
            }
            await tx.query('DELETE FROM roles WHERE id = $1', [roleId]);
        });
    }

    async insertMembership(userId: UserId, roleId: RoleId): Promise<void> {
        await this.dbClient.queryAsRole(
            this.role,
            `INSERT INTO user_roles (user_id, role_id)
            VALUES ($1, $2)
            ON CONFLICT (user_id, role_id) DO NOTHING`,
            [userId, roleId]
        );
    }

    async deleteMembership(userId: UserId, roleId: RoleId, clearActiveProfile: boolean): Promise<void> {
        if (!clearActiveProfile) {
            await this.dbClient.queryAsRole(
                this.role,
                'DELETE FROM user_roles WHERE user_id = $1 AND role_id = $2',
                [userId, roleId]
            );
            return;
        }

        await this.dbClient.transactionAsRole(this.role, async tx => {
            await tx.query('DELETE FROM user_roles WHERE user_id = $1 AND role_id = $2', [userId, roleId]);
            await tx.query('DELETE FROM user_active_profiles WHERE user_id = $1', [userId]);
        });
    }

    async saveActiveProfile(userId: UserId, profile: ProfileId | null): Promise<void> {
        if (profile === null) {
            await this.dbClient.queryAsRole(
                this.role,
                'DELETE FROM user_active_profiles WHERE user_id = $1',
                [userId]
            );
            return;
        }

        await this.dbClient.queryAsRole(
            this.role,
            `INSERT INTO user_active_profiles (user_id, profile_id)
            VALUES ($1, $2)
            ON CONFLICT (user_id) DO UPDATE
            SET profile_id = EXCLUDED.profile_id,
                updated_at = NOW()`,
            [userId, profile]
        );
    }
}

function mapRowToRole(row: RoleRow): RoleRecord {
    return Object.freeze({
        id: row.id,
        profile: row.profile_id,
        organization: row.organization_id,
        label: row.label,
        value: row.value,
        permissions: Object.freeze([...(row.permissions ?? [])])
    });
}
