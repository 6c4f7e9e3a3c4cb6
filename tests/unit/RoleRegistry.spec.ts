/**
 * Unit Tests: RoleRegistry
 *
 * Role creation rules, copy-on-write permission replacement and guarded
 * deletion.
 *
 * @see libs/roles/registry.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { AccessCore } from '../../libs/access/accessService.js';
import {
    DuplicateValueError,
    InvalidPermissionForProfileError,
    NotFoundError,
    RoleInUseError,
    ValidationError
} from '../../libs/errors/accessErrors.js';
import { toRoleRecord } from '../../libs/roles/role.js';
import { buildCore } from '../helpers/fixtures.js';

describe('RoleRegistry', () => {
    let core: AccessCore;

    beforeEach(() => {
        core = buildCore();
    });

    describe('createRole', () => {
        it('should create a role with resolved permissions', () => {
            const role = core.registry.createRole({
                profile: 'client',
                organization: 'tom',
                label: '  Invoice viewer ',
                value: 'invoice-viewer',
                permissions: ['read:invoice', core.catalog.permissionOf('edit', 'invoice_line_item')]
            });

            assert.strictEqual(role.id, 'role-1');
            assert.strictEqual(role.label, 'Invoice viewer');
            assert.deepStrictEqual(Array.from(role.permissions), ['read:invoice', 'edit:invoice_line_item']);
            assert.strictEqual(core.registry.getRole('role-1'), role);
            assert.strictEqual(core.registry.findByValue('tom', 'client', 'invoice-viewer'), role);
        });

        it('should reject a permission not assignable under the profile', () => {
            assert.throws(
                () => core.registry.createRole({
                    profile: 'client',
                    organization: 'tom',
                    label: 'Invoice author',
                    value: 'invoice-author',
                    permissions: ['create:invoice']
                }),
                (error: unknown) =>
                    error instanceof InvalidPermissionForProfileError &&
                    error.permission === 'create:invoice' &&
                    error.profile === 'client' &&
                    error.statusCode === 422
            );
            assert.deepStrictEqual(core.registry.listRoles(), []);
        });

        it('should reject unknown profiles and permissions', () => {
            assert.throws(
                () => core.registry.createRole({
                    profile: 'auditor',
                    organization: 'tom',
                    label: 'Auditor',
                    value: 'auditor',
                    permissions: []
                }),
                (error: unknown) => error instanceof NotFoundError && error.kind === 'profile' && error.key === 'auditor'
            );
            assert.throws(
                () => core.registry.createRole({
                    profile: 'client',
                    organization: 'tom',
                    label: 'Archivist',
                    value: 'archivist',
                    permissions: ['archive:invoice']
                }),
                (error: unknown) => error instanceof NotFoundError && error.kind === 'permission' && error.key === 'archive:invoice'
            );
        });

        it('should reject a malformed value', () => {
            assert.throws(
                () => core.registry.createRole({
                    profile: 'client',
                    organization: 'tom',
                    label: 'Viewer',
                    value: 'Invoice Viewer',
                    permissions: []
                }),
                (error: unknown) =>
                    error instanceof ValidationError &&
                    error.context === 'createRole' &&
                    error.issues.length === 1 &&
                    error.issues[0]?.path === 'value' &&
                    error.issues[0]?.message === 'value must be a lowercase slug'
            );
        });

        it('should keep values unique per organization and profile', () => {
            core.registry.createRole({ profile: 'client', organization: 'tom', label: 'Viewer', value: 'viewer', permissions: [] });

            assert.throws(
                () => core.registry.createRole({ profile: 'client', organization: 'tom', label: 'Other viewer', value: 'viewer', permissions: [] }),
                (error: unknown) =>
                    error instanceof DuplicateValueError &&
                    error.organization === 'tom' &&
                    error.profile === 'client' &&
                    error.value === 'viewer'
            );

            const otherOrg = core.registry.createRole({ profile: 'client', organization: 'jack', label: 'Viewer', value: 'viewer', permissions: [] });
            const otherProfile = core.registry.createRole({ profile: 'crew', organization: 'tom', label: 'Viewer', value: 'viewer', permissions: [] });

            assert.strictEqual(otherOrg.id, 'role-3');
            assert.strictEqual(otherProfile.id, 'role-4');
            assert.deepStrictEqual(core.registry.rolesInOrganization('tom').map(role => role.id), ['role-1', 'role-4']);
        });
    });

    describe('updateRolePermissions', () => {
        it('should replace the record without mutating the previous one', () => {
            const before = core.registry.createRole({
                profile: 'client', organization: 'tom', label: 'Viewer', value: 'viewer', permissions: ['read:invoice']
            });

            const after = core.registry.updateRolePermissions(before.id, ['edit:invoice_line_item']);

            assert.notStrictEqual(after, before);
            assert.deepStrictEqual(Array.from(before.permissions), ['read:invoice']);
            assert.deepStrictEqual(Array.from(after.permissions), ['edit:invoice_line_item']);
            assert.strictEqual(core.registry.getRole(before.id), after);
            assert.strictEqual(core.registry.findByValue('tom', 'client', 'viewer'), after);
        });

        it('should leave the role untouched when the new set is invalid', () => {
            const role = core.registry.createRole({
                profile: 'client', organization: 'tom', label: 'Viewer', value: 'viewer', permissions: ['read:invoice']
            });

            assert.throws(
                () => core.registry.updateRolePermissions(role.id, ['read:invoice', 'edit:invoice']),
                InvalidPermissionForProfileError
            );
            assert.strictEqual(core.registry.getRole(role.id), role);
        });

        it('should throw NotFoundError for an unknown role', () => {
            assert.throws(
                () => core.registry.updateRolePermissions('role-404', []),
                (error: unknown) => error instanceof NotFoundError && error.kind === 'role'
            );
        });
    });

    describe('deleteRole', () => {
        it('should delete an unreferenced role and free its value', () => {
            const role = core.registry.createRole({ profile: 'client', organization: 'tom', label: 'Viewer', value: 'viewer', permissions: [] });

            assert.strictEqual(core.registry.deleteRole(role.id), role);
            assert.strictEqual(core.registry.findRole(role.id), undefined);
            assert.strictEqual(core.registry.findByValue('tom', 'client', 'viewer'), undefined);
            assert.doesNotThrow(() =>
                core.registry.createRole({ profile: 'client', organization: 'tom', label: 'Viewer', value: 'viewer', permissions: [] })
            );
        });

        it('should refuse to delete a role that is still held', () => {
            const role = core.registry.createRole({ profile: 'client', organization: 'tom', label: 'Viewer', value: 'viewer', permissions: [] });
            core.memberships.assignRole('u1', role.id);
            core.memberships.assignRole('u2', role.id);

            assert.throws(
                () => core.registry.deleteRole(role.id),
                (error: unknown) =>
                    error instanceof RoleInUseError &&
                    error.roleId === role.id &&
                    error.holderCount === 2
            );
            assert.strictEqual(core.registry.getRole(role.id), role);
        });

        it('should revoke from every holder on cascade and clear emptied profiles', () => {
            const viewer = core.registry.createRole({ profile: 'client', organization: 'tom', label: 'Viewer', value: 'viewer', permissions: ['read:invoice'] });
            const other = core.registry.createRole({ profile: 'client', organization: 'jack', label: 'Viewer', value: 'viewer', permissions: ['read:invoice'] });
            core.memberships.assignRole('u1', viewer.id);
            core.memberships.assignRole('u2', viewer.id);
            core.memberships.assignRole('u2', other.id);
            core.profiles.switchProfile('u1', 'client');
            core.profiles.switchProfile('u2', 'client');

            const detached = core.registry.deleteRoleCascade(viewer.id);

            assert.deepStrictEqual(detached, ['u1', 'u2']);
            assert.strictEqual(core.registry.findRole(viewer.id), undefined);
            assert.strictEqual(core.memberships.activeProfileOf('u1'), null);
            assert.strictEqual(core.memberships.activeProfileOf('u2'), 'client');
            assert.deepStrictEqual(core.memberships.rolesFor('u2').map(role => role.id), [other.id]);
        });
    });

    describe('restoreRole', () => {
        it('should rebuild a persisted record under its own id', () => {
            const role = core.registry.restoreRole({
                id: 'persisted-7',
                profile: 'crew',
                organization: 'tom',
                label: 'Crew lead',
                value: 'crew-lead',
                permissions: ['read:customer']
            });

            assert.strictEqual(role.id, 'persisted-7');
            assert.deepStrictEqual(toRoleRecord(role), {
                id: 'persisted-7',
                profile: 'crew',
                organization: 'tom',
                label: 'Crew lead',
                value: 'crew-lead',
                permissions: ['read:customer']
            });
        });
    });
});
