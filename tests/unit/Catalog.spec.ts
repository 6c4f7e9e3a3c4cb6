/**
 * Unit Tests: Catalog
 *
 * Lookups over the fixed vocabulary and rejection of inconsistent seeds.
 *
 * @see libs/catalog/catalog.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { Catalog } from '../../libs/catalog/catalog.js';
import { CatalogIntegrityError, NotFoundError } from '../../libs/errors/accessErrors.js';
import { TEST_SEED, buildCatalog } from '../helpers/fixtures.js';

describe('Catalog', () => {
    const catalog = buildCatalog();

    it('should resolve a registered (operation, object) pair', () => {
        const permission = catalog.permissionOf('read', 'invoice');

        assert.deepStrictEqual({ ...permission }, { id: 'read:invoice', operation: 'read', object: 'invoice' });
        assert.strictEqual(catalog.getPermission('read:invoice'), permission);
    });

    it('should throw NotFoundError for an unregistered pair', () => {
        assert.throws(
            () => catalog.permissionOf('create', 'customer'),
            (error: unknown) =>
                error instanceof NotFoundError &&
                error.kind === 'permission' &&
                error.key === 'create:customer' &&
                error.message === 'Unknown permission: create:customer'
        );
    });

    it('should answer profile validity for permissions and permission ids', () => {
        const readInvoice = catalog.permissionOf('read', 'invoice');

        assert.strictEqual(catalog.isPermissionValidForProfile(readInvoice, 'client'), true);
        assert.strictEqual(catalog.isPermissionValidForProfile('create:invoice', 'client'), false);
        assert.strictEqual(catalog.isPermissionValidForProfile('create:invoice', 'admin'), true);
        assert.strictEqual(catalog.isPermissionValidForProfile('read:invoice', 'auditor'), false);
    });

    it('should list assignable permissions per profile', () => {
        assert.deepStrictEqual(
            catalog.permissionsForProfile('client').map(permission => permission.id),
            ['read:invoice', 'edit:invoice_line_item']
        );
        assert.deepStrictEqual(
            catalog.permissionsForProfile('crew').map(permission => permission.id),
            ['read:customer']
        );
        assert.deepStrictEqual(catalog.permissionsForProfile('auditor'), []);
    });

    it('should expose profiles in seed order', () => {
        assert.deepStrictEqual(catalog.listProfiles().map(profile => profile.id), ['client', 'admin', 'crew']);
        assert.strictEqual(catalog.getProfile('admin').value, 'lawn-care-admin');
        assert.strictEqual(catalog.hasProfile('crew'), true);
        assert.strictEqual(catalog.hasProfile('auditor'), false);
        assert.throws(() => catalog.getProfile('auditor'), NotFoundError);
    });

    it('should resolve operations and objects', () => {
        assert.strictEqual(catalog.getOperation('edit').label, 'Edit');
        assert.strictEqual(catalog.getObject('invoice_line_item').label, 'Invoice line item');
        assert.throws(() => catalog.getOperation('archive'), NotFoundError);
    });

    it('should be frozen after construction', () => {
        assert.strictEqual(Object.isFrozen(catalog), true);
        assert.strictEqual(Object.isFrozen(catalog.getProfile('client')), true);
    });

    it('should reject permissions that reference unknown operations or objects', () => {
        assert.throws(
            () => new Catalog({
                ...TEST_SEED,
                permissions: [...TEST_SEED.permissions, { operation: 'archive', object: 'schedule' }]
            }),
            (error: unknown) =>
                error instanceof CatalogIntegrityError &&
                error.message === 'Catalog seed is inconsistent' &&
                error.problems.length === 2 &&
                error.problems[0] === 'permission archive:schedule references unknown operation "archive"' &&
                error.problems[1] === 'permission archive:schedule references unknown object "schedule"'
        );
    });

    it('should reject duplicate ids and dangling profile permissions', () => {
        assert.throws(
            () => new Catalog({
                ...TEST_SEED,
                profiles: [...TEST_SEED.profiles, { id: 'client', value: 'client-2', label: 'Client again' }],
                profilePermissions: [
                    ...TEST_SEED.profilePermissions,
                    { profile: 'auditor', permissions: [] },
                    { profile: 'crew', permissions: [{ operation: 'create', object: 'customer' }] }
                ]
            }),
            (error: unknown) =>
                error instanceof CatalogIntegrityError &&
                error.problems.includes('duplicate profile id "client"') &&
                error.problems.includes('profile permissions declared for unknown profile "auditor"') &&
                error.problems.includes('profile crew references unregistered permission create:customer')
        );
    });

    it('should reject operation and object ids containing the permission separator', () => {
        assert.throws(
            () => new Catalog({
                operations: [{ id: 'export', label: 'Export' }, { id: 'export:csv', label: 'Export as CSV' }],
                objects: [{ id: 'invoice', label: 'Invoice' }, { id: 'csv:invoice', label: 'CSV invoice' }],
                profiles: [{ id: 'client', value: 'client', label: 'Client' }],
                permissions: [
                    { operation: 'export:csv', object: 'invoice' },
                    { operation: 'export', object: 'csv:invoice' }
                ],
                profilePermissions: []
            }),
            (error: unknown) => {
                assert.ok(error instanceof CatalogIntegrityError);
                assert.deepStrictEqual(error.problems, [
                    'operation id "export:csv" must not contain ":"',
                    'object id "csv:invoice" must not contain ":"',
                    'duplicate permission export:csv:invoice'
                ]);
                return true;
            }
        );
    });

    it('should not resolve a pair that only matches a registered id once joined', () => {
        assert.throws(
            () => catalog.permissionOf('read:invoice', ''),
            (error: unknown) => error instanceof NotFoundError && error.key === 'read:invoice:'
        );
        assert.throws(() => catalog.permissionOf('edit:invoice', 'line_item'), NotFoundError);
    });
});
