/**
 * Unit Tests: Configuration Guards
 *
 * Violation messages for the database and catalog rule sets.
 *
 * @see libs/bootstrap/config-guard.ts
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { collectViolations, GuardRule } from '../../libs/bootstrap/config-guard.js';
import { CATALOG_CONFIG_GUARDS } from '../../libs/bootstrap/config/catalog-config.js';
import { DB_CONFIG_GUARDS } from '../../libs/bootstrap/config/db-config.js';

describe('ConfigGuard', () => {
    const originalEnv = { ...process.env };

    beforeEach(() => {
        process.env.NODE_ENV = 'development';
        process.env.DB_HOST = 'localhost';
        process.env.DB_PORT = '5432';
        process.env.DB_USER = 'rolegate';
        process.env.DB_PASSWORD = 'test-password';
        process.env.DB_NAME = 'rolegate';
        delete process.env.DB_CA_CERT;
        delete process.env.DB_SSL_QUERY;
        process.env.ROLEGATE_CATALOG_PATH = '.rolegate/catalog.json';
        delete process.env.ROLEGATE_CATALOG_SHA256;
    });

    afterEach(() => {
        process.env = { ...originalEnv };
    });

    describe('DB_CONFIG_GUARDS', () => {
        it('should pass a complete development configuration', () => {
            assert.deepStrictEqual(collectViolations(DB_CONFIG_GUARDS), []);
        });

        it('should report missing and blank variables', () => {
            delete process.env.DB_HOST;
            process.env.DB_NAME = '   ';

            assert.deepStrictEqual(collectViolations(DB_CONFIG_GUARDS), [
                'FATAL CONFIG: Required env var DB_HOST is missing',
                'FATAL CONFIG: Required env var DB_NAME is missing'
            ]);
        });

        it('should require TLS material in production', () => {
            process.env.NODE_ENV = 'production';
            process.env.DB_SSL_QUERY = 'false';

            assert.deepStrictEqual(collectViolations(DB_CONFIG_GUARDS), [
                'FATAL CONFIG: DB_CA_CERT is required in production/staging',
                'FATAL CONFIG: DB_SSL_QUERY=false is forbidden in production/staging (Rule: DB_SSL_QUERY)'
            ]);
        });

        it('should reject a non-integer port', () => {
            process.env.DB_PORT = 'fifty';

            assert.deepStrictEqual(collectViolations(DB_CONFIG_GUARDS), ['FATAL CONFIG: DB_PORT must be an integer']);
        });
    });

    describe('CATALOG_CONFIG_GUARDS', () => {
        it('should allow an unpinned catalog outside production', () => {
            assert.deepStrictEqual(collectViolations(CATALOG_CONFIG_GUARDS), []);
        });

        it('should require a pin in production', () => {
            process.env.NODE_ENV = 'production';

            assert.deepStrictEqual(collectViolations(CATALOG_CONFIG_GUARDS), [
                'FATAL CONFIG: Production must pin the catalog with ROLEGATE_CATALOG_SHA256 (Rule: ROLEGATE_CATALOG_SHA256)'
            ]);
        });

        it('should reject a pin that is not a SHA-256 digest', () => {
            process.env.ROLEGATE_CATALOG_SHA256 = 'abc123';
            delete process.env.ROLEGATE_CATALOG_PATH;

            assert.deepStrictEqual(collectViolations(CATALOG_CONFIG_GUARDS), [
                'FATAL CONFIG: Required env var ROLEGATE_CATALOG_PATH is missing',
                'FATAL CONFIG: ROLEGATE_CATALOG_SHA256 must be a hex SHA-256 digest'
            ]);
        });
    });

    it('should record a rule that throws instead of aborting the scan', () => {
        const rules: GuardRule[] = [
            { type: 'assert', check: () => { throw new Error('probe exploded'); }, message: 'unused' },
            { type: 'required', name: 'ROLEGATE_UNSET_FOR_TEST' }
        ];

        assert.deepStrictEqual(collectViolations(rules), [
            'Check failed for rule: probe exploded',
            'FATAL CONFIG: Required env var ROLEGATE_UNSET_FOR_TEST is missing'
        ]);
    });
});
