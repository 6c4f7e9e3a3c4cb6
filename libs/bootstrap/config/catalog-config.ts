import { GuardRule } from '../config-guard.js';

/**
 * Catalog Configuration Guards
 * The catalog is fixed at deployment; production must pin its hash.
 */
export const CATALOG_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'ROLEGATE_CATALOG_PATH' },

    {
        type: 'forbidIf',
        name: 'ROLEGATE_CATALOG_SHA256',
        when: () => process.env.NODE_ENV === 'production' && !process.env.ROLEGATE_CATALOG_SHA256,
        message: 'Production must pin the catalog with ROLEGATE_CATALOG_SHA256',
    },

    {
        type: 'assert',
        check: () => !process.env.ROLEGATE_CATALOG_SHA256 || /^[a-f0-9]{64}$/i.test(process.env.ROLEGATE_CATALOG_SHA256),
        message: 'ROLEGATE_CATALOG_SHA256 must be a hex SHA-256 digest',
    }
];
