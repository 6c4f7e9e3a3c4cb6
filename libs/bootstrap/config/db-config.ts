import { GuardRule } from '../config-guard.js';

/**
 * DB Configuration Guards
 * Connection parameters must be present; TLS material is mandatory in
 * protected environments.
 */
export const DB_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'DB_HOST' },
    { type: 'required', name: 'DB_PORT' },
    { type: 'required', name: 'DB_USER' },
    { type: 'required', name: 'DB_PASSWORD', sensitive: true },
    { type: 'required', name: 'DB_NAME' },

    {
        type: 'assert',
        check: () => Number.isInteger(Number(process.env.DB_PORT ?? '')),
        message: 'DB_PORT must be an integer',
    },

    {
        type: 'assert',
        check: () =>
            !['production', 'staging'].includes(process.env.NODE_ENV ?? '') ||
            !!process.env.DB_CA_CERT,
        message: 'DB_CA_CERT is required in production/staging',
    },

    {
        type: 'forbidIf',
        name: 'DB_SSL_QUERY',
        when: () =>
            ['production', 'staging'].includes(process.env.NODE_ENV ?? '') &&
            process.env.DB_SSL_QUERY === 'false',
        message: 'DB_SSL_QUERY=false is forbidden in production/staging',
    }
];
