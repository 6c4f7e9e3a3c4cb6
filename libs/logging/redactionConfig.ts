/**
 * Centralized Redaction Configuration
 * Keys that must never reach log output, root and nested.
 */
export const REDACT_KEYS = [
    // Credentials
    'authorization', '*.authorization',
    'cookie', '*.cookie',
    'token', '*.token',
    'access_token', '*.access_token',
    'refresh_token', '*.refresh_token',
    'password', '*.password',
    'secret', '*.secret',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',

    // Connection settings
    'connectionString', '*.connectionString',
    'ca', '*.ca'
];

export const REDACT_CENSOR = '[REDACTED]';
