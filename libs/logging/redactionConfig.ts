/**
 * Centralized Redaction Configuration
 * Keys that must never reach the log sink in clear text.
 */
export const REDACT_KEYS = [
    // Credentials (root and nested)
    'authorization', '*.authorization',
    'token', '*.token',
    'access_token', '*.access_token',
    'id_token', '*.id_token',
    'password', '*.password',
    'secret', '*.secret',
    'client_secret', '*.client_secret',
    'connectionString', '*.connectionString',

    // Caller PII carried on the identity context
    'email', '*.email',
    'displayName', '*.displayName'
];

export const REDACT_CENSOR = '[REDACTED]';
