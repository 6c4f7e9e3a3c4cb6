import pg from 'pg';
import { AsyncLocalStorage } from 'node:async_hooks';
import { ConfigGuard } from '../bootstrap/config-guard.js';
import { DB_CONFIG_GUARDS } from '../bootstrap/config/db-config.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';
import { assertDbRole, DB_ROLES, DbRole } from './roles.js';

const { Pool } = pg;

function readEnv(name: string): string {
    return process.env[name] ?? '';
}

/**
 * Hardened PostgreSQL pool with mandatory role enforcement.
 * Created on first use so that importing this module has no side effects.
 */
function createPool(): pg.Pool {
    ConfigGuard.enforce(DB_CONFIG_GUARDS);

    const isProtectedEnv = process.env.NODE_ENV === 'production' || process.env.NODE_ENV === 'staging';
    const poolMax = process.env.DB_POOL_MAX ? parseInt(process.env.DB_POOL_MAX, 10) : 20;
    const tlsRequired = isProtectedEnv || process.env.DB_SSL_QUERY === 'true';

    return new Pool({
        host: readEnv('DB_HOST'),
        port: parseInt(readEnv('DB_PORT'), 10),
        user: readEnv('DB_USER'),
        password: readEnv('DB_PASSWORD'),
        database: readEnv('DB_NAME'),
        max: Number.isFinite(poolMax) ? poolMax : 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        ssl: tlsRequired
            ? {
                rejectUnauthorized: true,
                ca: process.env.DB_CA_CERT,
            }
            : false
    });
}

let pool: pg.Pool | null = null;

function getPool(): pg.Pool {
    if (!pool) {
        pool = createPool();
    }
    return pool;
}

export type Queryable = {
    query<T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]): Promise<pg.QueryResult<T>>;
};

export type TxClient = Queryable;

const transactionContext = new AsyncLocalStorage<{ inTx: boolean }>();

function quoteIdentifier(identifier: string): string {
    const escaped = identifier.replace(/"/g, '""');
    return `"${escaped}"`;
}

async function verifyRole(client: pg.PoolClient, role: DbRole): Promise<void> {
    const roleCheck = await client.query<{ current_user: string }>('SELECT current_user');
    const currentUser = roleCheck.rows[0]?.current_user;
    if (currentUser !== role) {
        throw new Error(`CRITICAL: Role enforcement failure. Target: ${role}, Actual: ${currentUser}`);
    }
}

async function resetRole(client: pg.PoolClient, context: string): Promise<boolean> {
    try {
        await client.query('RESET ROLE');
        return true;
    } catch (error) {
        logger.warn({ error }, `[DB] Failed to reset role during ${context}`);
        return false;
    }
}

function releaseClient(client: pg.PoolClient, forceDestroy: boolean, context: string): void {
    try {
        if (forceDestroy) {
            client.release(new Error(`[DB] Forcing client destroy after ${context}`));
        } else {
            client.release();
        }
    } catch (error) {
        logger.error({ error }, `[DB] Failed to release client during ${context}`);
    }
}

async function runTransaction<T>(
    client: pg.PoolClient,
    role: DbRole,
    callback: (tx: TxClient) => Promise<T>
): Promise<T> {
    const store = transactionContext.getStore();
    if (store?.inTx) {
        throw new Error('Nested transaction detected: transactionAsRole cannot be invoked within an active transaction.');
    }

    return transactionContext.run({ inTx: true }, async () => {
        try {
            await client.query('BEGIN');
            await client.query(`SET LOCAL ROLE ${quoteIdentifier(role)}`);
            await verifyRole(client, role);

            const txClient: TxClient = {
                query: <R extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]) =>
                    client.query<R>(text, params)
            };

            const result = await callback(txClient);
            await client.query('COMMIT');
            return result;
        } catch (error) {
            try {
                await client.query('ROLLBACK');
            } catch (rollbackError) {
                logger.error({ error: rollbackError }, '[DB] Failed to rollback transaction');
            }
            throw ErrorSanitizer.sanitize(error, 'DatabaseLayer:TransactionFailed');
        }
    });
}

export const db = {
    /**
     * Concurrency-safe scoped role query. Role is applied per call.
     */
    queryAsRole: async <T extends pg.QueryResultRow = pg.QueryResultRow>(
        role: DbRole,
        text: string,
        params?: unknown[]
    ): Promise<pg.QueryResult<T>> => {
        const validatedRole = assertDbRole(role);
        const client = await getPool().connect();
        try {
            await client.query(`SET ROLE ${quoteIdentifier(validatedRole)}`);
            await verifyRole(client, validatedRole);
            return await client.query<T>(text, params);
        } catch (error) {
            throw ErrorSanitizer.sanitize(error, 'DatabaseLayer:QueryAsRoleFailure');
        } finally {
            const resetOk = await resetRole(client, 'queryAsRole');
            releaseClient(client, !resetOk, 'queryAsRole');
        }
    },

    /**
     * Executes a callback within a managed transaction; rolls back on error.
     */
    transactionAsRole: async <T>(role: DbRole, callback: (client: TxClient) => Promise<T>): Promise<T> => {
        const validatedRole = assertDbRole(role);
        const client = await getPool().connect();
        let forceDestroy = false;
        try {
            return await runTransaction(client, validatedRole, callback);
        } catch (error) {
            forceDestroy = true;
            throw error;
        } finally {
            const resetOk = await resetRole(client, 'transactionAsRole');
            releaseClient(client, forceDestroy || !resetOk, 'transactionAsRole');
        }
    },

    /**
     * Boot-time probe to ensure DB_USER can SET ROLE into each required role.
     */
    probeRoles: async (): Promise<void> => {
        const client = await getPool().connect();
        try {
            for (const role of DB_ROLES) {
                await client.query('BEGIN');
                try {
                    await client.query(`SET LOCAL ROLE ${quoteIdentifier(role)}`);
                    await verifyRole(client, role);
                    await client.query('ROLLBACK');
                } catch (error) {
                    try {
                        await client.query('ROLLBACK');
                    } catch (rollbackError) {
                        logger.error({ error: rollbackError }, '[DB] Failed to rollback role probe');
                    }
                    throw ErrorSanitizer.sanitize(error, 'DatabaseLayer:ProbeRolesFailure');
                }
            }
        } finally {
            releaseClient(client, false, 'probeRoles');
        }
    }
};

export type DbClient = Pick<typeof db, 'queryAsRole' | 'transactionAsRole'>;

export type { DbRole };
