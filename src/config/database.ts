import { Pool, QueryResult, QueryResultRow } from 'pg';
import config from './index';
import { logger } from '../shared/logger';

/**
 * The slice of pg the repositories need; a Pool or a PoolClient satisfies it
 */
export interface Queryable {
    query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface Database {
    primary: Queryable;
    replica: Queryable | null;
    hasReplica: boolean;
    read<T>(queryFn: (client: Queryable) => Promise<T>): Promise<T>;
    write<T>(queryFn: (client: Queryable) => Promise<T>): Promise<T>;
}

/**
 * Read/write splitting: reads go to the replica when one is configured and
 * fall back to the primary if it fails; writes always hit the primary
 */
export function createDatabase(primary: Queryable, replica: Queryable | null = null): Database {
    return {
        primary,
        replica,
        hasReplica: replica !== null,

        async read<T>(queryFn: (client: Queryable) => Promise<T>): Promise<T> {
            if (replica) {
                try {
                    return await queryFn(replica);
                } catch (error) {
                    logger.warn('Replica query failed, falling back to primary:', error);
                    return await queryFn(primary);
                }
            }
            return await queryFn(primary);
        },

        async write<T>(queryFn: (client: Queryable) => Promise<T>): Promise<T> {
            return await queryFn(primary);
        },
    };
}

let primaryPool: Pool | null = null;
let replicaPool: Pool | null = null;

function createPool(connectionString: string, name: string): Pool {
    const pool = new Pool({
        connectionString,
        max: config.database.poolSize,
        connectionTimeoutMillis: config.auth.upstreamTimeoutMs,
        statement_timeout: config.auth.upstreamTimeoutMs,
    });

    pool.on('error', (err) => {
        logger.error(`PostgreSQL ${name} pool error:`, err);
    });

    return pool;
}

export function getDatabase(): Database {
    if (!primaryPool) {
        primaryPool = createPool(config.database.url, 'primary');
        if (config.database.replicaUrl) {
            replicaPool = createPool(config.database.replicaUrl, 'replica');
        }
    }
    return createDatabase(primaryPool, replicaPool);
}

export async function closeDatabase(): Promise<void> {
    await Promise.all([primaryPool?.end(), replicaPool?.end()]);
    primaryPool = null;
    replicaPool = null;
    logger.info('PostgreSQL pools closed');
}
