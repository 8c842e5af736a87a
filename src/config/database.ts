import { Pool } from 'pg';
import { logger } from '../utils/logger';

export function createPool(connectionString: string | undefined): Pool {
    const pool = new Pool({
        connectionString,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });

    pool.on('error', (err) => {
        logger.error('unexpected database error', { error: err });
        process.exit(-1);
    });

    return pool;
}
