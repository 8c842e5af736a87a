import { createApp } from './app';
import { loadConfig } from './config/app.config';
import { createPool } from './config/database';
import { PgStore } from './repositories/pg.store';
import { logger } from './utils/logger';

const startServer = async (): Promise<void> => {
    const config = loadConfig();
    const pool = createPool(config.databaseUrl);
    const store = new PgStore(pool);

    const shutdown = async (signal: string): Promise<void> => {
        logger.info(`${signal} received, shutting down gracefully`);
        await pool.end();
        process.exit(0);
    };

    for (const signal of ['SIGTERM', 'SIGINT'] as const) {
        process.on(signal, () => {
            shutdown(signal).catch((error) => {
                logger.error('Shutdown failed', { error });
                process.exit(1);
            });
        });
    }

    await store.ping();
    logger.info('Database connected successfully');

    const app = createApp(store, config);
    app.listen(config.port, () => {
        logger.info(`Server started on port ${config.port}`);
        logger.info(`Health check: http://localhost:${config.port}/health`);
    });
};

startServer().catch((error) => {
    logger.error('Failed to start server', { error });
    process.exit(1);
});
