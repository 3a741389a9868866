import config from './config';
import { createApp } from './app';
import { logger } from './shared/logger';
import { closeDatabase, getDatabase } from './config/database';
import { closeRedisConnection, getRedisClient } from './config/redis';
import { getServices, resetServices } from './services';
import { TokenCleanupService } from './services/token-cleanup.service';

// ============================================
// SERVER STARTUP
// ============================================

async function startServer(): Promise<void> {
    const db = getDatabase();
    await db.primary.query('SELECT 1');
    logger.info('Database connected successfully');

    const { stores, authService } = await getServices();
    const redis = await getRedisClient();

    const cleanup = new TokenCleanupService(stores.refreshTokens);
    cleanup.start(config.cleanup.intervalHours, config.cleanup.olderThanHours);

    const app = createApp(authService, {
        healthChecks: {
            database: async () => {
                await db.primary.query('SELECT 1');
            },
            redis: async () => {
                await redis.ping();
            },
        },
    });

    const server = app.listen(config.app.port, () => {
        logger.info(`Server running on port ${config.app.port} in ${config.app.nodeEnv} mode`);
        logger.info(`Health check available at http://localhost:${config.app.port}/health`);
    });

    // Graceful shutdown
    const shutdown = async (signal: string): Promise<void> => {
        logger.info(`${signal} received, shutting down gracefully`);
        cleanup.stop();
        server.close();
        try {
            resetServices();
            await closeRedisConnection();
            await closeDatabase();
            process.exit(0);
        } catch (error) {
            logger.error('Error during shutdown:', error);
            process.exit(1);
        }
    };

    process.on('SIGTERM', () => {
        void shutdown('SIGTERM');
    });
    process.on('SIGINT', () => {
        void shutdown('SIGINT');
    });
}

startServer().catch((error) => {
    logger.error('Failed to start server:', error);
    process.exit(1);
});
