import { RefreshTokenStore } from '../core/auth/stores';
import { logger } from '../shared/logger';

// ============================================
// REFRESH RECORD CLEANUP
// ============================================

export class TokenCleanupService {
    private cleanupInterval: NodeJS.Timeout | null = null;

    constructor(private readonly refreshTokens: RefreshTokenStore) {}

    /**
     * Delete refresh records that expired more than `olderThanHours` ago
     * @returns Number of deleted records
     */
    async cleanup(olderThanHours: number): Promise<number> {
        const cutoffDate = new Date(Date.now() - olderThanHours * 60 * 60 * 1000);
        const count = await this.refreshTokens.deleteExpired(cutoffDate);

        logger.info(`Token cleanup: deleted ${count} refresh records expired before ${cutoffDate.toISOString()}`);
        return count;
    }

    /**
     * Run cleanup now and then every `intervalHours`
     */
    start(intervalHours: number, olderThanHours: number): void {
        if (this.cleanupInterval) {
            logger.warn('Token cleanup scheduler already running');
            return;
        }

        this.cleanup(olderThanHours).catch((err) => {
            logger.error('Initial token cleanup failed:', err);
        });

        const intervalMs = intervalHours * 60 * 60 * 1000;
        this.cleanupInterval = setInterval(() => {
            this.cleanup(olderThanHours).catch((err) => {
                logger.error('Scheduled token cleanup failed:', err);
            });
        }, intervalMs);
        this.cleanupInterval.unref();

        logger.info(`Token cleanup scheduler started: every ${intervalHours} hours`);
    }

    stop(): void {
        if (this.cleanupInterval) {
            clearInterval(this.cleanupInterval);
            this.cleanupInterval = null;
            logger.info('Token cleanup scheduler stopped');
        }
    }
}
