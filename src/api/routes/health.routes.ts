import { Router, Request, Response, NextFunction } from 'express';
import { logger } from '../../shared/logger';

export type HealthCheck = () => Promise<void>;

type ComponentStatus = 'up' | 'down';

// ============================================
// GET /health: Dependency Health Check
// ============================================
// Public endpoint (no auth), polled by load balancers.
export function createHealthRouter(checks: Record<string, HealthCheck>): Router {
    const router = Router();

    router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            const names = Object.keys(checks);
            const results = await Promise.allSettled(names.map((name) => checks[name]()));

            const components: Record<string, ComponentStatus> = {};
            results.forEach((result, index) => {
                components[names[index]] = result.status === 'fulfilled' ? 'up' : 'down';
                if (result.status === 'rejected') {
                    logger.warn(`Health check failed for ${names[index]}:`, result.reason);
                }
            });

            const healthy = Object.values(components).every((status) => status === 'up');

            res.status(healthy ? 200 : 503).json({
                success: healthy,
                data: {
                    status: healthy ? 'healthy' : 'degraded',
                    components,
                },
            });
        } catch (error) {
            next(error);
        }
    });

    return router;
}
