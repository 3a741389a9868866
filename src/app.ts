import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import config from './config';
import { AuthService } from './services/auth.service';
import { createAuthRouter } from './api/routes/auth.routes';
import { createRoleRouter } from './api/routes/role.routes';
import { createUserRouter } from './api/routes/user.routes';
import { createHealthRouter, HealthCheck } from './api/routes/health.routes';
import { errorHandler } from './api/middleware/error-handler';
import { requestIdMiddleware } from './api/middleware/request-id.middleware';

export interface CreateAppOptions {
    healthChecks?: Record<string, HealthCheck>;
    /** Off in tests so a suite can send more requests than the window allows */
    rateLimit?: boolean;
}

export function createApp(authService: AuthService, options: CreateAppOptions = {}): Application {
    const app: Application = express();

    // ============================================
    // SECURITY MIDDLEWARE
    // ============================================

    app.use(helmet());

    app.use(cors({
        origin: config.cors.origin,
        credentials: true,
    }));

    if (options.rateLimit ?? true) {
        app.use(rateLimit({
            windowMs: config.rateLimit.windowMs,
            max: config.rateLimit.maxRequests,
            standardHeaders: true,
            legacyHeaders: false,
            message: { success: false, error: { code: 'RATE_LIMIT_EXCEEDED', message: 'Too many requests, please try again later.' } },
        }));
    }

    // ============================================
    // BODY PARSING
    // ============================================

    app.use(express.json({ limit: '100kb' }));

    app.use(requestIdMiddleware);

    // ============================================
    // ROUTES
    // ============================================

    app.use('/health', createHealthRouter(options.healthChecks ?? {}));
    app.use('/auth', createAuthRouter(authService));
    app.use('/roles', createRoleRouter(authService));
    app.use('/users', createUserRouter(authService));

    // ============================================
    // ERROR HANDLING
    // ============================================

    // 404 handler
    app.use((req: Request, res: Response) => {
        res.status(404).json({
            success: false,
            error: {
                code: 'NOT_FOUND',
                message: `Route ${req.method} ${req.path} not found`,
            },
        });
    });

    app.use(errorHandler);

    return app;
}
