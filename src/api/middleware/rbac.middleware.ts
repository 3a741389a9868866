import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AuthService } from '../../services/auth.service';
import { extractBearerToken } from './auth.middleware';

// ============================================
// RBAC MIDDLEWARE FACTORY
// ============================================

/**
 * Authenticates the bearer token and checks the snapshotted role grants
 * `permission`. Runs standalone; no preceding auth middleware is needed.
 */
export function requirePermission(authService: AuthService, permission: string): RequestHandler {
    return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
        try {
            const token = extractBearerToken(req);
            const payload = await authService.authorize(token, permission);

            req.user = { id: payload.sub, role: payload.role };
            req.tokenPayload = payload;
            req.accessToken = token;

            next();
        } catch (error) {
            next(error);
        }
    };
}
