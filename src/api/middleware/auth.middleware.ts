import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AccessTokenClaims } from '../../core/auth/types';
import { AuthService } from '../../services/auth.service';
import { UnauthenticatedError } from '../../shared/errors/unauthenticated.error';

// ============================================
// EXTEND EXPRESS REQUEST TYPE
// ============================================

declare global {
    namespace Express {
        interface Request {
            user?: {
                id: string;
                role: string;
            };
            tokenPayload?: AccessTokenClaims;
            accessToken?: string;
        }
    }
}

export function extractBearerToken(req: Request): string {
    const authHeader = req.headers.authorization;

    if (!authHeader) {
        throw new UnauthenticatedError('No authorization token provided');
    }

    const [bearer, token] = authHeader.split(' ');

    if (bearer !== 'Bearer' || !token) {
        throw new UnauthenticatedError('Invalid authorization header format');
    }

    return token;
}

// ============================================
// AUTH MIDDLEWARE
// ============================================

export function createAuthMiddleware(authService: AuthService): RequestHandler {
    return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
        try {
            const token = extractBearerToken(req);
            const payload = await authService.authenticate(token);

            req.user = { id: payload.sub, role: payload.role };
            req.tokenPayload = payload;
            req.accessToken = token;

            next();
        } catch (error) {
            next(error);
        }
    };
}
