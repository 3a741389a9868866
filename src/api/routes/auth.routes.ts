import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { AuthService } from '../../services/auth.service';
import { AuthenticationFailedError } from '../../shared/errors/authentication-failed.error';
import { NotFoundError } from '../../shared/errors/not-found.error';
import { UnauthenticatedError } from '../../shared/errors/unauthenticated.error';
import { ValidationError } from '../../shared/errors/validation.error';
import { logger } from '../../shared/logger';
import { createAuthMiddleware, extractBearerToken } from '../middleware/auth.middleware';

// ============================================
// REQUEST VALIDATION SCHEMAS
// ============================================

const passwordSchema = z.string().min(8).max(100);

const registerSchema = z.object({
    email: z.string().email(),
    password: passwordSchema,
    firstName: z.string().min(1).max(100).optional(),
    lastName: z.string().min(1).max(100).optional(),
});

const loginSchema = z.object({
    email: z.string().email(),
    password: z.string().min(1),
});

const refreshTokenSchema = z.object({
    refreshToken: z.string().min(1),
});

const forgotPasswordSchema = z.object({
    email: z.string().email(),
});

const resetPasswordSchema = z.object({
    token: z.string().min(1),
    password: passwordSchema,
});

const changePasswordSchema = z.object({
    currentPassword: z.string().min(1),
    newPassword: passwordSchema,
});

// ============================================
// VALIDATION HELPER
// ============================================

export function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
    const result = schema.safeParse(data);
    if (!result.success) {
        throw ValidationError.fromZod(result.error);
    }
    return result.data;
}

// ============================================
// ROUTES
// ============================================

export function createAuthRouter(authService: AuthService): Router {
    const router = Router();
    const authMiddleware = createAuthMiddleware(authService);

    // POST /auth/register - Create an account with the default role
    router.post('/register', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const data = validate(registerSchema, req.body);
            const user = await authService.register(data);

            res.status(201).json({
                success: true,
                data: { user },
                message: 'User registered successfully',
            });
        } catch (error) {
            next(error);
        }
    });

    // POST /auth/login - Login with email/password
    router.post('/login', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const data = validate(loginSchema, req.body);
            const tokens = await authService.login(data.email, data.password);

            res.status(200).json({
                success: true,
                data: { tokens },
            });
        } catch (error) {
            next(error);
        }
    });

    // POST /auth/refresh - Rotate the refresh token
    router.post('/refresh', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const data = validate(refreshTokenSchema, req.body);
            const tokens = await authService.refresh(data.refreshToken);

            res.status(200).json({
                success: true,
                data: { tokens },
            });
        } catch (error) {
            next(error);
        }
    });

    // POST /auth/logout - Revoke the presented access token and its session
    router.post('/logout', async (req: Request, res: Response, next: NextFunction) => {
        try {
            await authService.logout(extractBearerToken(req));

            res.status(200).json({
                success: true,
                message: 'Logged out successfully',
            });
        } catch (error) {
            next(error);
        }
    });

    // POST /auth/forgot-password - Request password reset
    router.post('/forgot-password', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const data = validate(forgotPasswordSchema, req.body);

            let resetToken: string | null = null;
            try {
                resetToken = await authService.requestPasswordReset(data.email);
                // Delivery by e-mail happens outside this service
            } catch (error) {
                if (!(error instanceof AuthenticationFailedError)) {
                    throw error;
                }
                logger.debug('Password reset requested for an unknown or inactive account');
            }

            // Always return success to prevent email enumeration
            res.status(200).json({
                success: true,
                message: 'If the email exists, a password reset link has been sent',
                // In development, include the token for testing
                ...(process.env.NODE_ENV === 'development' && resetToken ? { devToken: resetToken } : {}),
            });
        } catch (error) {
            next(error);
        }
    });

    // POST /auth/reset-password - Reset password with token
    router.post('/reset-password', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const data = validate(resetPasswordSchema, req.body);
            await authService.confirmPasswordReset(data.token, data.password);

            res.status(200).json({
                success: true,
                message: 'Password reset successfully',
            });
        } catch (error) {
            next(error);
        }
    });

    // POST /auth/change-password - Change password for the signed-in user
    router.post('/change-password', authMiddleware, async (req: Request, res: Response, next: NextFunction) => {
        try {
            if (!req.user) {
                throw new UnauthenticatedError();
            }
            const data = validate(changePasswordSchema, req.body);
            await authService.changePassword(req.user.id, data.currentPassword, data.newPassword);

            res.status(200).json({
                success: true,
                message: 'Password changed successfully',
            });
        } catch (error) {
            next(error);
        }
    });

    // GET /auth/me - Get current user profile
    router.get('/me', authMiddleware, async (req: Request, res: Response, next: NextFunction) => {
        try {
            if (!req.user) {
                throw new UnauthenticatedError();
            }
            const user = await authService.getCurrentUser(req.user.id);

            if (!user) {
                throw new NotFoundError('User');
            }

            res.status(200).json({
                success: true,
                data: user,
            });
        } catch (error) {
            next(error);
        }
    });

    return router;
}
