import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { Permission } from '../../core/rbac/types';
import { AuthService } from '../../services/auth.service';
import { UnauthenticatedError } from '../../shared/errors/unauthenticated.error';
import { requirePermission } from '../middleware/rbac.middleware';
import { validate } from './auth.routes';

// ============================================
// REQUEST VALIDATION SCHEMAS
// ============================================

const paginationSchema = z.object({
    page: z.coerce.number().int().min(1).default(1),
    limit: z.coerce.number().int().min(1).max(100).default(20),
});

const updateUserSchema = z
    .object({
        firstName: z.string().min(1).max(100).optional(),
        lastName: z.string().min(1).max(100).optional(),
        role: z.string().min(1).max(50).optional(),
        isActive: z.boolean().optional(),
    })
    .strict();

function actorId(req: Request): string {
    if (!req.user) {
        throw new UnauthenticatedError();
    }
    return req.user.id;
}

// ============================================
// ROUTES
// ============================================

export function createUserRouter(authService: AuthService): Router {
    const router = Router();
    const requireUserRead = requirePermission(authService, Permission.USER_READ);
    const requireUserUpdate = requirePermission(authService, Permission.USER_UPDATE);

    // GET /users - List users (paginated, newest first)
    router.get('/', requireUserRead, async (req: Request, res: Response, next: NextFunction) => {
        try {
            const { page, limit } = validate(paginationSchema, req.query);
            const result = await authService.listUsers(page, limit);

            res.status(200).json({
                success: true,
                data: result,
            });
        } catch (error) {
            next(error);
        }
    });

    // GET /users/:id - Get user details
    router.get('/:id', requireUserRead, async (req: Request, res: Response, next: NextFunction) => {
        try {
            const user = await authService.getUser(req.params.id);

            res.status(200).json({
                success: true,
                data: { user },
            });
        } catch (error) {
            next(error);
        }
    });

    // PATCH /users/:id - Update profile fields, role or active flag
    router.patch('/:id', requireUserUpdate, async (req: Request, res: Response, next: NextFunction) => {
        try {
            const data = validate(updateUserSchema, req.body);
            const user = await authService.updateUser(actorId(req), req.params.id, data);

            res.status(200).json({
                success: true,
                data: { user },
            });
        } catch (error) {
            next(error);
        }
    });

    // DELETE /users/:id - Deactivate user and end their sessions
    router.delete('/:id', requireUserUpdate, async (req: Request, res: Response, next: NextFunction) => {
        try {
            await authService.deactivateUser(actorId(req), req.params.id);

            res.status(200).json({
                success: true,
                message: 'User deactivated successfully',
            });
        } catch (error) {
            next(error);
        }
    });

    return router;
}
