import { Router, Request, Response, NextFunction } from 'express';
import { Permission } from '../../core/rbac/types';
import { AuthService } from '../../services/auth.service';
import { NotFoundError } from '../../shared/errors/not-found.error';
import { requirePermission } from '../middleware/rbac.middleware';

export function createRoleRouter(authService: AuthService): Router {
    const router = Router();

    router.use(requirePermission(authService, Permission.ROLE_READ));

    // GET /roles - List roles with their permission sets
    router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            const roles = await authService.listRoles();

            res.status(200).json({
                success: true,
                data: { roles, total: roles.length },
            });
        } catch (error) {
            next(error);
        }
    });

    // GET /roles/:name - Get a single role
    router.get('/:name', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const role = await authService.getRole(req.params.name);

            if (!role) {
                throw new NotFoundError('Role', req.params.name);
            }

            res.status(200).json({
                success: true,
                data: role,
            });
        } catch (error) {
            next(error);
        }
    });

    return router;
}
