import { PasswordHasher, PrincipalStore, RoleStore } from '../core/auth/stores';
import { Principal, PrincipalChanges, PrincipalProfile } from '../core/auth/types';
import { DEFAULT_ROLE, Permission } from '../core/rbac/types';
import { ConflictError } from '../shared/errors/conflict.error';
import { ForbiddenError } from '../shared/errors/forbidden.error';
import { NotFoundError } from '../shared/errors/not-found.error';
import { logger } from '../shared/logger';
import { withTimeout } from '../shared/timeout';
import { normalizeEmail } from './credential.service';
import { RefreshRotationService } from './refresh-rotation.service';

export interface RegisterRequest {
    email: string;
    password: string;
    firstName?: string;
    lastName?: string;
}

export interface UserUpdate {
    firstName?: string;
    lastName?: string;
    role?: string;
    isActive?: boolean;
}

export interface UserPage {
    users: PrincipalProfile[];
    pagination: {
        page: number;
        limit: number;
        total: number;
        totalPages: number;
    };
}

export function toProfile(principal: Principal): PrincipalProfile {
    const { passwordHash: _passwordHash, ...profile } = principal;
    return { ...profile, role: principal.roleName ?? DEFAULT_ROLE };
}

// ============================================
// USER SERVICE
// ============================================

export class UserService {
    constructor(
        private readonly principals: PrincipalStore,
        private readonly roles: RoleStore,
        private readonly hasher: PasswordHasher,
        private readonly rotation: RefreshRotationService,
        private readonly upstreamTimeoutMs: number
    ) {}

    // ----------------------------------------
    // REGISTER
    // ----------------------------------------
    async register(data: RegisterRequest): Promise<PrincipalProfile> {
        const email = normalizeEmail(data.email);
        logger.info(`Registration attempt for email: ${email}`);

        const existing = await this.withTimeout(this.principals.findByEmail(email), 'principal lookup');
        if (existing) {
            throw new ConflictError('Email already registered', { email });
        }

        const passwordHash = await this.hasher.hash(data.password);

        // The store enforces uniqueness too, for registrations that race past the check
        const principal = await this.withTimeout(
            this.principals.create({
                email,
                passwordHash,
                roleName: DEFAULT_ROLE,
                firstName: data.firstName ?? null,
                lastName: data.lastName ?? null,
            }),
            'principal create'
        );

        logger.info(`User registered successfully: ${principal.id}`);
        return toProfile(principal);
    }

    // ----------------------------------------
    // ADMINISTRATION
    // ----------------------------------------
    async list(page: number, limit: number): Promise<UserPage> {
        const { principals, total } = await this.withTimeout(
            this.principals.list({ offset: (page - 1) * limit, limit }),
            'principal list'
        );

        return {
            users: principals.map(toProfile),
            pagination: { page, limit, total, totalPages: Math.ceil(total / limit) },
        };
    }

    async get(id: string): Promise<PrincipalProfile> {
        return toProfile(await this.require(id));
    }

    async update(actorId: string, id: string, data: UserUpdate): Promise<PrincipalProfile> {
        const existing = await this.require(id);
        const currentRole = existing.roleName ?? DEFAULT_ROLE;

        if (id === actorId && data.role !== undefined && data.role !== currentRole) {
            throw new ForbiddenError(Permission.USER_UPDATE, 'Cannot change your own role');
        }
        if (id === actorId && data.isActive === false) {
            throw new ForbiddenError(Permission.USER_UPDATE, 'Cannot deactivate your own account');
        }

        if (data.role !== undefined) {
            const role = await this.withTimeout(this.roles.findByName(data.role), 'role lookup');
            if (!role) {
                throw new NotFoundError('Role', data.role);
            }
        }

        const changes: PrincipalChanges = {
            firstName: data.firstName,
            lastName: data.lastName,
            roleName: data.role,
            isActive: data.isActive,
        };

        const updated = await this.withTimeout(this.principals.update(id, changes), 'principal update');
        if (!updated) {
            throw new NotFoundError('User', id);
        }

        if (existing.isActive && !updated.isActive) {
            await this.rotation.revokeAllForSubject(id);
        }

        logger.info(`User updated: ${id} by ${actorId}`);
        return toProfile(updated);
    }

    /**
     * Soft delete: the account stays on record, inactive, and every session
     * it holds is revoked
     */
    async deactivate(actorId: string, id: string): Promise<void> {
        if (id === actorId) {
            throw new ForbiddenError(Permission.USER_UPDATE, 'Cannot deactivate your own account');
        }

        await this.update(actorId, id, { isActive: false });
        logger.info(`User deactivated: ${id}`);
    }

    private async require(id: string): Promise<Principal> {
        const principal = await this.withTimeout(this.principals.findById(id), 'principal lookup');
        if (!principal) {
            throw new NotFoundError('User', id);
        }
        return principal;
    }

    private withTimeout<T>(operation: Promise<T>, label: string): Promise<T> {
        return withTimeout(operation, this.upstreamTimeoutMs, label);
    }
}
