import { AuthConfig } from '../config';
import { AuthStores, PasswordHasher } from '../core/auth/stores';
import { AccessTokenClaims, AuthTokens, IssuedTokenPair, PrincipalProfile, Role } from '../core/auth/types';
import { DEFAULT_ROLE } from '../core/rbac/types';
import { AuthenticationFailedError } from '../shared/errors/authentication-failed.error';
import { InvalidTokenError } from '../shared/errors/invalid-token.error';
import { UnauthenticatedError } from '../shared/errors/unauthenticated.error';
import { logger } from '../shared/logger';
import { withTimeout } from '../shared/timeout';
import { AuthorizationService } from './authorization.service';
import { ClaimsCodec } from './claims-codec.service';
import { createBcryptHasher, CredentialService, normalizeEmail } from './credential.service';
import { PasswordResetService } from './password-reset.service';
import { RefreshRotationService } from './refresh-rotation.service';
import { RevocationService } from './revocation.service';
import { TokenIssuer } from './token-issuer.service';
import { RegisterRequest, toProfile, UserPage, UserService, UserUpdate } from './user.service';

function toAuthTokens(pair: IssuedTokenPair): AuthTokens {
    return {
        accessToken: pair.accessToken,
        refreshToken: pair.refreshToken,
        expiresIn: pair.expiresIn,
        tokenType: 'bearer',
    };
}

export interface AuthServiceDeps {
    stores: AuthStores;
    hasher: PasswordHasher;
    codec: ClaimsCodec;
    credentials: CredentialService;
    issuer: TokenIssuer;
    revocation: RevocationService;
    rotation: RefreshRotationService;
    authorization: AuthorizationService;
    passwordReset: PasswordResetService;
    users: UserService;
    upstreamTimeoutMs: number;
}

// ============================================
// AUTHENTICATION SERVICE
// ============================================

export class AuthService {
    constructor(private readonly deps: AuthServiceDeps) {}

    // ----------------------------------------
    // REGISTER
    // ----------------------------------------
    /** Creates the account only; the caller logs in separately */
    async register(data: RegisterRequest): Promise<PrincipalProfile> {
        return this.deps.users.register(data);
    }

    // ----------------------------------------
    // LOGIN
    // ----------------------------------------
    async login(email: string, secret: string): Promise<AuthTokens> {
        const principal = await this.deps.credentials.verify(email, secret);

        const pair = await this.deps.issuer.issuePair({
            id: principal.id,
            role: principal.roleName ?? DEFAULT_ROLE,
        });

        try {
            await this.withTimeout(this.deps.stores.principals.recordLogin(principal.id, new Date()), 'principal update');
        } catch (error) {
            // The pair is already issued; a missed last-login stamp is not worth failing the login
            logger.warn('Failed to record last login', { userId: principal.id, error });
        }

        logger.info(`User logged in successfully: ${principal.id}`);
        return toAuthTokens(pair);
    }

    // ----------------------------------------
    // REFRESH TOKEN (with rotation)
    // ----------------------------------------
    async refresh(refreshToken: string): Promise<AuthTokens> {
        return toAuthTokens(await this.deps.rotation.rotate(refreshToken));
    }

    // ----------------------------------------
    // LOGOUT
    // ----------------------------------------
    /**
     * Blacklists the access token and ends its session, so the refresh
     * token issued alongside it stops working too
     */
    async logout(accessToken: string): Promise<void> {
        let claims: AccessTokenClaims;
        try {
            claims = this.deps.codec.decode(accessToken, 'access');
        } catch (error) {
            if (error instanceof UnauthenticatedError) {
                throw new InvalidTokenError();
            }
            throw error;
        }

        await this.deps.revocation.revokeToken(claims.jti, this.deps.codec.remainingLifetime(claims));
        await this.deps.rotation.revokeFamily(claims.fid);

        logger.info(`User logged out: ${claims.sub}`);
    }

    // ----------------------------------------
    // AUTHORIZATION
    // ----------------------------------------
    async authenticate(accessToken: string): Promise<AccessTokenClaims> {
        return this.deps.authorization.authenticate(accessToken);
    }

    async authorize(accessToken: string, permission: string): Promise<AccessTokenClaims> {
        return this.deps.authorization.authorize(accessToken, permission);
    }

    // ----------------------------------------
    // FORGOT PASSWORD
    // ----------------------------------------
    async requestPasswordReset(email: string): Promise<string> {
        const principal = await this.withTimeout(
            this.deps.stores.principals.findByEmail(normalizeEmail(email)),
            'principal lookup'
        );

        if (!principal || !principal.isActive) {
            throw new AuthenticationFailedError();
        }

        return this.deps.passwordReset.issueResetToken(principal.id);
    }

    // ----------------------------------------
    // RESET PASSWORD
    // ----------------------------------------
    async confirmPasswordReset(resetToken: string, newSecret: string): Promise<void> {
        let subjectId: string;
        try {
            subjectId = await this.deps.passwordReset.consumeResetToken(resetToken);
        } catch (error) {
            if (error instanceof UnauthenticatedError) {
                throw new InvalidTokenError('Invalid or expired reset token');
            }
            throw error;
        }

        const principal = await this.withTimeout(this.deps.stores.principals.findById(subjectId), 'principal lookup');

        if (!principal || !principal.isActive) {
            throw new AuthenticationFailedError();
        }

        await this.updateSecret(principal.id, newSecret);
        logger.info(`Password reset for user: ${principal.id}`);
    }

    // ----------------------------------------
    // CHANGE PASSWORD
    // ----------------------------------------
    async changePassword(subjectId: string, currentSecret: string, newSecret: string): Promise<void> {
        const principal = await this.withTimeout(this.deps.stores.principals.findById(subjectId), 'principal lookup');

        if (!principal || !principal.isActive) {
            throw new AuthenticationFailedError();
        }

        const matches = await this.deps.hasher.verify(currentSecret, principal.passwordHash);
        if (!matches) {
            logger.warn(`Password change failed: invalid current password for user ${subjectId}`);
            throw new AuthenticationFailedError();
        }

        await this.updateSecret(principal.id, newSecret);
        logger.info(`Password changed for user: ${principal.id}`);
    }

    // ----------------------------------------
    // GET CURRENT USER
    // ----------------------------------------
    async getCurrentUser(subjectId: string): Promise<PrincipalProfile | null> {
        const principal = await this.withTimeout(this.deps.stores.principals.findById(subjectId), 'principal lookup');

        return principal ? toProfile(principal) : null;
    }

    // ----------------------------------------
    // USER ADMINISTRATION
    // ----------------------------------------
    async listUsers(page: number, limit: number): Promise<UserPage> {
        return this.deps.users.list(page, limit);
    }

    async getUser(id: string): Promise<PrincipalProfile> {
        return this.deps.users.get(id);
    }

    async updateUser(actorId: string, id: string, data: UserUpdate): Promise<PrincipalProfile> {
        return this.deps.users.update(actorId, id, data);
    }

    async deactivateUser(actorId: string, id: string): Promise<void> {
        return this.deps.users.deactivate(actorId, id);
    }

    // ----------------------------------------
    // ROLES
    // ----------------------------------------
    async listRoles(): Promise<Role[]> {
        return this.withTimeout(this.deps.stores.roles.list(), 'role list');
    }

    async getRole(name: string): Promise<Role | null> {
        return this.withTimeout(this.deps.stores.roles.findByName(name), 'role lookup');
    }

    /**
     * Store a new hash and end every session of the principal
     */
    private async updateSecret(subjectId: string, newSecret: string): Promise<void> {
        const passwordHash = await this.deps.hasher.hash(newSecret);
        await this.withTimeout(this.deps.stores.principals.updatePasswordHash(subjectId, passwordHash), 'principal update');
        await this.deps.rotation.revokeAllForSubject(subjectId);
    }

    private withTimeout<T>(operation: Promise<T>, label: string): Promise<T> {
        return withTimeout(operation, this.deps.upstreamTimeoutMs, label);
    }
}

// ============================================
// COMPOSITION
// ============================================

export interface CreateAuthServiceOptions {
    hasher?: PasswordHasher;
    /** Milliseconds since epoch; lets tests move the clock */
    now?: () => number;
}

export function createAuthService(
    stores: AuthStores,
    authConfig: AuthConfig,
    options: CreateAuthServiceOptions = {}
): AuthService {
    const timeoutMs = authConfig.upstreamTimeoutMs;
    const hasher = options.hasher ?? createBcryptHasher(authConfig.bcryptCost);

    const codec = new ClaimsCodec({
        keys: authConfig.signingKeys,
        issuer: authConfig.issuer,
        clockSkewSeconds: authConfig.clockSkewSeconds,
        now: options.now,
    });

    const revocation = new RevocationService(stores.keyValue, timeoutMs);

    const issuer = new TokenIssuer(codec, stores.refreshTokens, {
        accessTokenTtlSeconds: authConfig.accessTokenTtlSeconds,
        refreshTokenTtlSeconds: authConfig.refreshTokenTtlSeconds,
        upstreamTimeoutMs: timeoutMs,
    });

    const rotation = new RefreshRotationService(codec, issuer, revocation, stores.refreshTokens, stores.principals, {
        refreshTokenTtlSeconds: authConfig.refreshTokenTtlSeconds,
        upstreamTimeoutMs: timeoutMs,
    });

    return new AuthService({
        stores,
        hasher,
        codec,
        credentials: new CredentialService(stores.principals, hasher, {
            upstreamTimeoutMs: timeoutMs,
            bcryptCost: authConfig.bcryptCost,
        }),
        issuer,
        revocation,
        rotation,
        authorization: new AuthorizationService(codec, revocation, stores.roles, timeoutMs),
        passwordReset: new PasswordResetService(codec, revocation, authConfig.resetTokenTtlSeconds),
        users: new UserService(stores.principals, stores.roles, hasher, rotation, timeoutMs),
        upstreamTimeoutMs: timeoutMs,
    });
}
