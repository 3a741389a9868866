import { RoleStore } from '../core/auth/stores';
import { AccessTokenClaims } from '../core/auth/types';
import { ADMIN_ROLE, roleGrants } from '../core/rbac/types';
import { ForbiddenError } from '../shared/errors/forbidden.error';
import { TokenRevokedError } from '../shared/errors/token-revoked.error';
import { logger } from '../shared/logger';
import { withTimeout } from '../shared/timeout';
import { ClaimsCodec } from './claims-codec.service';
import { RevocationService } from './revocation.service';

/**
 * Hot path for every protected request: decode, one blacklist round trip,
 * then a read of the snapshotted role. Nothing here writes.
 */
export class AuthorizationService {
    constructor(
        private readonly codec: ClaimsCodec,
        private readonly revocation: RevocationService,
        private readonly roles: RoleStore,
        private readonly upstreamTimeoutMs: number
    ) {}

    async authenticate(accessToken: string): Promise<AccessTokenClaims> {
        const claims = this.codec.decode(accessToken, 'access');

        const status = await this.revocation.isRevoked(claims.jti, claims.fid);
        if (status.token || status.family) {
            throw new TokenRevokedError();
        }

        return claims;
    }

    async authorize(accessToken: string, requiredPermission: string): Promise<AccessTokenClaims> {
        const claims = await this.authenticate(accessToken);

        if (claims.role === ADMIN_ROLE) {
            return claims;
        }

        const role = await withTimeout(this.roles.findByName(claims.role), this.upstreamTimeoutMs, 'role lookup');

        if (!role || !roleGrants(role.name, role.permissions, requiredPermission)) {
            logger.warn(`Permission denied: User ${claims.sub} (role: ${claims.role}) lacks ${requiredPermission}`);
            throw new ForbiddenError(requiredPermission);
        }

        return claims;
    }
}
