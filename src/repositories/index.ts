import { Database } from '../config/database';
import { KeyValueStore, AuthStores } from '../core/auth/stores';
import { createPrincipalRepository } from './principal.repository';
import { createRefreshTokenRepository } from './refresh-token.repository';
import { createRoleRepository } from './role.repository';

export { createPrincipalRepository, createRefreshTokenRepository, createRoleRepository };

export function createPostgresStores(db: Database, keyValue: KeyValueStore): AuthStores {
    return {
        principals: createPrincipalRepository(db),
        roles: createRoleRepository(db),
        refreshTokens: createRefreshTokenRepository(db),
        keyValue,
    };
}
