import { RedisClientType } from 'redis';
import { KeyValueStore } from '../core/auth/stores';
import { logger, maskId } from '../shared/logger';
import { withTimeout } from '../shared/timeout';

// Blacklist key prefixes
export const REVOCATION_KEYS = {
    token: (tokenId: string) => `revoked:token:${tokenId}`,
    family: (familyId: string) => `revoked:family:${familyId}`,
} as const;

export interface RevocationStatus {
    token: boolean;
    family: boolean;
}

// ============================================
// REDIS ADAPTER
// ============================================

export function createRedisKeyValueStore(client: RedisClientType): KeyValueStore {
    return {
        async put(key, ttlSeconds) {
            await client.set(key, '1', { EX: ttlSeconds });
        },

        async putIfAbsent(key, ttlSeconds) {
            const result = await client.set(key, '1', { EX: ttlSeconds, NX: true });
            return result === 'OK';
        },

        async exists(keys) {
            const values = await client.mGet(keys);
            return values.map((value) => value !== null);
        },
    };
}

// ============================================
// REVOCATION STORE
// ============================================
// Every failure here surfaces as UpstreamUnavailableError: callers treat
// an unreachable blacklist as "token invalid", never as "not revoked".

export class RevocationService {
    constructor(
        private readonly store: KeyValueStore,
        private readonly timeoutMs: number
    ) {}

    async revokeToken(tokenId: string, ttlSeconds: number): Promise<void> {
        if (ttlSeconds <= 0) return;

        await withTimeout(
            this.store.put(REVOCATION_KEYS.token(tokenId), ttlSeconds),
            this.timeoutMs,
            'revocation store put'
        );
        logger.debug('Token revoked', { jti: maskId(tokenId), ttlSeconds });
    }

    async revokeFamily(familyId: string, ttlSeconds: number): Promise<void> {
        if (ttlSeconds <= 0) return;

        await withTimeout(
            this.store.put(REVOCATION_KEYS.family(familyId), ttlSeconds),
            this.timeoutMs,
            'revocation store put'
        );
        logger.debug('Token family revoked', { familyId: maskId(familyId), ttlSeconds });
    }

    /**
     * One round trip covering the token id and, when given, its family
     */
    async isRevoked(tokenId: string, familyId?: string): Promise<RevocationStatus> {
        const keys = [REVOCATION_KEYS.token(tokenId)];
        if (familyId) {
            keys.push(REVOCATION_KEYS.family(familyId));
        }

        const [token, family = false] = await withTimeout(
            this.store.exists(keys),
            this.timeoutMs,
            'revocation store exists'
        );

        return { token, family };
    }

    /**
     * Blacklist a token id only if it is not already present.
     * Returns false when another caller got there first.
     */
    async claimOnce(tokenId: string, ttlSeconds: number): Promise<boolean> {
        return withTimeout(
            this.store.putIfAbsent(REVOCATION_KEYS.token(tokenId), Math.max(ttlSeconds, 1)),
            this.timeoutMs,
            'revocation store put'
        );
    }
}
