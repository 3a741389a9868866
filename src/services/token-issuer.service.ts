import { createHash } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { RefreshTokenStore } from '../core/auth/stores';
import { IssuedTokenPair, IssueSubject } from '../core/auth/types';
import { logger, maskId } from '../shared/logger';
import { withTimeout } from '../shared/timeout';
import { ClaimsCodec } from './claims-codec.service';

export interface TokenIssuerOptions {
    accessTokenTtlSeconds: number;
    refreshTokenTtlSeconds: number;
    upstreamTimeoutMs: number;
}

/**
 * Refresh records are looked up by the hash of the token string;
 * the raw token is never stored
 */
export function hashToken(token: string): string {
    return createHash('sha256').update(token).digest('hex');
}

export class TokenIssuer {
    constructor(
        private readonly codec: ClaimsCodec,
        private readonly refreshTokens: RefreshTokenStore,
        private readonly options: TokenIssuerOptions
    ) {}

    /**
     * Sign an access/refresh pair and persist the refresh record.
     * A family id is passed when rotating; a login starts a new family.
     */
    async issuePair(subject: IssueSubject, familyId: string = uuidv4()): Promise<IssuedTokenPair> {
        const accessTokenId = uuidv4();
        const refreshTokenId = uuidv4();

        const access = this.codec.encode(
            { typ: 'access', sub: subject.id, role: subject.role, jti: accessTokenId, fid: familyId },
            this.options.accessTokenTtlSeconds
        );

        const refresh = this.codec.encode(
            { typ: 'refresh', sub: subject.id, jti: refreshTokenId, fid: familyId },
            this.options.refreshTokenTtlSeconds
        );

        // Signing is pure; the record is written last so a failed write
        // leaves nothing behind and nothing is returned
        await withTimeout(
            this.refreshTokens.create({
                tokenId: refreshTokenId,
                subjectId: subject.id,
                familyId,
                tokenHash: hashToken(refresh.token),
                expiresAt: new Date(refresh.expiresAt * 1000),
                revoked: false,
                replacedBy: null,
                createdAt: new Date(refresh.issuedAt * 1000),
            }),
            this.options.upstreamTimeoutMs,
            'refresh record create'
        );

        logger.info('Token pair issued', {
            userId: subject.id,
            familyId: maskId(familyId),
            jti: maskId(accessTokenId),
        });

        return {
            accessToken: access.token,
            refreshToken: refresh.token,
            expiresIn: this.options.accessTokenTtlSeconds,
            familyId,
            accessTokenId,
            refreshTokenId,
        };
    }
}
