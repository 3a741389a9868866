import { PrincipalStore, RefreshTokenStore } from '../core/auth/stores';
import { IssuedTokenPair, RefreshTokenClaims } from '../core/auth/types';
import { DEFAULT_ROLE } from '../core/rbac/types';
import { InvalidTokenError } from '../shared/errors/invalid-token.error';
import { TokenExpiredError } from '../shared/errors/token-expired.error';
import { TokenReuseDetectedError } from '../shared/errors/token-reuse-detected.error';
import { TokenRevokedError } from '../shared/errors/token-revoked.error';
import { UnauthenticatedError } from '../shared/errors/unauthenticated.error';
import { logger, maskId } from '../shared/logger';
import { withTimeout } from '../shared/timeout';
import { ClaimsCodec } from './claims-codec.service';
import { RevocationService } from './revocation.service';
import { hashToken, TokenIssuer } from './token-issuer.service';

export interface RefreshRotationOptions {
    refreshTokenTtlSeconds: number;
    upstreamTimeoutMs: number;
}

export class RefreshRotationService {
    constructor(
        private readonly codec: ClaimsCodec,
        private readonly issuer: TokenIssuer,
        private readonly revocation: RevocationService,
        private readonly refreshTokens: RefreshTokenStore,
        private readonly principals: PrincipalStore,
        private readonly options: RefreshRotationOptions
    ) {}

    // ----------------------------------------
    // ROTATE
    // ----------------------------------------
    async rotate(refreshToken: string): Promise<IssuedTokenPair> {
        const claims = this.decode(refreshToken);

        const status = await this.revocation.isRevoked(claims.jti, claims.fid);
        if (status.family) {
            throw new TokenRevokedError('Session has been revoked');
        }

        const record = await this.withTimeout(
            this.refreshTokens.findByHash(hashToken(refreshToken)),
            'refresh record lookup'
        );

        if (!record) {
            throw new TokenRevokedError();
        }

        if (record.tokenId !== claims.jti || record.familyId !== claims.fid) {
            throw new InvalidTokenError('Refresh token does not match its record');
        }

        if (record.expiresAt.getTime() <= this.codec.nowSeconds() * 1000) {
            throw new TokenExpiredError();
        }

        // A token that was already rotated is being replayed
        if (record.replacedBy !== null) {
            await this.revokeFamily(record.familyId);
            logger.warn('Refresh token reuse detected, token family revoked', {
                userId: record.subjectId,
                familyId: maskId(record.familyId),
                jti: maskId(record.tokenId),
            });
            throw new TokenReuseDetectedError(record.familyId);
        }

        // Revoked without a successor: logout, password change, or a voided rotation
        if (record.revoked || status.token) {
            throw new TokenRevokedError();
        }

        const principal = await this.withTimeout(this.principals.findById(record.subjectId), 'principal lookup');

        if (!principal || !principal.isActive) {
            await this.revokeFamily(record.familyId);
            throw new TokenRevokedError('Account is no longer active');
        }

        // Exactly one concurrent caller wins the compare-and-set
        const won = await this.withTimeout(
            this.refreshTokens.revokeIfLatest(record.familyId, record.tokenId),
            'refresh record revoke'
        );

        if (!won) {
            logger.warn('Concurrent refresh lost the rotation race', {
                userId: record.subjectId,
                familyId: maskId(record.familyId),
            });
            throw new TokenRevokedError();
        }

        const pair = await this.issuer.issuePair(
            { id: principal.id, role: principal.roleName ?? DEFAULT_ROLE },
            record.familyId
        );

        // If either step fails the pair is never returned and the successor is voided
        try {
            await this.withTimeout(
                this.refreshTokens.linkReplacement(record.tokenId, pair.refreshTokenId),
                'refresh record link'
            );
            await this.revocation.revokeToken(claims.jti, this.codec.remainingLifetime(claims));
        } catch (error) {
            await this.abandonSuccessor(record.tokenId, pair.refreshTokenId, record.familyId);
            throw error;
        }

        logger.info('Refresh token rotated', {
            userId: principal.id,
            familyId: maskId(record.familyId),
        });

        return pair;
    }

    // ----------------------------------------
    // FAMILY REVOCATION
    // ----------------------------------------
    /**
     * Kill every token of a login lineage: the blacklist entry stops access
     * tokens already in flight, the durable update stops refresh tokens
     */
    async revokeFamily(familyId: string): Promise<void> {
        await this.revocation.revokeFamily(familyId, this.options.refreshTokenTtlSeconds);
        const count = await this.withTimeout(this.refreshTokens.revokeFamily(familyId), 'refresh family revoke');

        logger.info('Token family revoked', { familyId: maskId(familyId), records: count });
    }

    async revokeAllForSubject(subjectId: string): Promise<void> {
        const families = await this.withTimeout(
            this.refreshTokens.revokeAllForSubject(subjectId),
            'refresh subject revoke'
        );

        await Promise.all(
            families.map((familyId) =>
                this.revocation.revokeFamily(familyId, this.options.refreshTokenTtlSeconds)
            )
        );

        logger.info('All sessions revoked', { userId: subjectId, families: families.length });
    }

    /**
     * The new pair was never handed out. Void its record and unlink it so a
     * retry with the consumed token reads as revoked rather than replayed.
     */
    private async abandonSuccessor(tokenId: string, successorId: string, familyId: string): Promise<void> {
        try {
            await this.withTimeout(
                this.refreshTokens.voidReplacement(tokenId, successorId),
                'refresh record void'
            );
            logger.warn('Rotation failed after issuance, successor voided', {
                familyId: maskId(familyId),
                jti: maskId(successorId),
            });
        } catch (error) {
            logger.error('Failed to void refresh successor', {
                familyId: maskId(familyId),
                jti: maskId(successorId),
                error: error instanceof Error ? error.message : String(error),
            });
        }
    }

    private decode(refreshToken: string): RefreshTokenClaims {
        try {
            return this.codec.decode(refreshToken, 'refresh');
        } catch (error) {
            if (error instanceof UnauthenticatedError) {
                throw new InvalidTokenError('Invalid or expired refresh token');
            }
            throw error;
        }
    }

    private withTimeout<T>(operation: Promise<T>, label: string): Promise<T> {
        return withTimeout(operation, this.options.upstreamTimeoutMs, label);
    }
}
