import { v4 as uuidv4 } from 'uuid';
import { PASSWORD_RESET_PURPOSE } from '../core/auth/types';
import { TokenRevokedError } from '../shared/errors/token-revoked.error';
import { logger, maskId } from '../shared/logger';
import { ClaimsCodec } from './claims-codec.service';
import { RevocationService } from './revocation.service';

export class PasswordResetService {
    constructor(
        private readonly codec: ClaimsCodec,
        private readonly revocation: RevocationService,
        private readonly resetTokenTtlSeconds: number
    ) {}

    issueResetToken(subjectId: string): string {
        const jti = uuidv4();
        const { token } = this.codec.encode(
            { typ: 'password_reset', sub: subjectId, jti, purpose: PASSWORD_RESET_PURPOSE },
            this.resetTokenTtlSeconds
        );

        logger.info(`Password reset token generated for user: ${subjectId}`);
        return token;
    }

    /**
     * Single use: the token id is blacklisted before success is returned,
     * whether or not the caller goes on to change the password
     */
    async consumeResetToken(token: string): Promise<string> {
        // The claim schema pins purpose, so a decoded token is a reset token
        const claims = this.codec.decode(token, 'password_reset');

        const status = await this.revocation.isRevoked(claims.jti);
        if (status.token) {
            throw new TokenRevokedError('Reset token has already been used');
        }

        const claimed = await this.revocation.claimOnce(claims.jti, this.codec.remainingLifetime(claims));
        if (!claimed) {
            throw new TokenRevokedError('Reset token has already been used');
        }

        logger.info('Password reset token consumed', { userId: claims.sub, jti: maskId(claims.jti) });
        return claims.sub;
    }
}
